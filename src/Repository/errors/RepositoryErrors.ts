export class RepositoryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Raised when a durable document cannot be read, validated or written.
 * A mutation that was accepted in memory before the write failed is kept.
 */
export class StorageError extends RepositoryError {
    constructor(message: string, readonly filePath?: string) {
        super(`Storage Error: ${message}`);
    }
}

export interface MailStoreErrorDetails {
    /** IMAP response code such as NONEXISTENT or TRYCREATE, when the server sent one. */
    responseCode?: string;
    authenticationFailed?: boolean;
}

export class MailStoreError extends RepositoryError {
    readonly responseCode?: string;
    readonly authenticationFailed: boolean;

    constructor(message: string, details: MailStoreErrorDetails = {}) {
        super(message);
        this.responseCode = details.responseCode;
        this.authenticationFailed = details.authenticationFailed ?? false;
    }
}

/** The mail connection could not be opened or is no longer usable. */
export class MailStoreConnectionError extends MailStoreError { }
