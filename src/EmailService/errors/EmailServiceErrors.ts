import type { FolderAttempt } from "../DraftPublisher";

/**
 * A single fetched message could not be turned into a candidate. Never surfaced
 * beyond the extractor; the message is skipped.
 */
export class MessageError extends Error {
    constructor(message: string, readonly messageUid: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Every draft folder, including the inbox fallback, rejected the reply.
 */
export class PublishError extends Error {
    constructor(message: string, readonly attempts: FolderAttempt[]) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * The inbox could not be reselected after publishing. Message ids are only valid in the
 * inbox, so the rest of the cycle cannot safely continue.
 */
export class FolderSelectionError extends Error {
    constructor(message: string, readonly folder: string) {
        super(message);
        this.name = this.constructor.name;
    }
}
