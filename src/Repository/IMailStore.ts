export const INBOX = 'INBOX';
export const SEEN_FLAG = '\\Seen';
export const DRAFT_FLAG = '\\Draft';

export interface SearchCriteria {
    /** false restricts the search to unseen messages; undefined matches everything. */
    seen?: boolean;
}

export const UNSEEN_ONLY: SearchCriteria = { seen: false };

/**
 * The operations the assistant needs from a mail-protocol connection.
 * Message identifiers are opaque strings issued by `search`.
 */
export interface IMailStore {
    connect(): Promise<void>;
    isConnected(): boolean;
    search(criteria?: SearchCriteria): Promise<string[]>;
    fetch(id: string): Promise<Buffer>;
    append(folder: string, flags: string[], timestamp: Date, rawMessage: Buffer): Promise<void>;
    setFlag(id: string, flag: string): Promise<void>;
    selectFolder(name: string): Promise<void>;
    logout(): Promise<void>;
}
