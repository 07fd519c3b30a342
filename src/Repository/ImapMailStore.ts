import { ImapFlow } from 'imapflow';
import { ImapConfig } from '../Config/config';
import { ILogger } from '../lib/logger/ILogger';
import { IMailStore, INBOX, SearchCriteria, UNSEEN_ONLY } from './IMailStore';
import { MailStoreConnectionError, MailStoreError } from './errors/RepositoryErrors';

export type ImapClientFactory = (config: ImapConfig) => ImapFlow;

export const createImapClient: ImapClientFactory = (config) => new ImapFlow({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: {
        user: config.user,
        pass: config.password
    },
    logger: false,
});

/**
 * IMAP-backed MailStore. One connection is opened by `connect()` and reused;
 * message ids are UIDs in the currently selected folder.
 */
export class ImapMailStore implements IMailStore {
    private client: ImapFlow | null = null;

    constructor(
        private readonly config: ImapConfig,
        private readonly logger: ILogger,
        private readonly createClient: ImapClientFactory = createImapClient
    ) { }

    async connect(): Promise<void> {
        const client = this.createClient(this.config);
        client.on('error', (error: Error) => {
            this.logger.error('IMAP client error', { error: `${error}` });
        });
        client.on('close', () => {
            this.logger.warn('IMAP connection closed');
        });

        try {
            await client.connect();
            await client.mailboxOpen(INBOX);
        } catch (error) {
            throw new MailStoreConnectionError(
                `Failed to connect to ${this.config.host}:${this.config.port} as ${this.config.user}: ${error}`,
                readErrorDetails(error)
            );
        }

        this.client = client;
        this.logger.info(`Connected to IMAP server ${this.config.host}`);
    }

    isConnected(): boolean {
        return this.client !== null && this.client.usable;
    }

    async search(criteria: SearchCriteria = UNSEEN_ONLY): Promise<string[]> {
        const client = this.requireClient();
        const query = criteria.seen === undefined ? { all: true } : { seen: criteria.seen };
        const result: unknown = await this.run('search', () => client.search(query, { uid: true }));
        if (!Array.isArray(result)) {
            throw new MailStoreError('IMAP search failed: server rejected the query');
        }
        return result.map(uid => String(uid));
    }

    async fetch(id: string): Promise<Buffer> {
        const client = this.requireClient();
        const message: unknown = await this.run(`fetch ${id}`, () => client.fetchOne(id, { source: true }, { uid: true }));
        if (typeof message === 'object' && message !== null && 'source' in message && Buffer.isBuffer(message.source)) {
            return message.source;
        }
        throw new MailStoreError(`Message ${id} has no source`);
    }

    async append(folder: string, flags: string[], timestamp: Date, rawMessage: Buffer): Promise<void> {
        const client = this.requireClient();
        const result: unknown = await this.run(`append to ${folder}`, () => client.append(folder, rawMessage, flags, timestamp));
        if (result === false) {
            throw new MailStoreError(`Server refused append to ${folder}`);
        }
    }

    async setFlag(id: string, flag: string): Promise<void> {
        const client = this.requireClient();
        const updated: unknown = await this.run(`flag ${id}`, () => client.messageFlagsAdd(id, [flag], { uid: true }));
        if (updated === false) {
            throw new MailStoreError(`Server refused to set ${flag} on message ${id}`);
        }
    }

    async selectFolder(name: string): Promise<void> {
        const client = this.requireClient();
        await this.run(`select ${name}`, () => client.mailboxOpen(name));
    }

    async logout(): Promise<void> {
        const client = this.client;
        this.client = null;
        if (client && client.usable) {
            await client.logout();
            this.logger.info('Logged out of IMAP server');
        }
    }

    private requireClient(): ImapFlow {
        if (!this.client || !this.client.usable) {
            throw new MailStoreConnectionError('IMAP connection is not open');
        }
        return this.client;
    }

    private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
        try {
            return await command();
        } catch (error) {
            const message = `IMAP ${operation} failed: ${error}`;
            if (!this.isConnected()) {
                throw new MailStoreConnectionError(message, readErrorDetails(error));
            }
            throw new MailStoreError(message, readErrorDetails(error));
        }
    }
}

function readErrorDetails(error: unknown): { responseCode?: string, authenticationFailed?: boolean } {
    if (typeof error !== 'object' || error === null) {
        return {};
    }
    return {
        responseCode: 'serverResponseCode' in error && typeof error.serverResponseCode === 'string'
            ? error.serverResponseCode
            : undefined,
        authenticationFailed: 'authenticationFailed' in error && error.authenticationFailed === true,
    };
}
