import { Inject, Injectable } from "@nestjs/common";
import MailComposer from "nodemailer/lib/mail-composer";
import { ILogger } from "../lib/logger/ILogger";
import { IncomingMessage } from "../models/IncomingMessage";
import { DRAFT_FLAG, IMailStore, INBOX } from "../Repository/IMailStore";
import { MailStoreConnectionError, MailStoreError } from "../Repository/errors/RepositoryErrors";
import { FolderSelectionError, PublishError } from "./errors/EmailServiceErrors";

export interface DraftPublisherOptions {
    /** The account address drafts are written from. */
    fromAddress: string;
    /** Tried in order; the first folder that accepts the append wins. */
    draftFolders: string[];
    now?: () => Date;
}

export type FolderRejection = "missing" | "denied" | "disconnected" | "error";

export type FolderAttempt =
    | { folder: string, accepted: true }
    | { folder: string, accepted: false, rejection: FolderRejection, reason: string };

export interface DraftLocation {
    folder: string;
    /** True when no draft folder accepted the reply and it was stored in the inbox. */
    usedFallback: boolean;
    attempts: FolderAttempt[];
}

const MISSING_FOLDER_CODES = ["NONEXISTENT", "TRYCREATE"];
const DENIED_CODES = ["NOPERM", "AUTHORIZATIONFAILED", "AUTHENTICATIONFAILED", "READ-ONLY"];

/**
 * Stores generated replies as drafts. Draft folder names differ between providers,
 * so a fixed list is tried in order with the inbox as the last resort.
 */
@Injectable()
export class DraftPublisher {
    private readonly now: () => Date;

    constructor(
        @Inject("IMailStore") private readonly mailStore: IMailStore,
        @Inject("DraftPublisherOptions") private readonly options: DraftPublisherOptions,
        @Inject("ILogger") private readonly logger: ILogger
    ) {
        this.now = options.now ?? (() => new Date());
    }

    /**
     * @throws PublishError when no folder, the inbox included, accepts the reply.
     * @throws FolderSelectionError when the inbox cannot be reselected afterwards,
     * whatever the outcome of the append.
     */
    async publish(message: IncomingMessage, responseText: string): Promise<DraftLocation> {
        const draft = await this.composeReply(message, responseText);
        const attempts: FolderAttempt[] = [];

        try {
            for (const folder of this.options.draftFolders) {
                const attempt = await this.tryFolder(folder, draft);
                attempts.push(attempt);
                if (attempt.accepted) {
                    this.logger.info(`Draft saved to ${folder} folder for email from ${message.sender}`, { subject: message.subject });
                    return { folder, usedFallback: false, attempts };
                }
                this.logger.debug(`Draft folder ${folder} rejected the reply (${attempt.rejection}): ${attempt.reason}`);
            }

            const fallback = await this.tryFolder(INBOX, draft);
            attempts.push(fallback);
            if (fallback.accepted) {
                this.logger.warn(`No draft folder accepted the reply, saved to ${INBOX} for email from ${message.sender}`, { subject: message.subject });
                return { folder: INBOX, usedFallback: true, attempts };
            }

            throw new PublishError(
                `Unable to save draft for email from ${message.sender}: ${fallback.reason}`,
                attempts
            );
        } finally {
            await this.resetSelection();
        }
    }

    /**
     * Builds the RFC 5322 reply, threaded onto the original when it carried a Message-ID.
     */
    async composeReply(message: IncomingMessage, responseText: string): Promise<Buffer> {
        const references = message.messageId ? [...message.references, message.messageId] : message.references;
        const composer = new MailComposer({
            from: this.options.fromAddress,
            to: message.sender,
            subject: `Re: ${message.subject}`,
            text: responseText,
            date: this.now(),
            inReplyTo: message.messageId,
            references: references.length > 0 ? references : undefined,
        });

        return new Promise<Buffer>((resolve, reject) => {
            composer.compile().build((error, buffer) => {
                if (error) {
                    reject(error);
                } else {
                    resolve(buffer);
                }
            });
        });
    }

    private async tryFolder(folder: string, draft: Buffer): Promise<FolderAttempt> {
        try {
            await this.mailStore.selectFolder(folder);
            await this.mailStore.append(folder, [DRAFT_FLAG], this.now(), draft);
            return { folder, accepted: true };
        } catch (error) {
            return {
                folder,
                accepted: false,
                rejection: classifyRejection(error),
                reason: error instanceof Error ? error.message : `${error}`,
            };
        }
    }

    private async resetSelection(): Promise<void> {
        try {
            await this.mailStore.selectFolder(INBOX);
        } catch (error) {
            this.logger.error(`Unable to reselect ${INBOX} after publishing`, { error: `${error}` });
            throw new FolderSelectionError(`Unable to reselect ${INBOX} after publishing: ${error}`, INBOX);
        }
    }
}

export function classifyRejection(error: unknown): FolderRejection {
    if (error instanceof MailStoreConnectionError) {
        return "disconnected";
    }
    if (error instanceof MailStoreError) {
        if (error.authenticationFailed || (error.responseCode && DENIED_CODES.includes(error.responseCode))) {
            return "denied";
        }
        if (error.responseCode && MISSING_FOLDER_CODES.includes(error.responseCode)) {
            return "missing";
        }
        if (/doesn't exist|does not exist|no such|unknown mailbox|not found/i.test(error.message)) {
            return "missing";
        }
    }
    return "error";
}
