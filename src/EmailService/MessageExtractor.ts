import { Inject, Injectable } from "@nestjs/common";
import { AddressObject, simpleParser } from "mailparser";
import { ILogger } from "../lib/logger/ILogger";
import { IncomingMessage } from "../models/IncomingMessage";
import { IMailStore, SearchCriteria, UNSEEN_ONLY } from "../Repository/IMailStore";
import { MailStoreConnectionError } from "../Repository/errors/RepositoryErrors";
import { extractPlainBody } from "./BodyExtractor";
import { MessageError } from "./errors/EmailServiceErrors";

export interface MessageFilterOptions {
    /** Lower-cased substrings matched against the From and Reply-To headers. */
    blacklist: string[];
}

/**
 * Turns unseen mailbox items into reply candidates. Blacklisted senders and undecodable
 * messages are dropped; headers come from mailparser, the body from {@link extractPlainBody}.
 */
@Injectable()
export class MessageExtractor {
    private readonly blacklist: string[];

    constructor(
        @Inject("IMailStore") private readonly mailStore: IMailStore,
        @Inject("MessageFilterOptions") options: MessageFilterOptions,
        @Inject("ILogger") private readonly logger: ILogger
    ) {
        this.blacklist = options.blacklist.map(entry => entry.toLowerCase()).filter(entry => entry.length > 0);
    }

    /**
     * Lazily yields candidates for one search. Iterating again re-queries the mailbox.
     */
    async *fetchCandidates(criteria: SearchCriteria = UNSEEN_ONLY): AsyncGenerator<IncomingMessage> {
        const ids = await this.mailStore.search(criteria);
        this.logger.info(`Found ${ids.length} messages matching search`, { criteria });

        for (const id of ids) {
            let candidate: IncomingMessage | null;
            try {
                candidate = await this.extract(id);
            } catch (error) {
                if (error instanceof MailStoreConnectionError) {
                    throw error;
                }
                this.logger.warn(`Skipping message ${id}: ${error}`);
                continue;
            }
            if (candidate) {
                yield candidate;
            }
        }
    }

    /**
     * @returns the decoded message, or null when the sender or reply-to is blacklisted.
     * @throws MessageError when the message cannot be fetched or decoded;
     * a lost connection is rethrown as is.
     */
    async extract(id: string): Promise<IncomingMessage | null> {
        let raw: Buffer;
        try {
            raw = await this.mailStore.fetch(id);
        } catch (error) {
            if (error instanceof MailStoreConnectionError) {
                throw error;
            }
            throw new MessageError(`fetch failed: ${error}`, id);
        }

        const parsed = await simpleParser(raw, { skipHtmlToText: true, skipTextToHtml: true }).catch((error: unknown) => {
            throw new MessageError(`unable to parse message: ${error}`, id);
        });

        const from = firstAddress(parsed.from);
        if (!from) {
            throw new MessageError("message has no sender address", id);
        }
        const senderHeader = addressText(parsed.from);
        const replyToHeader = addressText(parsed.replyTo);

        const blockedBy = this.matchBlacklist(senderHeader) ?? this.matchBlacklist(replyToHeader);
        if (blockedBy) {
            this.logger.info(`Skipping message ${id} from ${from}: matches blacklist entry "${blockedBy}"`);
            return null;
        }

        const body = await extractPlainBody(raw).catch((error: unknown) => {
            throw new MessageError(`unable to decode body: ${error}`, id);
        });

        return {
            id,
            sender: from.toLowerCase(),
            senderHeader,
            replyTo: firstAddress(parsed.replyTo)?.toLowerCase(),
            subject: parsed.subject ?? "",
            body,
            messageId: parsed.messageId,
            references: toList(parsed.references),
        };
    }

    isBlacklisted(header: string): boolean {
        return this.matchBlacklist(header) !== undefined;
    }

    private matchBlacklist(header: string): string | undefined {
        if (!header) {
            return undefined;
        }
        const lowered = header.toLowerCase();
        return this.blacklist.find(entry => lowered.includes(entry));
    }
}

function addressObjects(field: AddressObject | AddressObject[] | undefined): AddressObject[] {
    if (!field) {
        return [];
    }
    return Array.isArray(field) ? field : [field];
}

function addressText(field: AddressObject | AddressObject[] | undefined): string {
    return addressObjects(field).map(object => object.text).join(", ");
}

function firstAddress(field: AddressObject | AddressObject[] | undefined): string | undefined {
    for (const object of addressObjects(field)) {
        const address = object.value.find(entry => entry.address)?.address;
        if (address) {
            return address;
        }
    }
    return undefined;
}

function toList(value: string | string[] | undefined): string[] {
    if (!value) {
        return [];
    }
    return Array.isArray(value) ? value : [value];
}
