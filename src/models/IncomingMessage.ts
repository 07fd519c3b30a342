/**
 * A fetched, filtered and decoded mail item awaiting a reply.
 * Lives for a single polling cycle and is never persisted.
 */
export interface IncomingMessage {
    /** Mailbox-assigned UID, opaque to everything but the MailStore. */
    readonly id: string;
    /** Lower-cased bare address of the sender. */
    readonly sender: string;
    /** The From header as sent, display name included. */
    readonly senderHeader: string;
    readonly replyTo?: string;
    readonly subject: string;
    readonly body: string;
    readonly messageId?: string;
    readonly references: string[];
}
