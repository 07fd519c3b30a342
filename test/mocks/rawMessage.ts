import { faker } from "@faker-js/faker";

export interface RawMessageOptions {
    from?: string;
    replyTo?: string;
    subject?: string;
    messageId?: string;
    references?: string;
    body?: string;
    /** Replaces the plain-text body with a ready-made MIME body and its content type. */
    mime?: { contentType: string, body: string };
}

/**
 * Builds an RFC 822 message the way a server would return it from a fetch.
 */
export function buildRawMessage(options: RawMessageOptions = {}): Buffer {
    const headers: string[] = [];
    if (options.from !== undefined) headers.push(`From: ${options.from}`);
    headers.push(`To: assistant@example.com`);
    if (options.replyTo !== undefined) headers.push(`Reply-To: ${options.replyTo}`);
    headers.push(`Subject: ${options.subject ?? faker.lorem.words(3)}`);
    headers.push(`Date: Mon, 02 Jun 2025 09:30:00 +0000`);
    if (options.messageId !== undefined) headers.push(`Message-ID: ${options.messageId}`);
    if (options.references !== undefined) headers.push(`References: ${options.references}`);
    headers.push(`MIME-Version: 1.0`);

    if (options.mime) {
        headers.push(`Content-Type: ${options.mime.contentType}`);
        return Buffer.from(`${headers.join("\r\n")}\r\n\r\n${options.mime.body}`, "utf8");
    }
    headers.push(`Content-Type: text/plain; charset=utf-8`);
    return Buffer.from(`${headers.join("\r\n")}\r\n\r\n${options.body ?? faker.lorem.paragraph()}\r\n`, "utf8");
}
