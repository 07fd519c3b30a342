/// <reference path="../types/mailsplit.d.ts" />
import { MimeNode, Splitter, SplitterChunk } from "mailsplit";

interface LeafPart {
    node: MimeNode;
    chunks: Buffer[];
}

interface MessageParts {
    multipart: boolean;
    /** Leaf nodes in document order. */
    leaves: LeafPart[];
}

const PLAIN_TEXT = "text/plain";

/**
 * The plain-text body of a raw RFC 822 message.
 *
 * Multipart messages yield the first `text/plain` part in document order, or "" when there
 * is none; other text parts are ignored. A single-part message yields its decoded payload
 * whatever its media type.
 */
export async function extractPlainBody(raw: Buffer): Promise<string> {
    const { multipart, leaves } = await splitMessage(raw);

    const part = multipart
        ? leaves.find(leaf => mediaType(leaf.node) === PLAIN_TEXT)
        : leaves[0];
    if (!part) {
        return "";
    }
    return decodePart(part);
}

function splitMessage(raw: Buffer): Promise<MessageParts> {
    return new Promise<MessageParts>((resolve, reject) => {
        const splitter = new Splitter();
        const leaves: LeafPart[] = [];
        let multipart: boolean | null = null;
        let current: LeafPart | null = null;

        splitter.on("data", (chunk: SplitterChunk) => {
            if (chunk.type === "node") {
                if (multipart === null) {
                    multipart = Boolean(chunk.multipart);
                }
                current = chunk.multipart ? null : { node: chunk, chunks: [] };
                if (current) {
                    leaves.push(current);
                }
            } else if (chunk.type === "body" && current) {
                current.chunks.push(chunk.value);
            }
        });
        splitter.on("error", reject);
        splitter.on("end", () => resolve({ multipart: multipart ?? false, leaves }));

        splitter.end(raw);
    });
}

function decodePart(part: LeafPart): Promise<string> {
    return new Promise<string>((resolve, reject) => {
        const decoder = part.node.getDecoder();
        const decoded: Buffer[] = [];

        decoder.on("data", (chunk: Buffer) => decoded.push(chunk));
        decoder.on("error", reject);
        decoder.on("end", () => resolve(toText(Buffer.concat(decoded), part.node.charset)));

        decoder.end(Buffer.concat(part.chunks));
    });
}

// Parts without a Content-Type header default to text/plain (RFC 2045 §5.2).
function mediaType(node: MimeNode): string {
    return node.contentType ? node.contentType.toLowerCase() : PLAIN_TEXT;
}

function toText(bytes: Buffer, charset: string | false | undefined): string {
    if (charset) {
        try {
            return new TextDecoder(charset).decode(bytes);
        } catch (error) {
            if (!(error instanceof RangeError)) {
                throw error;
            }
        }
    }
    return bytes.toString("utf8");
}
