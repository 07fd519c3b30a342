// mailsplit ships no type declarations; only the parts of the splitter used here are described.
declare module "mailsplit" {
    import { Transform } from "stream";

    /** Emitted once per MIME node, after its header block. */
    export interface MimeNode {
        type: "node";
        root: boolean;
        /** Lower-cased media type, false when the node has no Content-Type header. */
        contentType: string | false;
        /** The multipart subtype (`mixed`, `alternative`, …), false for leaf nodes. */
        multipart: string | false;
        charset?: string | false;
        /** A stream that undoes the node's Content-Transfer-Encoding. */
        getDecoder(): Transform;
    }

    /** A chunk of the current leaf node's encoded body. */
    export interface BodyChunk {
        type: "body";
        value: Buffer;
    }

    /** Multipart structure between nodes: preambles, boundaries, epilogues. */
    export interface StructureChunk {
        type: "data";
        value: Buffer;
    }

    export type SplitterChunk = MimeNode | BodyChunk | StructureChunk;

    export interface SplitterOptions {
        ignoreEmbedded?: boolean;
        maxHeadSize?: number;
    }

    export class Splitter extends Transform {
        constructor(options?: SplitterOptions);
    }
}
