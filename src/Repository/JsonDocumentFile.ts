import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { StorageError } from './errors/RepositoryErrors';

/**
 * A single JSON document on disk, validated on read and replaced atomically on write.
 */
export class JsonDocumentFile<T> {
    constructor(
        readonly filePath: string,
        private readonly schema: z.ZodType<T>
    ) { }

    /**
     * @returns the parsed document, or null when the file does not exist yet.
     * @throws StorageError when the file is unreadable, not JSON, or fails validation.
     */
    async read(): Promise<T | null> {
        let data: string;
        try {
            data = await fs.readFile(this.filePath, 'utf8');
        } catch (error) {
            if (isFileNotFound(error)) {
                return null;
            }
            throw new StorageError(`unable to read ${this.filePath}: ${error}`, this.filePath);
        }

        let json: unknown;
        try {
            json = JSON.parse(data);
        } catch (error) {
            throw new StorageError(`${this.filePath} is not valid JSON: ${error}`, this.filePath);
        }

        const parsed = this.schema.safeParse(json);
        if (!parsed.success) {
            throw new StorageError(`${this.filePath} has an unexpected shape: ${parsed.error.message}`, this.filePath);
        }
        return parsed.data;
    }

    /**
     * Writes the whole document to a sibling temp file, then renames it over the target
     * so a crash never leaves a half-written document behind.
     */
    async write(document: T): Promise<void> {
        const tempPath = `${this.filePath}.${process.pid}.tmp`;
        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
            await fs.rename(tempPath, this.filePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true }).catch(() => undefined);
            throw new StorageError(`unable to write ${this.filePath}: ${error}`, this.filePath);
        }
    }
}

function isFileNotFound(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
