import { promises as fsPromises } from 'fs';
import path from 'path';
import { StoreData } from './types';
import { validateStoreFile } from './schemas';
import { storeLogger } from './logger';

export type StoreFileErrorKind = 'read' | 'parse' | 'write';

/**
 * Raised by the snapshot file layer; `cause` carries the underlying error
 */
export class StoreFileError extends Error {
    public readonly kind: StoreFileErrorKind;
    public readonly filePath: string;

    constructor(kind: StoreFileErrorKind, filePath: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Could not ${kind === 'write' ? 'save' : 'load'} data from ${filePath}: ${detail}`, { cause });
        this.name = 'StoreFileError';
        this.kind = kind;
        this.filePath = filePath;
    }
}

/**
 * Serializes the whole mapping as 2-space indented JSON; non-ASCII is written as-is
 */
export function serializeStore(data: StoreData): string {
    return JSON.stringify(data, null, 2);
}

/**
 * Decodes and validates store file content
 * @throws {SyntaxError} on malformed JSON
 * @throws {StoreValidationError} on an unexpected shape
 */
export function parseStore(content: string): StoreData {
    return validateStoreFile(JSON.parse(content));
}

/**
 * Reads the snapshot file. A missing file is an empty mapping.
 * @throws {StoreFileError} when the file exists but cannot be read or decoded
 */
export async function readStoreFile(filePath: string, encoding: BufferEncoding = 'utf-8'): Promise<StoreData> {
    let content: string;
    try {
        content = await fsPromises.readFile(filePath, encoding);
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
            storeLogger.debug({ filePath }, 'No data file yet, starting empty');
            return {};
        }
        throw new StoreFileError('read', filePath, error);
    }

    try {
        return parseStore(content);
    } catch (error) {
        throw new StoreFileError('parse', filePath, error);
    }
}

/**
 * Writes the whole mapping through a temp file and rename, so readers never see a partial file
 * @throws {StoreFileError} if the write fails; the temp file is removed
 */
export async function writeStoreFile(
    filePath: string,
    data: StoreData,
    encoding: BufferEncoding = 'utf-8'
): Promise<void> {
    const tempPath = path.join(
        path.dirname(filePath),
        `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
    );

    try {
        await fsPromises.writeFile(tempPath, serializeStore(data), encoding);
        await fsPromises.rename(tempPath, filePath);
    } catch (error) {
        await fsPromises.rm(tempPath, { force: true });
        throw new StoreFileError('write', filePath, error);
    }
}
