import { FileSystemError } from './error/FileSystemError';
import type { Options } from './types';
import * as Storage from './util/storage';

/**
 * Splits file content into lines. Only '\n' separates lines; a '\r' left by
 * CRLF endings stays on the line and is absorbed by the trailing whitespace rule.
 */
export const splitLines = (content: string): string[] => {
    if (content === '') {
        return [];
    }
    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

/**
 * Reads a configuration file fully and returns its lines.
 *
 * The file is opened, drained and released before this resolves; nothing is cached.
 *
 * @param filePath - Path of the configuration file
 * @param options - Options supplying the encoding and logger
 * @returns The file's lines in order
 * @throws {FileSystemError} When the file is missing, not a regular file, or cannot be read
 */
export const readLines = async (filePath: string, options: Options): Promise<string[]> => {
    const logger = options.logger;
    const storage = Storage.create({ log: logger.debug });

    if (!await storage.exists(filePath)) {
        throw FileSystemError.fileNotFound(filePath);
    }

    let content: string;
    try {
        if (!await storage.isFile(filePath)) {
            throw new FileSystemError('not_readable', 'Configuration path is not a regular file', filePath, 'file_read');
        }
        if (!await storage.isFileReadable(filePath)) {
            throw FileSystemError.fileNotReadable(filePath);
        }
        content = await storage.readFile(filePath, options.defaults.encoding);
    } catch (error: unknown) {
        if (error instanceof FileSystemError) {
            throw error;
        }
        throw FileSystemError.operationFailed('read configuration file', filePath, error instanceof Error ? error : new Error(String(error)));
    }

    const lines = splitLines(content);
    logger.verbose(`Read ${lines.length} line(s) from ${filePath}`);
    return lines;
}
