import * as fs from 'node:fs';

/**
 * File access used by the read layer.
 */
export interface Utility {
    exists: (path: string) => Promise<boolean>;
    isFile: (path: string) => Promise<boolean>;
    isFileReadable: (path: string) => Promise<boolean>;
    readFile: (path: string, encoding: BufferEncoding) => Promise<string>;
}

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => { });

    const exists = async (path: string): Promise<boolean> => {
        try {
            await fs.promises.stat(path);
            return true;
        } catch (error: unknown) {
            log(`Failed to stat ${path}: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }

    const isFile = async (path: string): Promise<boolean> => {
        const stats = await fs.promises.stat(path);
        if (!stats.isFile()) {
            log(`${path} is not a file`);
            return false;
        }
        return true;
    }

    const isFileReadable = async (path: string): Promise<boolean> => {
        try {
            await fs.promises.access(path, fs.constants.R_OK);
            return true;
        } catch (error: unknown) {
            log(`${path} is not readable: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }

    const readFile = async (path: string, encoding: BufferEncoding): Promise<string> => {
        return await fs.promises.readFile(path, { encoding });
    }

    return {
        exists,
        isFile,
        isFileReadable,
        readFile,
    };
}
