import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileSystemError } from '../src/error/FileSystemError';
import { readLines, splitLines } from '../src/read';
import { DEFAULT_OPTIONS } from '../src/constants';
import type { Options } from '../src/types';

describe('read', () => {
    describe('splitLines', () => {
        it('should return no lines for empty content', () => {
            expect(splitLines('')).toEqual([]);
        });

        it('should drop the empty entry after a final newline', () => {
            expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
            expect(splitLines('a\nb')).toEqual(['a', 'b']);
        });

        it('should keep blank lines inside the content', () => {
            expect(splitLines('a\n\nb\n\n')).toEqual(['a', '', 'b', '']);
            expect(splitLines('\n')).toEqual(['']);
        });

        it('should split on newline only', () => {
            expect(splitLines('a\r\nb\r\n')).toEqual(['a\r', 'b\r']);
        });
    });

    describe('readLines', () => {
        let tempDir: string;
        let options: Options;

        beforeEach(async () => {
            tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'vetconf-read-test-'));
            options = {
                defaults: { ...DEFAULT_OPTIONS },
                logger: {
                    debug: vi.fn(),
                    info: vi.fn(),
                    warn: vi.fn(),
                    error: vi.fn(),
                    verbose: vi.fn(),
                    silly: vi.fn(),
                },
            };
        });

        afterEach(async () => {
            await fs.promises.rm(tempDir, { recursive: true, force: true });
        });

        it('should return the lines of the file', async () => {
            const file = path.join(tempDir, 'app.conf');
            await fs.promises.writeFile(file, 'A=1\n# note\nB=2\n');

            const lines = await readLines(file, options);

            expect(lines).toEqual(['A=1', '# note', 'B=2']);
            expect(options.logger.verbose).toHaveBeenCalledWith(`Read 3 line(s) from ${file}`);
        });

        it('should throw a not_found FileSystemError for a missing file', async () => {
            const file = path.join(tempDir, 'missing.conf');

            const error = await readLines(file, options).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(FileSystemError);
            expect(error).toMatchObject({
                errorType: 'not_found',
                message: 'Configuration file not found',
                path: file,
                operation: 'file_read',
            });
        });

        it('should throw a not_readable FileSystemError for a directory', async () => {
            const error = await readLines(tempDir, options).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(FileSystemError);
            expect(error).toMatchObject({
                errorType: 'not_readable',
                message: 'Configuration path is not a regular file',
                path: tempDir,
            });
        });
    });
});
