import { describe, expect, it } from 'vitest';
import { FileSystemError } from '../../src/error/FileSystemError';

describe('FileSystemError', () => {
    it('should create a FileSystemError with correct properties', () => {
        const originalError = new Error('Original error');
        const error = new FileSystemError('not_found', 'File not found', '/test/path', 'read', originalError);

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('FileSystemError');
        expect(error.message).toBe('File not found');
        expect(error.errorType).toBe('not_found');
        expect(error.path).toBe('/test/path');
        expect(error.operation).toBe('read');
        expect(error.originalError).toBe(originalError);
    });

    it('should create a file not found error using static method', () => {
        const error = FileSystemError.fileNotFound('/etc/app.conf');

        expect(error.errorType).toBe('not_found');
        expect(error.message).toBe('Configuration file not found');
        expect(error.path).toBe('/etc/app.conf');
        expect(error.operation).toBe('file_read');
    });

    it('should create a file not readable error using static method', () => {
        const error = FileSystemError.fileNotReadable('/etc/shadow.conf');

        expect(error.errorType).toBe('not_readable');
        expect(error.message).toBe('Configuration file exists but is not readable');
        expect(error.path).toBe('/etc/shadow.conf');
        expect(error.operation).toBe('file_read');
    });

    it('should create an operation failed error using static method', () => {
        const originalError = new Error('EISDIR: illegal operation on a directory');
        const error = FileSystemError.operationFailed('read configuration file', '/etc', originalError);

        expect(error.errorType).toBe('operation_failed');
        expect(error.message).toBe('Failed to read configuration file: EISDIR: illegal operation on a directory');
        expect(error.path).toBe('/etc');
        expect(error.operation).toBe('read configuration file');
        expect(error.originalError).toBe(originalError);
    });

    it('should create an operation failed error with default fallback message', () => {
        const error = FileSystemError.operationFailed('read', '/src', new Error());

        expect(error.message).toBe('Failed to read: Unknown error');
    });

    it('should work without optional parameters', () => {
        const error = new FileSystemError('not_found', 'Simple error', '/path', 'operation');

        expect(error.originalError).toBeUndefined();
    });
});
