/**
 * Error thrown when a configuration file cannot be accessed.
 * The importers catch it and report it as a diagnostic instead of letting it reach the caller.
 */
export class FileSystemError extends Error {
    public readonly errorType: 'not_found' | 'not_readable' | 'operation_failed';
    public readonly path: string;
    public readonly operation: string;
    public readonly originalError?: Error;

    constructor(
        errorType: 'not_found' | 'not_readable' | 'operation_failed',
        message: string,
        path: string,
        operation: string,
        originalError?: Error
    ) {
        super(message);
        this.name = 'FileSystemError';
        this.errorType = errorType;
        this.path = path;
        this.operation = operation;
        this.originalError = originalError;
    }

    /**
     * Creates an error for a configuration file that does not exist.
     */
    static fileNotFound(path: string): FileSystemError {
        return new FileSystemError('not_found', 'Configuration file not found', path, 'file_read');
    }

    /**
     * Creates an error for a configuration file that exists but cannot be read.
     */
    static fileNotReadable(path: string): FileSystemError {
        return new FileSystemError('not_readable', 'Configuration file exists but is not readable', path, 'file_read');
    }

    /**
     * Creates an error for a failed file system operation.
     */
    static operationFailed(operation: string, path: string, originalError: Error): FileSystemError {
        const message = `Failed to ${operation}: ${originalError.message || 'Unknown error'}`;
        return new FileSystemError('operation_failed', message, path, operation, originalError);
    }
}
