/**
 * Error thrown when an import operation receives an invalid argument:
 * an empty name or separator, an empty name list, or a pattern that does not compile.
 */
export class ArgumentError extends Error {
    constructor(
        public readonly argument: string,
        message: string
    ) {
        super(message);
        this.name = 'ArgumentError';
    }
}
