import type { DefaultOptions, Logger } from "./types";

/** Default separator between a variable name and its value */
export const DEFAULT_SEPARATOR = '=';

/** Default file encoding for reading configuration files */
export const DEFAULT_ENCODING: BufferEncoding = 'utf8';

/**
 * Accepted remainder of a line after the value: optional whitespace,
 * then an optional '#' comment running to the end of the line.
 * The comment body stops only at a newline, so a trailing carriage return is consumed.
 */
export const LINE_TRAILER = '\\s*(?:#[^\\n]*)?';

/**
 * Default options applied when creating a vetconf instance.
 */
export const DEFAULT_OPTIONS: DefaultOptions = {
    separator: DEFAULT_SEPARATOR,
    encoding: DEFAULT_ENCODING,
    allowNamePatterns: false,
}

/**
 * Default logger implementation using console methods.
 * The verbose and silly methods are no-ops to avoid excessive output.
 */
export const DEFAULT_LOGGER: Logger = {
    // eslint-disable-next-line no-console
    debug: console.debug,
    // eslint-disable-next-line no-console
    info: console.info,
    // eslint-disable-next-line no-console
    warn: console.warn,
    // eslint-disable-next-line no-console
    error: console.error,

    verbose: () => { },

    silly: () => { },
}
