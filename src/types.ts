/**
 * Default options applied to every import operation.
 * Operations that take an explicit separator argument override `separator` for that call.
 */
export interface DefaultOptions {
    /** Literal string expected between a variable name and its value (e.g., '=') */
    separator: string;
    /** File encoding used when reading configuration files (e.g., 'utf8', 'latin1') */
    encoding: BufferEncoding;
    /**
     * When true, variable names are spliced into the line pattern unescaped, so a name may
     * carry regular expression syntax. Names are matched literally otherwise.
     */
    allowNamePatterns: boolean;
}

/**
 * Complete options object passed to the import functions.
 */
export interface Options {
    /** Default import options */
    defaults: DefaultOptions;
    /** Logger receiving diagnostics and tracing */
    logger: Logger;
}

/**
 * Logger interface for vetconf's diagnostics.
 * Compatible with popular logging libraries like Winston, Bunyan, etc.
 */
export interface Logger {
    /** Debug-level logging for detailed troubleshooting information */
    debug: (message: string, ...args: unknown[]) => void;
    /** Info-level logging for general information */
    info: (message: string, ...args: unknown[]) => void;
    /** Warning-level logging; every import diagnostic is sent here */
    warn: (message: string, ...args: unknown[]) => void;
    /** Error-level logging for critical problems */
    error: (message: string, ...args: unknown[]) => void;
    /** Verbose-level logging for extensive detail */
    verbose: (message: string, ...args: unknown[]) => void;
    /** Silly-level logging for maximum detail */
    silly: (message: string, ...args: unknown[]) => void;
}

/**
 * A single variable to look for: `name` and `separator` are literal text,
 * `valuePattern` is the source of a regular expression the value must satisfy.
 */
export interface VariableSpec {
    name: string;
    separator: string;
    valuePattern: string;
}

/**
 * Result of importing a single variable.
 * `found: false` covers both "no matching line" and "file could not be read".
 */
export type ImportResult =
    | { found: true; value: string }
    | { found: false };

/**
 * Result of importing several variables without a completeness check.
 * `values` holds only the names that matched at least once.
 */
export type ImportManyResult<N extends string = string> =
    | { ok: true; values: Map<N, string> }
    | { ok: false; reason: 'unreadable' };

/**
 * Result of importing several variables that must all be present.
 * A failure never carries values read from the file.
 */
export type ImportAllResult<N extends string = string> =
    | { ok: true; values: Map<N, string> }
    | { ok: false; reason: 'unreadable' }
    | { ok: false; reason: 'incomplete'; missing: N[] };

/**
 * Main vetconf interface, bound to one set of options.
 */
export interface Vetconf {
    /** Sets a custom logger for diagnostics */
    setLogger: (logger: Logger) => void;
    /** Imports the last valid definition of `name` from `filePath`. */
    importOne: (filePath: string, name: string, valuePattern: string, separator?: string) => Promise<ImportResult>;
    /** Imports every name in `names` found in `filePath`, omitting the others. */
    importMany: <N extends string>(filePath: string, names: readonly N[], valuePattern: string, separator?: string) => Promise<ImportManyResult<N>>;
    /** Imports every name in `names`, failing unless all of them are found. */
    importAllRequired: <N extends string>(filePath: string, names: readonly N[], valuePattern: string, separator?: string) => Promise<ImportAllResult<N>>;
}
