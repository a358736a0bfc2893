import { DEFAULT_LOGGER, DEFAULT_OPTIONS } from './constants';
import { importAllRequired, importMany, importOne } from './import';
import type { DefaultOptions, Logger, Options, Vetconf } from './types';
import { DefaultOptionsSchema, validateArgument } from './validate';

export * from './types';
export { ArgumentError, FileSystemError } from './validate';
export { importAllRequired, importMany, importOne } from './import';
export { createLineMatcher, escapePattern } from './matcher';
export type { LineMatcher } from './matcher';
export { DEFAULT_LOGGER, DEFAULT_OPTIONS, DEFAULT_SEPARATOR } from './constants';

/**
 * Creates a new vetconf instance for importing values from untrusted configuration files.
 *
 * The instance binds a logger and default options (separator, encoding, name handling)
 * to the three import operations:
 * - `importOne`: the last valid definition of one variable
 * - `importMany`: the variables of a set that are defined, silently omitting the others
 * - `importAllRequired`: every variable of a set, or a failure
 *
 * Diagnostics (unreadable file, redefinition, missing required variable) are sent to
 * `logger.warn`; they never throw.
 *
 * @param pOptions - Options for the instance
 * @param pOptions.defaults - Default separator (`'='`), encoding (`'utf8'`) and `allowNamePatterns` (`false`)
 * @param pOptions.logger - Custom logger implementation (optional, defaults to console logger)
 * @returns A vetconf instance
 * @throws {ArgumentError} When a default option is invalid
 *
 * @example
 * ```typescript
 * import { create } from 'vetconf';
 *
 * const vetconf = create({ defaults: { separator: ':' }, logger });
 *
 * const user = await vetconf.importOne('/var/run/session.conf', 'USER', '[a-z_][a-z0-9_-]{0,31}');
 * const net = await vetconf.importAllRequired('/etc/net.conf', ['ADDR', 'GW'], '[0-9.]{7,15}', '=');
 * ```
 */
export const create = (pOptions: {
    defaults?: Partial<DefaultOptions>,
    logger?: Logger,
} = {}): Vetconf => {
    const overrides = validateArgument(DefaultOptionsSchema, 'defaults', pOptions.defaults ?? {});

    const options: Options = {
        defaults: {
            separator: overrides.separator ?? DEFAULT_OPTIONS.separator,
            encoding: overrides.encoding ?? DEFAULT_OPTIONS.encoding,
            allowNamePatterns: overrides.allowNamePatterns ?? DEFAULT_OPTIONS.allowNamePatterns,
        },
        logger: pOptions.logger || DEFAULT_LOGGER,
    };

    const setLogger = (pLogger: Logger) => {
        options.logger = pLogger;
    }

    return {
        setLogger,
        importOne: (filePath, name, valuePattern, separator) =>
            importOne(filePath, name, valuePattern, options, separator),
        importMany: (filePath, names, valuePattern, separator) =>
            importMany(filePath, names, valuePattern, options, separator),
        importAllRequired: (filePath, names, valuePattern, separator) =>
            importAllRequired(filePath, names, valuePattern, options, separator),
    }
}
