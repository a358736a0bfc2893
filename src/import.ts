import { FileSystemError } from './error/FileSystemError';
import { createLineMatcher } from './matcher';
import { readLines } from './read';
import type { ImportAllResult, ImportManyResult, ImportResult, Options } from './types';
import { NamesSchema, validateArgument } from './validate';

/**
 * Reads the lines of `filePath`, reporting an unreadable file as a warning.
 * Returns undefined when the file could not be read.
 */
const readLinesOrWarn = async (filePath: string, options: Options): Promise<string[] | undefined> => {
    try {
        return await readLines(filePath, options);
    } catch (error: unknown) {
        if (!(error instanceof FileSystemError)) {
            throw error;
        }
        options.logger.warn(`could not open ${filePath} for reading`);
        options.logger.debug(`${error.message}: ${error.path}`);
        return undefined;
    }
}

/**
 * Imports a single variable from an untrusted configuration file.
 *
 * Every line of the file is checked against `^name<separator>(valuePattern)` followed by
 * optional whitespace and an optional `#` comment. Redefinitions override each other, so the
 * last valid definition wins; each override is reported with a warning.
 *
 * @param filePath - Configuration file to read
 * @param name - Variable name expected at the start of the line
 * @param valuePattern - Regular expression source the value must satisfy
 * @param options - Default options and logger
 * @param separator - Literal separator, `options.defaults.separator` when omitted
 * @returns `{ found: true, value }` for the last valid definition, `{ found: false }` when there is
 *          none or the file could not be read
 * @throws {ArgumentError} When the name, separator or pattern is invalid
 *
 * @example
 * ```typescript
 * const result = await importOne('/etc/app.conf', 'PORT', '\\d{1,5}', options);
 * if (result.found) {
 *     listen(Number(result.value));
 * }
 * ```
 */
export const importOne = async (
    filePath: string,
    name: string,
    valuePattern: string,
    options: Options,
    separator: string = options.defaults.separator
): Promise<ImportResult> => {
    const logger = options.logger;
    const matcher = createLineMatcher({ name, separator, valuePattern }, options.defaults.allowNamePatterns);

    const lines = await readLinesOrWarn(filePath, options);
    if (lines === undefined) {
        return { found: false };
    }

    let value: string | undefined;
    for (const line of lines) {
        const captured = matcher.match(line);
        if (captured === undefined) {
            continue;
        }
        if (value !== undefined) {
            logger.warn(`redefinition of ${name}, overriding ${value}`);
        }
        value = captured;
    }

    if (value === undefined) {
        logger.debug(`No valid definition of ${name} in ${filePath}`);
        return { found: false };
    }
    return { found: true, value };
}

/**
 * Imports several variables sharing one separator and one value pattern.
 *
 * The file is scanned once and every line is tested against every name. Redefinitions are
 * handled per name as in {@link importOne}. Names without a valid definition are left out of
 * the result silently.
 *
 * @returns `{ ok: true, values }` with the names that were found, or
 *          `{ ok: false, reason: 'unreadable' }` when the file could not be read
 * @throws {ArgumentError} When `names` is empty or a name, separator or pattern is invalid
 */
export const importMany = async <N extends string>(
    filePath: string,
    names: readonly N[],
    valuePattern: string,
    options: Options,
    separator: string = options.defaults.separator
): Promise<ImportManyResult<N>> => {
    const logger = options.logger;
    validateArgument(NamesSchema, 'names', names);

    const matchers = Array.from(new Set(names)).map(name => ({
        name,
        matcher: createLineMatcher({ name, separator, valuePattern }, options.defaults.allowNamePatterns),
    }));

    const lines = await readLinesOrWarn(filePath, options);
    if (lines === undefined) {
        return { ok: false, reason: 'unreadable' };
    }

    const values = new Map<N, string>();
    for (const line of lines) {
        for (const { name, matcher } of matchers) {
            const captured = matcher.match(line);
            if (captured === undefined) {
                continue;
            }
            const previous = values.get(name);
            if (previous !== undefined) {
                logger.warn(`redefinition of ${name}, overriding ${previous}`);
            }
            values.set(name, captured);
        }
    }

    logger.debug(`Imported ${values.size} of ${matchers.length} variable(s) from ${filePath}`);
    return { ok: true, values };
}

/**
 * Imports several variables that must all be defined.
 *
 * Behaves like {@link importMany}, then warns once for every requested name that has no valid
 * definition. If any is missing the whole import fails and none of the found values are returned.
 *
 * @returns `{ ok: true, values }` holding every requested name, or a failure tagged
 *          `'unreadable'` or `'incomplete'` (with the missing names in request order)
 * @throws {ArgumentError} When `names` is empty or a name, separator or pattern is invalid
 *
 * @example
 * ```typescript
 * const result = await importAllRequired('/etc/net.conf', ['ADDR', 'MASK'], '[\\d.]+', options);
 * if (!result.ok) {
 *     throw new Error('network configuration is incomplete');
 * }
 * const addr = result.values.get('ADDR');
 * ```
 */
export const importAllRequired = async <N extends string>(
    filePath: string,
    names: readonly N[],
    valuePattern: string,
    options: Options,
    separator: string = options.defaults.separator
): Promise<ImportAllResult<N>> => {
    const result = await importMany(filePath, names, valuePattern, options, separator);
    if (!result.ok) {
        return result;
    }

    const missing = Array.from(new Set(names)).filter(name => !result.values.has(name));
    for (const name of missing) {
        options.logger.warn(`failed to import ${name} from ${filePath}`);
    }

    if (missing.length > 0) {
        return { ok: false, reason: 'incomplete', missing };
    }
    return result;
}
