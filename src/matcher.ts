import { LINE_TRAILER } from './constants';
import { ArgumentError } from './error/ArgumentError';
import type { VariableSpec } from './types';
import { NameSchema, PatternSchema, SeparatorSchema, validateArgument } from './validate';

/**
 * Per-line rule for one variable.
 */
export interface LineMatcher {
    /** Variable name this matcher captures */
    readonly name: string;
    /** Anchored expression applied to each line */
    readonly pattern: RegExp;
    /** Returns the captured value when the whole line is a valid assignment, undefined otherwise. */
    match: (line: string) => string | undefined;
}

/**
 * Escapes regular expression metacharacters so `text` matches itself literally.
 *
 * @example
 * ```typescript
 * escapePattern('a.b'); // 'a\\.b'
 * ```
 */
export const escapePattern = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Reports whether a pattern source contains a numbered backreference such as `\1`.
 * Character classes are skipped, since `\1` inside one is not a reference.
 */
export const hasNumberedBackreference = (source: string): boolean => {
    let inClass = false;
    for (let index = 0; index < source.length; index++) {
        const char = source[index];
        if (char === '\\') {
            if (!inClass && /[1-9]/.test(source.charAt(index + 1))) {
                return true;
            }
            index++;
        } else if (char === '[') {
            inClass = true;
        } else if (char === ']') {
            inClass = false;
        }
    }
    return false;
}

const compile = (argument: string, message: string, source: string): RegExp => {
    try {
        return new RegExp(source);
    } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ArgumentError(argument, `${message}: ${reason}`);
    }
}

/**
 * Builds the line rule `^name<separator>value<trailer>$` for one variable.
 *
 * The line must be consumed entirely: after the value only whitespace and an optional
 * `#` comment may follow. The separator is always literal. The name is literal unless
 * `allowNamePatterns` is set, in which case it is used as regular expression syntax.
 *
 * The value pattern is spliced without a capture group around it, so its own numbered
 * backreferences keep their meaning. A name pattern needs a group to locate where the value
 * starts, so in that mode a value pattern with numbered backreferences is rejected.
 *
 * @param spec - Variable name, separator and value pattern source
 * @param allowNamePatterns - Splice the name unescaped
 * @returns A matcher for single lines
 * @throws {ArgumentError} When the name, separator or pattern is empty or does not compile
 *
 * @example
 * ```typescript
 * const matcher = createLineMatcher({ name: 'PORT', separator: '=', valuePattern: '\\d+' });
 * matcher.match('PORT=8080  # http');  // '8080'
 * matcher.match('PORT=8080; rm -rf'); // undefined
 * ```
 */
export const createLineMatcher = (spec: VariableSpec, allowNamePatterns = false): LineMatcher => {
    const name = validateArgument(NameSchema, 'name', spec.name);
    const separator = validateArgument(SeparatorSchema, 'separator', spec.separator);
    const valuePattern = validateArgument(PatternSchema, 'valuePattern', spec.valuePattern);
    const valueSource = `(?:${valuePattern})(?=${LINE_TRAILER}$)`;

    if (!allowNamePatterns) {
        const prefix = name + separator;
        const pattern = new RegExp(`^${escapePattern(prefix)}${valueSource}`);
        return {
            name,
            pattern,
            match: (line: string): string | undefined => {
                const result = pattern.exec(line);
                return result ? result[0].slice(prefix.length) : undefined;
            },
        };
    }

    compile('name', 'Variable name is not a valid pattern', `(?:${name})`);
    if (hasNumberedBackreference(valuePattern)) {
        throw new ArgumentError('valuePattern', 'Numbered backreferences are not supported together with name patterns');
    }
    // Group 1 spans name and separator; its length is where the value starts.
    const pattern = compile(
        'name',
        'Variable name pattern conflicts with the value pattern',
        `^((?:${name})${escapePattern(separator)})${valueSource}`,
    );
    return {
        name,
        pattern,
        match: (line: string): string | undefined => {
            const result = pattern.exec(line);
            return result ? result[0].slice(result[1].length) : undefined;
        },
    };
}
