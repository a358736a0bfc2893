import { z } from "zod";
import { ArgumentError, FileSystemError } from "./error";
export { ArgumentError, FileSystemError };

/**
 * Checks whether a string compiles as a regular expression source.
 */
export const isCompilablePattern = (source: string): boolean => {
    try {
        new RegExp(source);
        return true;
    } catch {
        return false;
    }
}

/** Schema for a regular expression source string. */
export const PatternSchema = z.string({ invalid_type_error: 'Pattern must be a string' })
    .refine(isCompilablePattern, { message: 'Pattern is not a valid regular expression' });

/** Schema for a variable name; an empty name would match any line prefix. */
export const NameSchema = z.string({ invalid_type_error: 'Variable name must be a string' })
    .min(1, 'Variable name cannot be empty');

/** Schema for a separator; matched literally. */
export const SeparatorSchema = z.string({ invalid_type_error: 'Separator must be a string' })
    .min(1, 'Separator cannot be empty');

/** Schema for the list of names given to the multi-variable importers. */
export const NamesSchema = z.array(NameSchema, { invalid_type_error: 'Variable names must be an array' })
    .min(1, 'At least one variable name is required');

/** Schema for the options accepted by `create()`. */
export const DefaultOptionsSchema = z.object({
    separator: SeparatorSchema,
    encoding: z.string().refine(Buffer.isEncoding, { message: 'Unsupported file encoding' }),
    allowNamePatterns: z.boolean(),
}).strict().partial();

/**
 * Parses `value` with `schema`, throwing an ArgumentError that names `argument`
 * and carries the first validation message.
 *
 * @throws {ArgumentError} When the value does not satisfy the schema
 *
 * @example
 * ```typescript
 * const separator = validateArgument(SeparatorSchema, 'separator', ':');
 * validateArgument(SeparatorSchema, 'separator', '');
 * // Throws: ArgumentError('separator', 'Separator cannot be empty')
 * ```
 */
export const validateArgument = <S extends z.ZodTypeAny>(schema: S, argument: string, value: unknown): z.output<S> => {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue?.path.length ? ` (at ${issue.path.join('.')})` : '';
        throw new ArgumentError(argument, `${issue?.message ?? 'Invalid value'}${path}`);
    }
    return result.data;
}
