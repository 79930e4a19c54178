import { NamedError } from './error';
import { Tree } from '../syntax/tree';
import { Grammar } from '../syntax/grammar';
import { Kinds } from '../syntax/kinds';
import { Config } from '../config';

/**
 * Format an error for user-facing display.
 * Returns a human-readable message for known errors, or undefined for unknown errors.
 *
 * Tree invariant violations are reported as internal errors, never as
 * problems in the user's source.
 *
 * Usage:
 * ```ts
 * const formatted = FormatError(err)
 * if (formatted) {
 *   console.error(formatted)
 * } else {
 *   console.error(`Unexpected error: ${err}`)
 * }
 * ```
 */
export function FormatError(input: unknown): string | undefined {
    if (Tree.MalformedTreeError.isInstance(input)) {
        const where = input.data.kind ? ` in ${input.data.kind}` : '';
        return `Internal error, tree corrupted${where}: ${input.data.message}`;
    }

    if (Tree.DetachedNodeError.isInstance(input)) {
        return `Internal error, tree corrupted: ${input.data.kind} is not attached to a source file`;
    }

    if (Grammar.UnknownKindError.isInstance(input)) {
        return `Unknown ${input.data.registry} kind '${input.data.kind}'`;
    }

    if (Grammar.InvalidDefinitionError.isInstance(input)) {
        const issues = input.data.issues?.length ? ` (${input.data.issues.join('; ')})` : '';
        return `Invalid grammar definition: ${input.data.message}${issues}`;
    }

    if (Kinds.InvalidRegistryError.isInstance(input)) {
        return `Invalid kind registry: ${input.data.message}`;
    }

    if (Config.InvalidSettingsError.isInstance(input)) {
        return `Invalid settings: ${input.data.issues.join('; ')}`;
    }

    if (NamedError.Unknown.isInstance(input)) {
        return input.data.message;
    }

    return undefined;
}

/**
 * Format an error for logging (includes more detail than user-facing).
 * Always returns a string. Walks the cause chain for full context.
 */
export function FormatErrorForLog(input: unknown): string {
    const formatted = FormatError(input);
    if (formatted) return formatted;

    if (input instanceof Error) {
        const parts = [input.stack || input.message];
        if (input.cause) {
            parts.push(`Caused by: ${FormatErrorForLog(input.cause)}`);
        }
        return parts.join('\n');
    }

    return String(input);
}

/**
 * Convert an error to a structured object for logging.
 * Uses toObject() for NamedErrors, extracts useful info from regular Errors.
 */
export function ErrorToObject(input: unknown): Record<string, unknown> {
    if (input instanceof NamedError) {
        return input.toObject();
    }

    if (input instanceof Error) {
        return {
            name: input.name,
            message: input.message,
            stack: input.stack,
            cause: input.cause ? ErrorToObject(input.cause) : undefined,
        };
    }

    return { message: String(input) };
}
