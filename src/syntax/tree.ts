import z from 'zod';
import { NamedError } from '../utils/error';
import { Log } from '../utils/log';

/**
 * Invariant violations of a built tree. These mean the tree handed over by
 * the parser is corrupted; they are never source diagnostics.
 */
export namespace Tree {
    export const MalformedTreeError = NamedError.create(
        'TreeMalformedError',
        z.object({
            message: z.string(),
            kind: z.string().optional(),
        }),
    );

    export const DetachedNodeError = NamedError.create(
        'TreeDetachedNodeError',
        z.object({
            kind: z.string(),
        }),
    );

    export type InvariantError = InstanceType<typeof MalformedTreeError | typeof DetachedNodeError>;

    const log = Log.create({ service: 'tree' });

    /**
     * Build a MalformedTreeError and log it. Callers throw the result.
     */
    export function malformed(message: string, kind?: string): InstanceType<typeof MalformedTreeError> {
        const error = new MalformedTreeError({ message, kind });
        log.error('Tree invariant violated', { error });
        return error;
    }

    export function detached(kind: string): InstanceType<typeof DetachedNodeError> {
        const error = new DetachedNodeError({ kind });
        log.error('Node is not attached to a source file', { error });
        return error;
    }
}
