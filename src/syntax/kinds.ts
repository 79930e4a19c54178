import z from 'zod';
import { NamedError } from '../utils/error';

/**
 * Bidirectional id/name tables for token and node kinds.
 *
 * Registries are immutable once created. The grammar builds one for each
 * side; callers only ever read from them.
 */
export namespace Kinds {
    export const InvalidRegistryError = NamedError.create(
        'KindsInvalidRegistryError',
        z.object({
            message: z.string(),
        }),
    );

    export interface Registry {
        readonly size: number;
        nameOf(id: number): string | undefined;
        idOf(name: string): number | undefined;
        entries(): IterableIterator<[number, string]>;
    }

    const RecordSchema = z.record(z.string().min(1), z.number().int().nonnegative());

    function build(pairs: ReadonlyArray<readonly [string, number]>): Registry {
        const byId = new Map<number, string>();
        const byName = new Map<string, number>();

        for (const [name, id] of pairs) {
            if (byName.has(name)) {
                throw new InvalidRegistryError({ message: `Duplicate kind name '${name}'` });
            }
            const existing = byId.get(id);
            if (existing !== undefined) {
                throw new InvalidRegistryError({ message: `Kinds '${existing}' and '${name}' share id ${id}` });
            }
            byId.set(id, name);
            byName.set(name, id);
        }

        return Object.freeze({
            size: byId.size,
            nameOf: (id: number) => byId.get(id),
            idOf: (name: string) => byName.get(name),
            entries: () => byId.entries(),
        });
    }

    /**
     * Registry whose ids are the positions in `names`.
     */
    export function create(names: readonly string[]): Registry {
        return build(names.map((name, id) => [name, id] as const));
    }

    /**
     * Registry from a `{ name: id }` record, e.g. one read from JSON.
     */
    export function fromRecord(input: unknown): Registry {
        const result = RecordSchema.safeParse(input);
        if (!result.success) {
            const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
            throw new InvalidRegistryError({ message: issues.join('; ') });
        }
        return build(Object.entries(result.data));
    }
}
