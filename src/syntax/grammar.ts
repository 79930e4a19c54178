import z from 'zod';
import { NamedError } from '../utils/error';
import { Log } from '../utils/log';
import { Kinds } from './kinds';
import type { SyntaxTypes } from './types';

/**
 * A grammar is the static descriptor table the tree is built against: the
 * token kinds, and for every node kind the ordered layout of its child slots.
 *
 * ```ts
 * const grammar = Grammar.define({
 *     tokens: ['EndOfFile', 'Identifier', 'Semicolon'],
 *     nodes: {
 *         SourceFile: { statements: 'many', endOfFileToken: 'one' },
 *         ExpressionStatement: { expression: 'one', semicolon: 'one' },
 *     },
 *     sourceFile: 'SourceFile',
 *     endOfFile: 'EndOfFile',
 * });
 * ```
 */
export namespace Grammar {
    // ─── Errors ────────────────────────────────────────────────────────────────

    export const UnknownKindError = NamedError.create(
        'GrammarUnknownKindError',
        z.object({
            kind: z.union([z.string(), z.number()]),
            registry: z.enum(['node', 'token']),
        }),
    );

    export const InvalidDefinitionError = NamedError.create(
        'GrammarInvalidDefinitionError',
        z.object({
            message: z.string(),
            issues: z.array(z.string()).optional(),
        }),
    );

    // ─── Types ─────────────────────────────────────────────────────────────────

    /** Slot every source-file layout must declare for the end-of-file token. */
    export const END_OF_FILE_SLOT = 'endOfFileToken';

    export interface Definition {
        readonly tokens: readonly string[];
        readonly nodes: Readonly<Record<string, SyntaxTypes.Layout>>;
        readonly sourceFile: string;
        readonly endOfFile: string;
    }

    export interface Grammar {
        readonly tokenKinds: Kinds.Registry;
        readonly nodeKinds: Kinds.Registry;
        readonly sourceFile: SyntaxTypes.Variant;
        readonly endOfFileKind: number;
        variant(name: string): SyntaxTypes.Variant;
        variantOf(kind: number): SyntaxTypes.Variant;
        tokenKind(name: string): number;
        variants(): readonly SyntaxTypes.Variant[];
    }

    const SLOT_NAME = /^[A-Za-z_$][\w$]*$/;

    const DefinitionSchema = z.object({
        tokens: z.array(z.string().min(1)),
        nodes: z.record(z.string().min(1), z.record(z.string().regex(SLOT_NAME), z.enum(['one', 'many']))),
        sourceFile: z.string().min(1),
        endOfFile: z.string().min(1),
    });

    const log = Log.create({ service: 'grammar' });

    function invalid(message: string): InstanceType<typeof InvalidDefinitionError> {
        return new InvalidDefinitionError({ message });
    }

    /**
     * Build the registries and one frozen descriptor per node variant.
     */
    export function define(definition: Definition): Grammar {
        const tokenKinds = Kinds.create(definition.tokens);
        const nodeKinds = Kinds.create(Object.keys(definition.nodes));

        const variants: SyntaxTypes.Variant[] = [];
        const byName = new Map<string, SyntaxTypes.Variant>();

        for (const [kind, [name, layout]] of Object.entries(definition.nodes).entries()) {
            for (const slot of Object.keys(layout)) {
                if (!SLOT_NAME.test(slot)) {
                    throw invalid(`Slot '${slot}' of ${name} is not an identifier`);
                }
                if (slot === 'parent') {
                    throw invalid(`Slot name 'parent' of ${name} is reserved for the back-reference`);
                }
            }

            const variant: SyntaxTypes.Variant = Object.freeze({
                kind,
                name,
                layout: Object.freeze({ ...layout }),
                isSourceFile: name === definition.sourceFile,
            });
            variants.push(variant);
            byName.set(name, variant);
        }

        const sourceFile = byName.get(definition.sourceFile);
        if (!sourceFile) {
            throw invalid(`Source file variant '${definition.sourceFile}' is not declared`);
        }
        if (sourceFile.layout[END_OF_FILE_SLOT] !== 'one') {
            throw invalid(`${sourceFile.name} must declare '${END_OF_FILE_SLOT}' as a single slot`);
        }

        const endOfFileKind = tokenKinds.idOf(definition.endOfFile);
        if (endOfFileKind === undefined) {
            throw invalid(`End-of-file token '${definition.endOfFile}' is not declared`);
        }

        log.info('Defined', { nodeKinds: nodeKinds.size, tokenKinds: tokenKinds.size });

        const frozen = Object.freeze([...variants]);

        return Object.freeze({
            tokenKinds,
            nodeKinds,
            sourceFile,
            endOfFileKind,
            variant(name: string): SyntaxTypes.Variant {
                const variant = byName.get(name);
                if (!variant) {
                    throw new UnknownKindError({ kind: name, registry: 'node' });
                }
                return variant;
            },
            variantOf(kind: number): SyntaxTypes.Variant {
                const variant = frozen[kind];
                if (!variant) {
                    throw new UnknownKindError({ kind, registry: 'node' });
                }
                return variant;
            },
            tokenKind(name: string): number {
                const id = tokenKinds.idOf(name);
                if (id === undefined) {
                    throw new UnknownKindError({ kind: name, registry: 'token' });
                }
                return id;
            },
            variants: () => frozen,
        });
    }

    /**
     * Validate an untyped definition (e.g. parsed JSON) and define it.
     */
    export function load(input: unknown): Grammar {
        const result = DefinitionSchema.safeParse(input);
        if (!result.success) {
            throw new InvalidDefinitionError({
                message: 'Grammar definition does not match the expected shape',
                issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
            });
        }
        return define(result.data);
    }
}
