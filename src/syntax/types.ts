/**
 * Shared types for the syntax tree.
 *
 * Tokens are plain frozen records; nodes are created through `Node.create`
 * and `Node.createSourceFile` so that parent links and the root are recorded
 * at attach time.
 */

export namespace SyntaxTypes {
    /** Whether a child slot holds a single optional child or an ordered list. */
    export type Arity = 'one' | 'many';

    /** Slot name to arity, in declaration (source) order. */
    export type Layout = Readonly<Record<string, Arity>>;

    /**
     * Static descriptor of one node variant. Created once per grammar by
     * `Grammar.define`; every node of that kind shares it.
     */
    export interface Variant {
        readonly kind: number;
        readonly name: string;
        readonly layout: Layout;
        readonly isSourceFile: boolean;
    }

    /**
     * A lexical unit. `[fullStart, start)` is leading trivia and
     * `[start, fullStart + length)` is the significant text.
     */
    export interface Token {
        readonly tag: 'token';
        readonly kind: number;
        readonly fullStart: number;
        readonly start: number;
        readonly length: number;
    }

    export interface Node {
        readonly tag: 'node';
        readonly variant: Variant;
        readonly kind: number;
        readonly children: Readonly<Record<string, Slot>>;
        /** Non-owning back-reference, `null` for the root. */
        readonly parent: Node | null;
    }

    /** The root node; the only one that holds the source buffer. */
    export interface SourceFile extends Node {
        readonly source: string;
        readonly endOfFileToken: Token;
    }

    export type Element = Node | Token;

    export type Slot = Element | readonly Element[] | null;

    /** Decides whether a walker enters the children of a visited node. */
    export type DescendPredicate = (node: Node) => boolean;
}
