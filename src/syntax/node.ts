import type { SyntaxTypes } from './types';
import type { Grammar } from './grammar';
import { ChildSchema } from './schema';
import { Token } from './token';
import { Tree } from './tree';

type SyntaxNode = SyntaxTypes.Node;
type Element = SyntaxTypes.Element;
type Slot = SyntaxTypes.Slot;

/*
 * Parent links and cached roots live outside the nodes: they are navigation
 * only, never ownership, and keep serialized or logged nodes acyclic.
 */
const parents = new WeakMap<SyntaxNode, SyntaxNode>();
const roots = new WeakMap<SyntaxNode, SyntaxTypes.SourceFile>();
const ownedTokens = new WeakSet<SyntaxTypes.Token>();

class TreeNode implements SyntaxTypes.Node {
    readonly tag = 'node';
    readonly kind: number;

    constructor(
        readonly variant: SyntaxTypes.Variant,
        readonly children: Readonly<Record<string, Slot>>,
    ) {
        this.kind = variant.kind;
    }

    get parent(): SyntaxNode | null {
        return parents.get(this) ?? null;
    }
}

class SourceFileNode extends TreeNode implements SyntaxTypes.SourceFile {
    constructor(
        variant: SyntaxTypes.Variant,
        children: Readonly<Record<string, Slot>>,
        readonly source: string,
        readonly endOfFileToken: SyntaxTypes.Token,
    ) {
        super(variant, children);
    }
}

export namespace Node {
    /** Input accepted for a slot; omitted slots default to absent / empty. */
    export type SlotInput = Element | readonly Element[] | null | undefined;

    export type ChildrenInput = Readonly<Record<string, SlotInput>>;

    export function isNode(value: unknown): value is SyntaxNode {
        return value instanceof TreeNode;
    }

    export function isSourceFile(value: unknown): value is SyntaxTypes.SourceFile {
        return value instanceof SourceFileNode;
    }

    export function isElement(value: unknown): value is Element {
        return isNode(value) || Token.isToken(value);
    }

    function isList(slot: SlotInput): slot is readonly Element[] {
        return Array.isArray(slot);
    }

    function normalize(variant: SyntaxTypes.Variant, input: ChildrenInput): Record<string, Slot> {
        for (const name of Object.keys(input)) {
            if (ChildSchema.arity(variant, name) === undefined) {
                throw Tree.malformed(`Unknown slot '${name}'`, variant.name);
            }
        }

        const children: Record<string, Slot> = {};
        for (const name of ChildSchema.slotNames(variant)) {
            const value = input[name];

            if (variant.layout[name] === 'many') {
                if (value === undefined || value === null) {
                    children[name] = Object.freeze([]);
                    continue;
                }
                if (!isList(value)) {
                    throw Tree.malformed(`Slot '${name}' expects a list`, variant.name);
                }
                for (const entry of value) {
                    if (!isElement(entry)) {
                        throw Tree.malformed(`List slot '${name}' holds a value that is neither Node nor Token`, variant.name);
                    }
                }
                children[name] = Object.freeze([...value]);
                continue;
            }

            if (value === undefined || value === null) {
                children[name] = null;
                continue;
            }
            if (isList(value)) {
                throw Tree.malformed(`Slot '${name}' expects a single child`, variant.name);
            }
            if (!isElement(value)) {
                throw Tree.malformed(`Slot '${name}' holds a value that is neither Node nor Token`, variant.name);
            }
            children[name] = value;
        }

        return children;
    }

    /**
     * Every child is checked before any link is written, so a rejected node
     * leaves its children free for another parent.
     */
    function attach(node: SyntaxNode): void {
        const seen = new Set<Element>();

        for (const [name, slot] of entries(node)) {
            const elements = isList(slot) ? slot : slot === null ? [] : [slot];
            for (const child of elements) {
                if (seen.has(child)) {
                    throw Tree.malformed(`Child in slot '${name}' appears more than once`, node.variant.name);
                }
                seen.add(child);

                if (!isNode(child)) {
                    if (ownedTokens.has(child)) {
                        throw Tree.malformed(`Token in slot '${name}' already belongs to another node`, node.variant.name);
                    }
                    continue;
                }
                if (isSourceFile(child)) {
                    throw Tree.malformed(`A source file cannot be a child (slot '${name}')`, node.variant.name);
                }
                if (parents.has(child)) {
                    throw Tree.malformed(`Child in slot '${name}' is already attached to another parent`, child.variant.name);
                }
            }
        }

        for (const child of seen) {
            if (isNode(child)) {
                parents.set(child, node);
            } else {
                ownedTokens.add(child);
            }
        }
    }

    /**
     * Create a node from already-built children and attach their parent
     * links. Called bottom-up by the parser, children in source order.
     */
    export function create(variant: SyntaxTypes.Variant, input: ChildrenInput = {}): SyntaxNode {
        if (variant.isSourceFile) {
            throw Tree.malformed('Source files are created with Node.createSourceFile', variant.name);
        }
        const node = new TreeNode(variant, Object.freeze(normalize(variant, input)));
        attach(node);
        return node;
    }

    /**
     * Create the root. The end-of-file token must sit in the
     * `endOfFileToken` slot; every descendant records this root so buffer
     * lookups do not walk the parent chain.
     */
    export function createSourceFile(
        grammar: Grammar.Grammar,
        source: string,
        input: ChildrenInput,
    ): SyntaxTypes.SourceFile {
        const variant = grammar.sourceFile;
        const children = Object.freeze(normalize(variant, input));

        const endOfFileToken = children['endOfFileToken'];
        if (!Token.isToken(endOfFileToken) || endOfFileToken.kind !== grammar.endOfFileKind) {
            throw Tree.malformed('Source file has no end-of-file token', variant.name);
        }

        const root = new SourceFileNode(variant, children, source, endOfFileToken);
        attach(root);

        const stack: SyntaxNode[] = [root];
        for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
            roots.set(node, root);
            for (const [, slot] of entries(node)) {
                const elements = isList(slot) ? slot : slot === null ? [] : [slot];
                for (const child of elements) {
                    if (isNode(child)) {
                        stack.push(child);
                    }
                }
            }
        }

        return root;
    }

    export function parent(node: SyntaxNode): SyntaxNode | null {
        return parents.get(node) ?? null;
    }

    /**
     * The source file this node belongs to.
     * @throws Tree.DetachedNodeError when the topmost ancestor is not a source file.
     */
    export function root(node: SyntaxNode): SyntaxTypes.SourceFile {
        const cached = roots.get(node);
        if (cached) {
            return cached;
        }

        let current = node;
        for (let next = parents.get(current); next !== undefined; next = parents.get(current)) {
            current = next;
        }
        if (!isSourceFile(current)) {
            throw Tree.detached(node.variant.name);
        }
        return current;
    }

    /**
     * Nearest ancestor of the given kind, or `null` when there is none.
     */
    export function ancestor(node: SyntaxNode, kind: number): SyntaxNode | null {
        for (let current = parents.get(node); current !== undefined; current = parents.get(current)) {
            if (current.kind === kind) {
                return current;
            }
        }
        return null;
    }

    export function kindName(node: SyntaxNode): string {
        return node.variant.name;
    }

    /** Value of a single-child slot. */
    export function child(node: SyntaxNode, slot: string): Element | null {
        const arity = ChildSchema.arity(node.variant, slot);
        if (arity === undefined) {
            throw Tree.malformed(`Unknown slot '${slot}'`, node.variant.name);
        }
        const value = node.children[slot] ?? null;
        if (arity === 'many' || isList(value)) {
            throw Tree.malformed(`Slot '${slot}' is a list`, node.variant.name);
        }
        return value;
    }

    /** Entries of a list slot. */
    export function list(node: SyntaxNode, slot: string): readonly Element[] {
        const arity = ChildSchema.arity(node.variant, slot);
        if (arity === undefined) {
            throw Tree.malformed(`Unknown slot '${slot}'`, node.variant.name);
        }
        const value = node.children[slot] ?? null;
        if (arity === 'one' || !isList(value)) {
            throw Tree.malformed(`Slot '${slot}' holds a single child`, node.variant.name);
        }
        return value;
    }

    /**
     * Every slot of the node with its value, in declaration order.
     */
    export function entries(node: SyntaxNode): Array<[string, Slot]> {
        return ChildSchema.slotNames(node.variant).map((name): [string, Slot] => [name, node.children[name] ?? null]);
    }
}
