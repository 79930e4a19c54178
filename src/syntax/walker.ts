import type { SyntaxTypes } from './types';
import { ChildSchema } from './schema';
import { Node } from './node';
import { Token } from './token';
import { Tree } from './tree';

type SyntaxNode = SyntaxTypes.Node;
type Element = SyntaxTypes.Element;

/**
 * Lazy document-order traversal.
 *
 * Every function returns a fresh iterator over the (immutable) tree, so
 * traversals are independent of each other and can be abandoned at any time.
 * Descendant walks keep an explicit stack of child cursors instead of nested
 * generators.
 */
export namespace Walker {
    type Accept<T extends Element> = (element: Element) => element is T;

    const acceptAll = (_element: Element): _element is Element => true;

    /** Pulls the next direct child of one node; `undefined` once exhausted. */
    type Cursor = () => Element | undefined;

    function isList(slot: SyntaxTypes.Slot): slot is readonly Element[] {
        return Array.isArray(slot);
    }

    function checked(node: SyntaxNode, slot: string, value: unknown): Element {
        if (!Node.isNode(value) && !Token.isToken(value)) {
            throw Tree.malformed(`Slot '${slot}' holds a value that is neither Node nor Token`, node.variant.name);
        }
        return value;
    }

    function cursor(node: SyntaxNode): Cursor {
        const names = ChildSchema.slotNames(node.variant);
        let slotIndex = 0;
        let listIndex = 0;

        return () => {
            while (slotIndex < names.length) {
                const name = names[slotIndex];
                const value = node.children[name] ?? null;

                if (isList(value)) {
                    while (listIndex < value.length) {
                        const entry = value[listIndex++];
                        if (entry !== null && entry !== undefined) {
                            return checked(node, name, entry);
                        }
                    }
                    slotIndex++;
                    listIndex = 0;
                    continue;
                }

                slotIndex++;
                if (value !== null) {
                    return checked(node, name, value);
                }
            }
            return undefined;
        };
    }

    function children<T extends Element>(node: SyntaxNode, accept: Accept<T>): IterableIterator<T> {
        const next = cursor(node);

        const iterator: IterableIterator<T> = {
            next(): IteratorResult<T> {
                for (let element = next(); element !== undefined; element = next()) {
                    if (accept(element)) {
                        return { done: false, value: element };
                    }
                }
                return { done: true, value: undefined };
            },
            [Symbol.iterator]() {
                return iterator;
            },
        };
        return iterator;
    }

    function descendants<T extends Element>(
        node: SyntaxNode,
        accept: Accept<T>,
        shouldDescend?: SyntaxTypes.DescendPredicate,
    ): IterableIterator<T> {
        const stack: Cursor[] = [cursor(node)];
        // A yielded node is entered on the following pull, after the consumer has seen it.
        let pending: SyntaxNode | null = null;

        function enter(child: SyntaxNode): void {
            if (!shouldDescend || shouldDescend(child)) {
                stack.push(cursor(child));
            }
        }

        const iterator: IterableIterator<T> = {
            next(): IteratorResult<T> {
                if (pending) {
                    const child = pending;
                    pending = null;
                    enter(child);
                }

                while (stack.length > 0) {
                    const element = stack[stack.length - 1]();
                    if (element === undefined) {
                        stack.pop();
                        continue;
                    }

                    if (Node.isNode(element)) {
                        if (accept(element)) {
                            pending = element;
                            return { done: false, value: element };
                        }
                        enter(element);
                        continue;
                    }

                    if (accept(element)) {
                        return { done: false, value: element };
                    }
                }
                return { done: true, value: undefined };
            },
            [Symbol.iterator]() {
                return iterator;
            },
        };
        return iterator;
    }

    /**
     * Direct children in slot order, list slots flattened in place.
     */
    export function childrenNodesAndTokens(node: SyntaxNode): IterableIterator<Element> {
        return children(node, acceptAll);
    }

    export function childrenNodes(node: SyntaxNode): IterableIterator<SyntaxNode> {
        return children(node, Node.isNode);
    }

    export function childrenTokens(node: SyntaxNode): IterableIterator<SyntaxTypes.Token> {
        return children(node, Token.isToken);
    }

    /**
     * Pre-order walk below `node` (the node itself is not yielded).
     *
     * `shouldDescend` runs once per visited node; returning `false` skips that
     * node's whole subtree, tokens included.
     */
    export function descendantsNodesAndTokens(
        node: SyntaxNode,
        shouldDescend?: SyntaxTypes.DescendPredicate,
    ): IterableIterator<Element> {
        return descendants(node, acceptAll, shouldDescend);
    }

    export function descendantsNodes(
        node: SyntaxNode,
        shouldDescend?: SyntaxTypes.DescendPredicate,
    ): IterableIterator<SyntaxNode> {
        return descendants(node, Node.isNode, shouldDescend);
    }

    export function descendantsTokens(
        node: SyntaxNode,
        shouldDescend?: SyntaxTypes.DescendPredicate,
    ): IterableIterator<SyntaxTypes.Token> {
        return descendants(node, Token.isToken, shouldDescend);
    }
}
