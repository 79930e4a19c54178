import type { SyntaxTypes } from './types';
import { Node } from './node';
import { Token } from './token';
import { Tree } from './tree';
import { Walker } from './walker';

type SyntaxNode = SyntaxTypes.Node;
type Element = SyntaxTypes.Element;

/**
 * Positions derived from the leaf tokens. Interior nodes store no spans;
 * everything here is recomputed from children on demand.
 */
export namespace Positions {
    function firstChild(node: SyntaxNode): Element {
        const first = Walker.childrenNodesAndTokens(node).next();
        if (first.done) {
            throw Tree.malformed('Node has no children to take a position from', node.variant.name);
        }
        return first.value;
    }

    /** Offset of the first token, leading trivia included. */
    export function fullStart(node: SyntaxNode): number {
        const child = firstChild(node);
        return Node.isNode(child) ? fullStart(child) : child.fullStart;
    }

    /** Offset of the first token's significant text. */
    export function start(node: SyntaxNode): number {
        const child = firstChild(node);
        return Node.isNode(child) ? start(child) : child.start;
    }

    /**
     * Trimmed width: the first child counts without its leading trivia, every
     * later child with it.
     */
    export function width(element: Element): number {
        if (!Node.isNode(element)) {
            return Token.width(element);
        }

        let total = 0;
        let first = true;
        for (const child of Walker.childrenNodesAndTokens(element)) {
            total += first ? width(child) : fullWidth(child);
            first = false;
        }
        return total;
    }

    export function fullWidth(element: Element): number {
        if (!Node.isNode(element)) {
            return Token.fullWidth(element);
        }

        let total = 0;
        for (const child of Walker.childrenNodesAndTokens(element)) {
            total += fullWidth(child);
        }
        return total;
    }

    /**
     * End of the node's last token (trimmed end and full end coincide, since
     * trivia only ever leads).
     */
    export function end(node: SyntaxNode): number {
        return fullStart(node) + fullWidth(node);
    }

    export function firstToken(node: SyntaxNode): SyntaxTypes.Token | null {
        const first = Walker.descendantsTokens(node).next();
        return first.done ? null : first.value;
    }

    /**
     * Full start of the next Node sibling, or of the end-of-file token when the
     * node is its parent's last Node child. For the root, the end of the
     * end-of-file token.
     *
     * Tokens that follow the node inside its parent are not sibling
     * boundaries: the span runs on to the next node or the end of the file.
     */
    export function endPosition(node: SyntaxNode): number {
        const parent = node.parent;
        if (parent) {
            const siblings = Walker.childrenNodes(parent);
            for (let current = siblings.next(); !current.done; current = siblings.next()) {
                if (current.value !== node) {
                    continue;
                }
                const next = siblings.next();
                return next.done ? Node.root(node).endOfFileToken.fullStart : fullStart(next.value);
            }
            throw Tree.malformed('Node is not among the children of its parent', node.variant.name);
        }

        if (Node.isSourceFile(node)) {
            return Token.end(node.endOfFileToken);
        }

        throw Tree.detached(node.variant.name);
    }
}
