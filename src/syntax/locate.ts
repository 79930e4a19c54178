import type { SyntaxTypes } from './types';
import { Positions } from './positions';
import { Token } from './token';
import { Walker } from './walker';

type SyntaxNode = SyntaxTypes.Node;

/**
 * Offset to node lookups. Both are linear scans over the subtree.
 */
export namespace Locate {
    /**
     * Innermost descendant of `root` whose `[fullStart, endPosition)` span
     * contains `offset`, or `null`. `root` itself is never returned.
     *
     * Descendants are listed in pre-order and scanned from the back, so among
     * matches the most deeply nested, latest one wins.
     */
    export function nodeAt(root: SyntaxNode, offset: number): SyntaxNode | null {
        const descendants = [...Walker.descendantsNodes(root)];
        for (let i = descendants.length - 1; i >= 0; i--) {
            const node = descendants[i];
            if (offset >= Positions.fullStart(node) && offset < Positions.endPosition(node)) {
                return node;
            }
        }
        return null;
    }

    /**
     * The token whose `[fullStart, end)` range, leading trivia included,
     * contains `offset`, or `null`.
     */
    export function tokenAt(root: SyntaxNode, offset: number): SyntaxTypes.Token | null {
        for (const token of Walker.descendantsTokens(root)) {
            if (offset >= token.fullStart && offset < Token.end(token)) {
                return token;
            }
        }
        return null;
    }
}
