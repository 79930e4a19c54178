import type { SyntaxTypes } from './types';
import { Node } from './node';
import { Token } from './token';
import { Walker } from './walker';

type SyntaxNode = SyntaxTypes.Node;

/**
 * Text of a node, read from the buffer held by its source file.
 */
export namespace Text {
    /**
     * Significant text: the first token without its leading trivia, every
     * later token in full.
     */
    export function text(node: SyntaxNode): string {
        const source = Node.root(node).source;
        let result = '';
        let first = true;
        for (const token of Walker.descendantsTokens(node)) {
            result += first ? Token.text(token, source) : Token.fullText(token, source);
            first = false;
        }
        return result;
    }

    export function fullText(node: SyntaxNode): string {
        const source = Node.root(node).source;
        let result = '';
        for (const token of Walker.descendantsTokens(node)) {
            result += Token.fullText(token, source);
        }
        return result;
    }

    /** Leading trivia of the first token; empty for a node without tokens. */
    export function leadingTriviaText(node: SyntaxNode): string {
        const first = Walker.descendantsTokens(node).next();
        return first.done ? '' : Token.leadingTrivia(first.value, Node.root(node).source);
    }
}
