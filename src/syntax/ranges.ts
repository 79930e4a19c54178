import { TextDocument } from 'vscode-languageserver-textdocument';
import type { Position, Range } from 'vscode-languageserver-textdocument';
import type { SyntaxTypes } from './types';
import { Locate } from './locate';
import { Node } from './node';
import { Positions } from './positions';

type SyntaxNode = SyntaxTypes.Node;

/**
 * Line/character coordinates for editor callers.
 *
 * One `TextDocument` per source file provides the line index; it is created
 * on first use and dropped together with the tree.
 */
export namespace Ranges {
    const documents = new WeakMap<SyntaxTypes.SourceFile, TextDocument>();

    function documentOf(root: SyntaxTypes.SourceFile): TextDocument {
        let document = documents.get(root);
        if (!document) {
            document = TextDocument.create(`untitled:${root.variant.name}`, 'plaintext', 0, root.source);
            documents.set(root, document);
        }
        return document;
    }

    export function positionAt(root: SyntaxTypes.SourceFile, offset: number): Position {
        return documentOf(root).positionAt(offset);
    }

    export function offsetAt(root: SyntaxTypes.SourceFile, position: Position): number {
        return documentOf(root).offsetAt(position);
    }

    /** Span of the node's significant text, `[start, end)`. */
    export function range(node: SyntaxNode): Range {
        const document = documentOf(Node.root(node));
        return {
            start: document.positionAt(Positions.start(node)),
            end: document.positionAt(Positions.end(node)),
        };
    }

    /** Span including the node's leading trivia, `[fullStart, end)`. */
    export function fullRange(node: SyntaxNode): Range {
        const document = documentOf(Node.root(node));
        return {
            start: document.positionAt(Positions.fullStart(node)),
            end: document.positionAt(Positions.end(node)),
        };
    }

    /**
     * `Locate.nodeAt` for a line/character position.
     */
    export function nodeAtPosition(root: SyntaxTypes.SourceFile, position: Position): SyntaxNode | null {
        return Locate.nodeAt(root, offsetAt(root, position));
    }
}
