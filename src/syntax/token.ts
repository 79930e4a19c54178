import type { SyntaxTypes } from './types';

type SyntaxToken = SyntaxTypes.Token;

/**
 * Token operations. A token owns no text: every accessor takes the buffer its
 * offsets were computed against.
 */
export namespace Token {
    export function create(kind: number, fullStart: number, start: number, length: number): SyntaxToken {
        const token: SyntaxToken = { tag: 'token', kind, fullStart, start, length };
        return Object.freeze(token);
    }

    export function isToken(value: unknown): value is SyntaxToken {
        return (
            typeof value === 'object' &&
            value !== null &&
            'tag' in value &&
            value.tag === 'token' &&
            'fullStart' in value &&
            typeof value.fullStart === 'number' &&
            'start' in value &&
            typeof value.start === 'number' &&
            'length' in value &&
            typeof value.length === 'number'
        );
    }

    /** Whitespace and comments before the significant text. */
    export function leadingTrivia(token: SyntaxToken, source: string): string {
        return source.slice(token.fullStart, token.start);
    }

    export function text(token: SyntaxToken, source: string): string {
        return source.slice(token.start, end(token));
    }

    export function fullText(token: SyntaxToken, source: string): string {
        return source.slice(token.fullStart, end(token));
    }

    export function end(token: SyntaxToken): number {
        return token.fullStart + token.length;
    }

    export function width(token: SyntaxToken): number {
        return token.length - (token.start - token.fullStart);
    }

    export function fullWidth(token: SyntaxToken): number {
        return token.length;
    }
}
