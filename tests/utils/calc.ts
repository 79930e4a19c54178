/**
 * A small tolerant lexer/parser for an arithmetic statement language.
 *
 * Stands in for the external parser so tests can build real trees from
 * source text:
 *
 *   statement := name '=' expr ';'? | expr ';'? | <any other token, skipped>
 *   expr      := term (('+' | '-') term)*
 *   term      := primary (('*' | '/') primary)*
 *   primary   := number | name | '(' expr ')'?
 *
 * Whitespace and `//` line comments are leading trivia of the next token;
 * whatever trails the last token belongs to the end-of-file token.
 */

import grammarDefinition from '../fixtures/calc-grammar.json';
import { Grammar } from '../../src/syntax/grammar';
import { Node } from '../../src/syntax/node';
import { Token } from '../../src/syntax/token';
import type { SyntaxTypes } from '../../src/syntax/types';

export const calcGrammar = Grammar.load(grammarDefinition);

function kind(name: string): number {
    return calcGrammar.tokenKind(name);
}

export namespace CalcLexer {
    const PUNCTUATION: Record<string, string> = {
        '=': 'Equals',
        '+': 'Plus',
        '-': 'Minus',
        '*': 'Star',
        '/': 'Slash',
        '(': 'OpenParen',
        ')': 'CloseParen',
        ';': 'Semicolon',
    };

    function skipTrivia(source: string, offset: number): number {
        let i = offset;
        while (i < source.length) {
            const ch = source[i];
            if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
                i++;
                continue;
            }
            if (source.startsWith('//', i)) {
                while (i < source.length && source[i] !== '\n') {
                    i++;
                }
                continue;
            }
            break;
        }
        return i;
    }

    export function tokenize(source: string): SyntaxTypes.Token[] {
        const tokens: SyntaxTypes.Token[] = [];
        let offset = 0;

        for (;;) {
            const fullStart = offset;
            const start = skipTrivia(source, offset);
            if (start >= source.length) {
                tokens.push(Token.create(kind('EndOfFile'), fullStart, start, start - fullStart));
                return tokens;
            }

            const ch = source[start];
            let end = start + 1;
            let name: string;
            if (/[A-Za-z_]/.test(ch)) {
                while (end < source.length && /\w/.test(source[end])) end++;
                name = 'Identifier';
            } else if (/[0-9]/.test(ch)) {
                while (end < source.length && /[0-9]/.test(source[end])) end++;
                name = 'Number';
            } else {
                name = PUNCTUATION[ch] ?? 'Unknown';
            }

            tokens.push(Token.create(kind(name), fullStart, start, end - fullStart));
            offset = end;
        }
    }
}

export namespace CalcParser {
    export function parse(source: string): SyntaxTypes.SourceFile {
        const tokens = CalcLexer.tokenize(source);
        let index = 0;

        const peek = (ahead = 0) => tokens[Math.min(index + ahead, tokens.length - 1)];
        const is = (name: string, ahead = 0) => peek(ahead).kind === kind(name);
        const take = () => tokens[Math.min(index++, tokens.length - 1)];
        const optional = (name: string) => (is(name) ? take() : null);
        const node = (name: string, children: Node.ChildrenInput) => Node.create(calcGrammar.variant(name), children);

        function primary(): SyntaxTypes.Node | null {
            if (is('Number')) {
                return node('NumberLiteral', { value: take() });
            }
            if (is('Identifier')) {
                return node('NameExpression', { name: take() });
            }
            if (is('OpenParen')) {
                const openParen = take();
                const expression = additive();
                return node('ParenthesizedExpression', { openParen, expression, closeParen: optional('CloseParen') });
            }
            return null;
        }

        function binary(operand: () => SyntaxTypes.Node | null, operators: string[]): SyntaxTypes.Node | null {
            let left = operand();
            while (left && operators.some((operator) => is(operator))) {
                const operator = take();
                const right = operand();
                left = node('BinaryExpression', { left, operator, right });
            }
            return left;
        }

        function multiplicative(): SyntaxTypes.Node | null {
            return binary(primary, ['Star', 'Slash']);
        }

        function additive(): SyntaxTypes.Node | null {
            return binary(multiplicative, ['Plus', 'Minus']);
        }

        function statement(): SyntaxTypes.Node {
            if (is('Identifier') && is('Equals', 1)) {
                const name = take();
                const equals = take();
                const value = additive();
                return node('AssignmentStatement', { name, equals, value, semicolon: optional('Semicolon') });
            }
            if (is('Identifier') || is('Number') || is('OpenParen')) {
                const expression = additive();
                return node('ExpressionStatement', { expression, semicolon: optional('Semicolon') });
            }
            return node('SkippedTokens', { tokens: [take()] });
        }

        const statements: SyntaxTypes.Node[] = [];
        while (!is('EndOfFile')) {
            statements.push(statement());
        }

        return Node.createSourceFile(calcGrammar, source, { statements, endOfFileToken: take() });
    }
}
