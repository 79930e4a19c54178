import { describe, it, expect } from 'vitest';
import { Text } from '../../src/syntax/text';
import { Token } from '../../src/syntax/token';
import { Walker } from '../../src/syntax/walker';
import { CalcParser } from '../utils/calc';

describe('Text', () => {
    const sources = [
        'a = 1 + 2;\n// note\nb = (a);\n',
        '',
        '   \n// only trivia\n',
        'x = $ 1;;\n',
        '((1 + 2) * 3',
        'total = price * (1 + rate) - discount; // trailing\n',
    ];

    for (const source of sources) {
        it(`round-trips ${JSON.stringify(source)}`, () => {
            const root = CalcParser.parse(source);
            expect(Text.fullText(root)).toBe(source);

            const fromTokens = [...Walker.descendantsTokens(root)]
                .map((token) => Token.fullText(token, source))
                .join('');
            expect(fromTokens).toBe(source);
        });
    }

    it('returns the significant text of nested nodes', () => {
        const source = 'a = 1 + 2;\n// note\nb = (a);\n';
        const root = CalcParser.parse(source);
        const [first, binary, , , second, paren] = [...Walker.descendantsNodes(root)];

        expect(Text.text(first)).toBe('a = 1 + 2;');
        expect(Text.text(binary)).toBe('1 + 2');
        expect(Text.fullText(binary)).toBe(' 1 + 2');
        expect(Text.text(second)).toBe('b = (a);');
        expect(Text.leadingTriviaText(second)).toBe('\n// note\n');
        expect(Text.fullText(paren)).toBe(' (a)');
    });

    it('keeps skipped input in the tree', () => {
        const source = 'x = $ 1;;\n';
        const root = CalcParser.parse(source);
        const statements = [...Walker.childrenNodes(root)].map((node) => Text.text(node));
        expect(statements).toEqual(['x =', '$', '1;', ';']);
    });

    it('gives the source file text without its leading trivia', () => {
        const root = CalcParser.parse('\n\n  answer = 42;\n');
        expect(Text.leadingTriviaText(root)).toBe('\n\n  ');
        expect(Text.text(root)).toBe('answer = 42;\n');
    });
});
