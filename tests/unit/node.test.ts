import { describe, it, expect } from 'vitest';
import { Node } from '../../src/syntax/node';
import { Token } from '../../src/syntax/token';
import { Tree } from '../../src/syntax/tree';
import { Walker } from '../../src/syntax/walker';
import { Positions } from '../../src/syntax/positions';
import { Text } from '../../src/syntax/text';
import { CalcParser, calcGrammar } from '../utils/calc';
import { thrownBy } from '../utils/throws';

const SOURCE = 'a = 1 + 2;\n// note\nb = (a);\n';

function parse() {
    const root = CalcParser.parse(SOURCE);
    const [first, binary, one, two, second, paren, name] = [...Walker.descendantsNodes(root)];
    return { root, first, binary, one, two, second, paren, name };
}

function word(offset: number) {
    return Token.create(calcGrammar.tokenKind('Identifier'), offset, offset, 1);
}

function number(offset: number) {
    return Token.create(calcGrammar.tokenKind('Number'), offset, offset, 1);
}

function plus(offset: number) {
    return Token.create(calcGrammar.tokenKind('Plus'), offset, offset, 1);
}

describe('Node', () => {
    describe('parent links', () => {
        it('point from every child to the node that holds it', () => {
            const { root, first, binary, one, second, paren, name } = parse();
            expect(root.parent).toBeNull();
            expect(first.parent).toBe(root);
            expect(second.parent).toBe(root);
            expect(binary.parent).toBe(first);
            expect(Node.parent(one)).toBe(binary);
            expect(Node.parent(name)).toBe(paren);
        });

        it('are not part of the enumerable shape', () => {
            const { root, first } = parse();
            expect(Object.keys(first)).not.toContain('parent');
            expect(() => JSON.stringify(root)).not.toThrow();
        });

        it('refuse a child that already has a parent', () => {
            const child = Node.create(calcGrammar.variant('NameExpression'), { name: word(0) });
            Node.create(calcGrammar.variant('ExpressionStatement'), { expression: child });

            const error = thrownBy(() =>
                Node.create(calcGrammar.variant('ExpressionStatement'), { expression: child }),
            );
            expect(Tree.MalformedTreeError.isInstance(error) && error.data).toEqual({
                message: "Child in slot 'expression' is already attached to another parent",
                kind: 'NameExpression',
            });
        });

        it('leave children free when a sibling is rejected', () => {
            const left = Node.create(calcGrammar.variant('NumberLiteral'), { value: number(0) });
            const right = Node.create(calcGrammar.variant('NumberLiteral'), { value: number(4) });
            Node.create(calcGrammar.variant('ExpressionStatement'), { expression: right });

            expect(() =>
                Node.create(calcGrammar.variant('BinaryExpression'), { left, operator: plus(2), right }),
            ).toThrow(Tree.MalformedTreeError);

            const statement = Node.create(calcGrammar.variant('ExpressionStatement'), { expression: left });
            expect(left.parent).toBe(statement);
        });

        it('refuse the same child twice in one node', () => {
            const operand = Node.create(calcGrammar.variant('NumberLiteral'), { value: number(0) });
            const error = thrownBy(() =>
                Node.create(calcGrammar.variant('BinaryExpression'), { left: operand, operator: plus(2), right: operand }),
            );
            expect(Tree.MalformedTreeError.isInstance(error) && error.data).toEqual({
                message: "Child in slot 'right' appears more than once",
                kind: 'BinaryExpression',
            });
            expect(operand.parent).toBeNull();
        });

        it('refuse a token that already belongs to another node', () => {
            const token = plus(2);
            Node.create(calcGrammar.variant('SkippedTokens'), { tokens: [token] });

            const error = thrownBy(() => Node.create(calcGrammar.variant('SkippedTokens'), { tokens: [token] }));
            expect(Tree.MalformedTreeError.isInstance(error) && error.data).toEqual({
                message: "Token in slot 'tokens' already belongs to another node",
                kind: 'SkippedTokens',
            });
        });

        it('refuse one token in two slots', () => {
            const token = number(0);
            expect(() =>
                Node.create(calcGrammar.variant('BinaryExpression'), {
                    operator: token,
                    right: Node.create(calcGrammar.variant('NumberLiteral'), { value: token }),
                }),
            ).toThrow(Tree.MalformedTreeError);
        });

        it('leave tokens free when their node is rejected', () => {
            const token = plus(2);
            expect(() => Node.create(calcGrammar.variant('SkippedTokens'), { tokens: [token, token] })).toThrow(
                Tree.MalformedTreeError,
            );
            expect(() => Node.create(calcGrammar.variant('SkippedTokens'), { tokens: [token] })).not.toThrow();
        });

        it('refuse a source file as a child', () => {
            const { root } = parse();
            expect(() => Node.create(calcGrammar.variant('ExpressionStatement'), { expression: root })).toThrow(
                Tree.MalformedTreeError,
            );
        });
    });

    describe('create', () => {
        it('fills omitted slots with null or an empty list', () => {
            const statement = Node.create(calcGrammar.variant('ExpressionStatement'));
            expect(statement.children).toEqual({ expression: null, semicolon: null });

            const skipped = Node.create(calcGrammar.variant('SkippedTokens'));
            expect(skipped.children['tokens']).toEqual([]);
        });

        it('stores children frozen', () => {
            const skipped = Node.create(calcGrammar.variant('SkippedTokens'), { tokens: [word(0)] });
            expect(Object.isFrozen(skipped.children)).toBe(true);
            expect(Object.isFrozen(skipped.children['tokens'])).toBe(true);
        });

        const invalidCases = [
            {
                label: 'an unknown slot',
                variant: 'NameExpression',
                input: { nmae: word(0) },
                message: "Unknown slot 'nmae'",
            },
            {
                label: 'a list in a single slot',
                variant: 'NameExpression',
                input: { name: [word(0)] },
                message: "Slot 'name' expects a single child",
            },
            {
                label: 'a single child in a list slot',
                variant: 'SkippedTokens',
                input: { tokens: word(0) },
                message: "Slot 'tokens' expects a list",
            },
        ];

        for (const { label, variant, input, message } of invalidCases) {
            it(`rejects ${label}`, () => {
                const error = thrownBy(() => Node.create(calcGrammar.variant(variant), input));
                expect(Tree.MalformedTreeError.isInstance(error) && error.data).toEqual({ message, kind: variant });
            });
        }

        it('rejects values that are neither nodes nor tokens', () => {
            const bogus = JSON.parse('{"tag":"leaf","start":0}');
            expect(() => Node.create(calcGrammar.variant('NameExpression'), { name: bogus })).toThrow(
                Tree.MalformedTreeError,
            );
            expect(() => Node.create(calcGrammar.variant('SkippedTokens'), { tokens: [bogus] })).toThrow(
                Tree.MalformedTreeError,
            );
        });

        it('rejects the source file variant', () => {
            expect(() => Node.create(calcGrammar.sourceFile, {})).toThrow(Tree.MalformedTreeError);
        });
    });

    describe('createSourceFile', () => {
        it('holds the buffer and the end-of-file token', () => {
            const { root } = parse();
            expect(root.source).toBe(SOURCE);
            expect(root.endOfFileToken).toEqual({ tag: 'token', kind: 0, fullStart: 27, start: 28, length: 1 });
            expect(Node.isSourceFile(root)).toBe(true);
        });

        it('requires an end-of-file token', () => {
            const error = thrownBy(() => Node.createSourceFile(calcGrammar, '', { statements: [] }));
            expect(Tree.MalformedTreeError.isInstance(error) && error.data.message).toBe(
                'Source file has no end-of-file token',
            );
        });

        it('requires the end-of-file kind in the end-of-file slot', () => {
            expect(() => Node.createSourceFile(calcGrammar, 'x', { endOfFileToken: word(0) })).toThrow(
                Tree.MalformedTreeError,
            );
        });
    });

    describe('root', () => {
        it('resolves the source file from any depth', () => {
            const { root, name, one } = parse();
            expect(Node.root(name)).toBe(root);
            expect(Node.root(one)).toBe(root);
            expect(Node.root(root)).toBe(root);
        });

        it('fails for a node outside any source file', () => {
            const inner = Node.create(calcGrammar.variant('NameExpression'), { name: word(0) });
            Node.create(calcGrammar.variant('ExpressionStatement'), { expression: inner });

            const error = thrownBy(() => Node.root(inner));
            expect(Tree.DetachedNodeError.isInstance(error) && error.data).toEqual({ kind: 'NameExpression' });
            expect(() => Text.text(inner)).toThrow(Tree.DetachedNodeError);
            expect(() => Positions.endPosition(inner)).toThrow(Tree.DetachedNodeError);
        });
    });

    describe('ancestor', () => {
        it('finds the nearest ancestor of a kind', () => {
            const { root, second, name } = parse();
            expect(Node.ancestor(name, calcGrammar.variant('AssignmentStatement').kind)).toBe(second);
            expect(Node.ancestor(name, calcGrammar.sourceFile.kind)).toBe(root);
        });

        it('returns null when no ancestor matches', () => {
            const { root, name } = parse();
            expect(Node.ancestor(name, calcGrammar.variant('SkippedTokens').kind)).toBeNull();
            expect(Node.ancestor(root, calcGrammar.sourceFile.kind)).toBeNull();
        });
    });

    describe('inspection', () => {
        it('lists slots in declaration order', () => {
            const { first, binary } = parse();
            expect(Node.entries(first).map(([slot]) => slot)).toEqual(['name', 'equals', 'value', 'semicolon']);
            expect(Node.entries(first)[2][1]).toBe(binary);
        });

        it('reads single and list slots', () => {
            const { root, first, binary } = parse();
            expect(Node.child(first, 'value')).toBe(binary);
            expect(Node.child(root, 'endOfFileToken')).toBe(root.endOfFileToken);
            expect(Node.list(root, 'statements')).toHaveLength(2);
            expect(Node.child(Node.create(calcGrammar.variant('ExpressionStatement')), 'semicolon')).toBeNull();
        });

        it('rejects slot reads of the wrong arity', () => {
            const { root, first } = parse();
            expect(() => Node.child(root, 'statements')).toThrow(Tree.MalformedTreeError);
            expect(() => Node.list(first, 'name')).toThrow(Tree.MalformedTreeError);

            const error = thrownBy(() => Node.child(first, 'target'));
            expect(Tree.MalformedTreeError.isInstance(error) && error.data).toEqual({
                message: "Unknown slot 'target'",
                kind: 'AssignmentStatement',
            });
        });

        it('names the kind', () => {
            const { paren } = parse();
            expect(Node.kindName(paren)).toBe('ParenthesizedExpression');
        });

        it('tells nodes from tokens', () => {
            const { root, name } = parse();
            expect(Node.isNode(name)).toBe(true);
            expect(Node.isNode(root.endOfFileToken)).toBe(false);
            expect(Node.isElement(root.endOfFileToken)).toBe(true);
            expect(Node.isElement({ kind: 1 })).toBe(false);
            expect(Node.isSourceFile(name)).toBe(false);
        });
    });
});
