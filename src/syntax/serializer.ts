import type { SyntaxTypes } from './types';
import type { Grammar } from './grammar';
import { Config } from '../config';
import { Node } from './node';
import { Token } from './token';

/**
 * Structural rendering of nodes and tokens for interchange and debugging.
 * The source buffer is never read.
 *
 * Node:  `{ "<NodeKind>": { "<slot>": child | child[] | null } }`
 * Token: `{ "kind", "fullStart", "start", "length" }` or `{ "kind", "textLength" }`
 */
export namespace Serializer {
    export interface Options {
        /** Defaults to `Config.get().tokenFormat`. */
        tokenFormat?: Config.TokenFormat;
    }

    export interface FullToken {
        kind: string;
        fullStart: number;
        start: number;
        length: number;
    }

    export interface CompactToken {
        kind: string;
        textLength: number;
    }

    export type SerializedToken = FullToken | CompactToken;

    export type SerializedSlot = Serialized | Serialized[] | null;

    export interface SerializedSlots {
        [slot: string]: SerializedSlot;
    }

    export interface SerializedNode {
        [kind: string]: SerializedSlots;
    }

    export type Serialized = SerializedNode | SerializedToken;

    function tokenKindName(grammar: Grammar.Grammar, kind: number): string {
        return grammar.tokenKinds.nameOf(kind) ?? String(kind);
    }

    function token(value: SyntaxTypes.Token, grammar: Grammar.Grammar, format: Config.TokenFormat): SerializedToken {
        const kind = tokenKindName(grammar, value.kind);
        if (format === 'compact') {
            return { kind, textLength: Token.width(value) };
        }
        return { kind, fullStart: value.fullStart, start: value.start, length: value.length };
    }

    function element(value: SyntaxTypes.Element, grammar: Grammar.Grammar, format: Config.TokenFormat): Serialized {
        if (!Node.isNode(value)) {
            return token(value, grammar, format);
        }

        const slots: SerializedSlots = {};
        for (const [name, slot] of Node.entries(value)) {
            if (slot === null) {
                slots[name] = null;
            } else if (Node.isElement(slot)) {
                slots[name] = element(slot, grammar, format);
            } else {
                slots[name] = slot.map((child) => element(child, grammar, format));
            }
        }
        return { [Node.kindName(value)]: slots };
    }

    export function serialize(value: SyntaxTypes.Token, grammar: Grammar.Grammar, options?: Options): SerializedToken;
    export function serialize(value: SyntaxTypes.Node, grammar: Grammar.Grammar, options?: Options): SerializedNode;
    export function serialize(value: SyntaxTypes.Element, grammar: Grammar.Grammar, options?: Options): Serialized;
    export function serialize(value: SyntaxTypes.Element, grammar: Grammar.Grammar, options: Options = {}): Serialized {
        return element(value, grammar, options.tokenFormat ?? Config.get().tokenFormat);
    }

    /** `serialize` as indented JSON text. */
    export function stringify(value: SyntaxTypes.Element, grammar: Grammar.Grammar, options?: Options): string {
        return JSON.stringify(serialize(value, grammar, options), null, 2);
    }
}
