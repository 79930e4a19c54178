import type { SyntaxTypes } from './types';
import { Log } from '../utils/log';

/**
 * Ordered child slot names per node variant.
 *
 * Walkers, position and text computations all iterate slots in this order,
 * so it must match the order the grammar declared them in (source order).
 */
export namespace ChildSchema {
    const log = Log.create({ service: 'schema' });

    const cache = new WeakMap<SyntaxTypes.Variant, readonly string[]>();

    /**
     * Slot names of `variant`, computed on first request and memoized for the
     * lifetime of the variant descriptor.
     */
    export function slotNames(variant: SyntaxTypes.Variant): readonly string[] {
        const cached = cache.get(variant);
        if (cached) {
            return cached;
        }

        const names = Object.freeze(Object.keys(variant.layout));
        cache.set(variant, names);
        log.debug('Cached slot layout', { variant: variant.name, slots: names.length });
        return names;
    }

    export function arity(variant: SyntaxTypes.Variant, slot: string): SyntaxTypes.Arity | undefined {
        return Object.prototype.hasOwnProperty.call(variant.layout, slot) ? variant.layout[slot] : undefined;
    }
}
