/**
 * Process-wide settings.
 *
 * Held in an Effect `MutableRef`; every change goes through the Zod schema so
 * the stored value is always complete and valid.
 */

import z from 'zod';
import { MutableRef } from 'effect';
import { NamedError } from './utils/error';
import { Log } from './utils/log';

export namespace Config {
    export const TokenFormat = z.enum(['full', 'compact']);
    export type TokenFormat = z.infer<typeof TokenFormat>;

    export const Settings = z.object({
        /** Default token rendering of `Serializer.serialize`. */
        tokenFormat: TokenFormat,
        logLevel: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']),
    });
    export type Settings = z.infer<typeof Settings>;

    export const InvalidSettingsError = NamedError.create(
        'ConfigInvalidSettingsError',
        z.object({
            issues: z.array(z.string()),
        }),
    );

    export const DEFAULTS: Settings = Object.freeze({
        tokenFormat: 'full',
        logLevel: 'INFO',
    });

    const Update = Settings.partial().strict();

    const log = Log.create({ service: 'config' });

    const ref = MutableRef.make<Settings>(DEFAULTS);

    export function get(): Settings {
        return MutableRef.get(ref);
    }

    /**
     * Merge a partial update into the current settings.
     * @throws Config.InvalidSettingsError on unknown keys or invalid values.
     */
    export function update(input: unknown): Settings {
        const result = Update.safeParse(input);
        if (!result.success) {
            throw new InvalidSettingsError({
                issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
            });
        }

        const next: Settings = { ...MutableRef.get(ref), ...stripUndefined(result.data) };
        MutableRef.set(ref, next);
        Log.setLevel(next.logLevel);
        log.info('Settings updated', { settings: next });
        return next;
    }

    export function reset(): void {
        MutableRef.set(ref, DEFAULTS);
        Log.setLevel(DEFAULTS.logLevel);
    }

    function stripUndefined(update: Partial<Settings>): Partial<Settings> {
        const out: Partial<Settings> = {};
        if (update.tokenFormat !== undefined) out.tokenFormat = update.tokenFormat;
        if (update.logLevel !== undefined) out.logLevel = update.logLevel;
        return out;
    }
}
