import z from 'zod';

/**
 * Base class for typed, named errors whose payload is described by a Zod schema.
 *
 * Usage:
 * ```ts
 * const DetachedNodeError = NamedError.create('DetachedNodeError', z.object({ kind: z.string() }))
 * throw new DetachedNodeError({ kind: 'ExpressionStatement' })
 *
 * // Type guard
 * if (DetachedNodeError.isInstance(e)) {
 *   console.log(e.data.kind)
 * }
 *
 * // Serialize
 * const obj = error.toObject() // { name: "DetachedNodeError", data: { kind: "ExpressionStatement" } }
 * ```
 */
export abstract class NamedError extends Error {
    abstract schema(): z.core.$ZodType;
    abstract toObject(): { name: string; data: unknown };

    /**
     * Create a new named error class with typed data.
     */
    static create<Name extends string, Data extends z.core.$ZodType>(name: Name, data: Data) {
        const schema = z.object({
            name: z.literal(name),
            data,
        });

        const result = class extends NamedError {
            public static readonly Schema = schema;

            public override readonly name: Name = name;

            constructor(
                public readonly data: z.input<Data>,
                options?: ErrorOptions,
            ) {
                super(name, options);
                this.name = name;
            }

            static isInstance(input: unknown): input is InstanceType<typeof result> {
                return typeof input === 'object' && input !== null && 'name' in input && input.name === name;
            }

            schema() {
                return schema;
            }

            toObject() {
                return {
                    name: name,
                    data: this.data,
                };
            }
        };

        Object.defineProperty(result, 'name', { value: name });
        return result;
    }

    /**
     * Fallback for errors that did not originate in this package.
     */
    public static readonly Unknown = NamedError.create(
        'UnknownError',
        z.object({
            message: z.string(),
        }),
    );

    /**
     * Wrap an unknown value into a NamedError.Unknown if it's not already a NamedError.
     */
    static wrap(error: unknown): NamedError {
        if (error instanceof NamedError) {
            return error;
        }
        if (error instanceof Error) {
            return new NamedError.Unknown({ message: error.message }, { cause: error });
        }
        return new NamedError.Unknown({ message: String(error) });
    }
}
