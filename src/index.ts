/**
 * Lossless syntax tree for tolerant parsers.
 *
 * A parser builds the tree bottom-up with `Node.create` and
 * `Node.createSourceFile`; everything else reads it.
 */

export type { SyntaxTypes } from './syntax/types';
export { Token } from './syntax/token';
export { Kinds } from './syntax/kinds';
export { ChildSchema } from './syntax/schema';
export { Grammar } from './syntax/grammar';
export { Node } from './syntax/node';
export { Walker } from './syntax/walker';
export { Positions } from './syntax/positions';
export { Text } from './syntax/text';
export { Locate } from './syntax/locate';
export { Serializer } from './syntax/serializer';
export { Ranges } from './syntax/ranges';
export { Tree } from './syntax/tree';
export { Config } from './config';
export { Log } from './utils/log';
export { NamedError } from './utils/error';
export { FormatError, FormatErrorForLog, ErrorToObject } from './utils/format-error';
