export { createIdentifierCodec, DEFAULT_IDENTIFIER_SEPARATOR } from './codec.js';
export type { IdentifierCodec, IdentifierCodecOptions } from './codec.js';
