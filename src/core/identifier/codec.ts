/**
 * External identifier codec
 *
 * A remote object is tracked locally by one string built from its remote key
 * parts, e.g. `my-cluster:my-endpoint`. The textual form is persisted by
 * callers, so encode and decode must round-trip exactly.
 */

import { MalformedIdentifierError } from '../errors.js';

export const DEFAULT_IDENTIFIER_SEPARATOR = ':';

export interface IdentifierCodecOptions {
  /**
   * Names of the key parts in order, e.g. `['CLUSTER-ID', 'CLUSTER-ENDPOINT-ID']`.
   * Their count is the arity of the identifier.
   */
  parts: readonly string[];
  separator?: string;
}

export interface IdentifierCodec {
  readonly arity: number;
  readonly separator: string;
  /**
   * Human-readable format, e.g. `CLUSTER-ID:CLUSTER-ENDPOINT-ID`
   */
  readonly format: string;

  /**
   * Join key parts into an identifier.
   *
   * Precondition: no part contains the separator. This is not checked.
   */
  encode(parts: readonly string[]): string;

  /**
   * Split an identifier into exactly `arity` non-empty parts.
   *
   * @throws MalformedIdentifierError
   */
  decode(id: string): string[];
}

export function createIdentifierCodec(options: IdentifierCodecOptions): IdentifierCodec {
  const separator = options.separator ?? DEFAULT_IDENTIFIER_SEPARATOR;
  const arity = options.parts.length;
  const format = options.parts.join(separator);

  if (arity === 0) {
    throw new Error('An identifier needs at least one part');
  }
  if (separator === '') {
    throw new Error('Identifier separator must not be empty');
  }

  return {
    arity,
    separator,
    format,

    encode(parts: readonly string[]): string {
      const id = parts.join(separator);
      if (parts.length !== arity) {
        throw new MalformedIdentifierError(id, format);
      }
      return id;
    },

    decode(id: string): string[] {
      const parts = id.split(separator);

      if (parts.length === arity && parts.every((part) => part !== '')) {
        return parts;
      }

      throw new MalformedIdentifierError(id, format);
    },
  };
}
