import type { IdentifierCodec } from '../identifier/index.js';
import type { AbsenceSignatures } from './absence.js';

export type LookupResult<S> =
  | { found: true; snapshot: S }
  | {
      found: false;
      /**
       * `not-found`: the control plane reported the object or its parent missing.
       * `empty-result`: the query succeeded but matched nothing.
       */
      reason: 'not-found' | 'empty-result';
    };

/**
 * Fetches the current representation of a remote object
 */
export interface Lookup<S> {
  readonly resourceKind: string;
  fetch(id: string): Promise<LookupResult<S>>;
}

export interface LookupOptions<S> {
  resourceKind: string;
  codec: IdentifierCodec;
  /**
   * Single remote query for the decoded key parts. May return any number of
   * records; only the first is used.
   */
  describe(parts: readonly string[]): Promise<readonly S[]>;
  absence: AbsenceSignatures;
}
