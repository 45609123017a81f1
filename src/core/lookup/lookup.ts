import { RemoteOperationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { matchesAbsence } from './absence.js';
import type { Lookup, LookupOptions, LookupResult } from './types.js';

const logger = getComponentLogger('lookup');

export function createLookup<S>(options: LookupOptions<S>): Lookup<S> {
  const { resourceKind, codec, describe, absence } = options;

  return {
    resourceKind,

    async fetch(id: string): Promise<LookupResult<S>> {
      const parts = codec.decode(id);

      let records: readonly S[];
      try {
        records = await describe(parts);
      } catch (error) {
        if (matchesAbsence(error, absence.describe)) {
          logger.debug('Remote object not found', { resourceKind, resourceId: id });
          return { found: false, reason: 'not-found' };
        }
        throw new RemoteOperationError({ resourceKind, identifier: id, operation: 'describe' }, error);
      }

      const [first] = records;
      if (first === undefined) {
        logger.debug('Describe returned no records', { resourceKind, resourceId: id });
        return { found: false, reason: 'empty-result' };
      }

      Object.freeze(first);
      return { found: true, snapshot: first };
    },
  };
}
