import type { Lookup } from '../lookup/index.js';
import type { Refreshable, StatusExtractor } from './types.js';

/**
 * Label produced for snapshots without a meaningful status
 */
export const UNKNOWN_STATUS = 'unknown';

/**
 * Build an extractor reading a string property of the snapshot
 */
export function statusFromField<S, K extends keyof S>(field: K): StatusExtractor<S> {
  return (snapshot) => {
    const value = snapshot[field];
    return typeof value === 'string' && value !== '' ? value : UNKNOWN_STATUS;
  };
}

/**
 * Poll `id` through `lookup`, labelling each snapshot with `extract`
 */
export function createRefresh<S>(
  lookup: Lookup<S>,
  extract: StatusExtractor<S>,
  id: string
): Refreshable<S> {
  return async () => {
    const result = await lookup.fetch(id);
    if (!result.found) {
      return { found: false };
    }
    return { found: true, label: extract(result.snapshot), snapshot: result.snapshot };
  };
}
