import { describe, expect, it } from 'vitest';
import { createRefresh, statusFromField, UNKNOWN_STATUS, type Lookup } from '../../src/core.js';

interface Snapshot {
  status?: string;
  size: number;
}

describe('status extraction', () => {
  const extract = statusFromField<Snapshot, 'status'>('status');

  it('reads the status field', () => {
    expect(extract({ status: 'available', size: 1 })).toBe('available');
  });

  it('labels a missing or empty status as unknown', () => {
    expect(extract({ size: 1 })).toBe(UNKNOWN_STATUS);
    expect(extract({ status: '', size: 1 })).toBe(UNKNOWN_STATUS);
  });

  it('labels a non-string field as unknown', () => {
    const bySize = statusFromField<Snapshot, 'size'>('size');
    expect(bySize({ size: 3 })).toBe('unknown');
  });
});

describe('createRefresh', () => {
  function lookupOf(snapshot: Snapshot | undefined): Lookup<Snapshot> {
    return {
      resourceKind: 'Widget',
      fetch: async () =>
        snapshot ? { found: true, snapshot } : { found: false, reason: 'empty-result' },
    };
  }

  it('labels found snapshots', async () => {
    const snapshot = { status: 'creating', size: 2 };
    const refresh = createRefresh(lookupOf(snapshot), (s) => s.status ?? UNKNOWN_STATUS, 'w1');

    await expect(refresh()).resolves.toEqual({ found: true, label: 'creating', snapshot });
  });

  it('passes absence through without a label', async () => {
    const refresh = createRefresh(lookupOf(undefined), () => 'never', 'w1');

    await expect(refresh()).resolves.toEqual({ found: false });
  });
});
