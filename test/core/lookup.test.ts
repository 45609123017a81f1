import { describe, expect, it, vi } from 'vitest';
import {
  createIdentifierCodec,
  createLookup,
  MalformedIdentifierError,
  RemoteOperationError,
  type AbsenceSignatures,
} from '../../src/core.js';

interface EndpointRecord {
  name: string;
  status: string;
}

const codec = createIdentifierCodec({ parts: ['CLUSTER-ID', 'CLUSTER-ENDPOINT-ID'] });
const absence: AbsenceSignatures = { describe: [{ statusCode: 404 }] };

function lookupWith(describe: (parts: readonly string[]) => Promise<EndpointRecord[]>) {
  const spy = vi.fn(describe);
  return {
    spy,
    lookup: createLookup<EndpointRecord>({
      resourceKind: 'ClusterEndpoint',
      codec,
      describe: spy,
      absence,
    }),
  };
}

describe('createLookup', () => {
  it('describes the decoded key parts and returns the first record', async () => {
    const first = { name: 'e1', status: 'available' };
    const { lookup, spy } = lookupWith(async () => [first, { name: 'e2', status: 'creating' }]);

    const result = await lookup.fetch('c1:e1');

    expect(spy).toHaveBeenCalledWith(['c1', 'e1']);
    expect(result).toEqual({ found: true, snapshot: first });
  });

  it('returns snapshots that cannot be mutated', async () => {
    const { lookup } = lookupWith(async () => [{ name: 'e1', status: 'available' }]);

    const result = await lookup.fetch('c1:e1');

    expect(result.found && Object.isFrozen(result.snapshot)).toBe(true);
  });

  it('reports an empty result as absent', async () => {
    const { lookup } = lookupWith(async () => []);

    await expect(lookup.fetch('c1:e1')).resolves.toEqual({
      found: false,
      reason: 'empty-result',
    });
  });

  it('reports a matching absence error as absent', async () => {
    const { lookup } = lookupWith(async () => {
      throw Object.assign(new Error('not found'), { code: 404 });
    });

    await expect(lookup.fetch('c1:e1')).resolves.toEqual({ found: false, reason: 'not-found' });
  });

  it('wraps other errors with the kind, identifier and call', async () => {
    const failure = { code: 500, body: { message: 'boom' } };
    const { lookup } = lookupWith(async () => {
      throw failure;
    });

    const error = await lookup.fetch('c1:e1').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(RemoteOperationError);
    expect(error).toMatchObject({
      resourceKind: 'ClusterEndpoint',
      identifier: 'c1:e1',
      operation: 'describe',
      cause: failure,
      message: 'describing ClusterEndpoint (c1:e1): Kubernetes API error (500): boom',
    });
  });

  it('rejects a malformed identifier without calling the control plane', async () => {
    const { lookup, spy } = lookupWith(async () => []);

    await expect(lookup.fetch('c1')).rejects.toBeInstanceOf(MalformedIdentifierError);
    expect(spy).not.toHaveBeenCalled();
  });
});
