import { MalformedIdentifierError } from '../../core/errors.js';
import { createIdentifierCodec } from '../../core/identifier/index.js';
import type { ClusterEndpointKey } from './types.js';

/**
 * `CLUSTER-ID:CLUSTER-ENDPOINT-ID`
 */
export const clusterEndpointIdCodec = createIdentifierCodec({
  parts: ['CLUSTER-ID', 'CLUSTER-ENDPOINT-ID'],
});

export function clusterEndpointKeyFromParts(parts: readonly string[]): ClusterEndpointKey {
  const [clusterIdentifier, clusterEndpointIdentifier] = parts;
  if (clusterIdentifier === undefined || clusterEndpointIdentifier === undefined) {
    throw new MalformedIdentifierError(
      parts.join(clusterEndpointIdCodec.separator),
      clusterEndpointIdCodec.format
    );
  }
  return { clusterIdentifier, clusterEndpointIdentifier };
}
