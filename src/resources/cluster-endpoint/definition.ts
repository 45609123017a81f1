import { LifecycleOrchestrator } from '../../core/lifecycle/index.js';
import type {
  OrchestratorOptions,
  ResourceDefinition,
  WaitDefinition,
} from '../../core/lifecycle/index.js';
import type { AbsenceSignatures } from '../../core/lookup/index.js';
import { sameMembers } from '../shared.js';
import { clusterEndpointIdCodec, clusterEndpointKeyFromParts } from './identifier.js';
import { validateClusterEndpointSpec } from './schema.js';
import {
  CLUSTER_ENDPOINT_AVAILABLE,
  CLUSTER_ENDPOINT_DELETED,
  extractClusterEndpointStatus,
} from './status.js';
import type {
  ClusterEndpointApi,
  ClusterEndpointChanges,
  ClusterEndpointSnapshot,
  ClusterEndpointSpec,
} from './types.js';

export const CLUSTER_ENDPOINT_KIND = 'ClusterEndpoint';

/**
 * A missing endpoint and a missing namespace both answer 404. During the
 * deletion wait only the endpoint's own NotFound is tolerated.
 */
export const CLUSTER_ENDPOINT_ABSENCE: AbsenceSignatures = {
  describe: [{ statusCode: 404 }],
  delete: [{ statusCode: 404 }],
  wait: [{ statusCode: 404, reason: 'NotFound' }],
};

export type ClusterEndpointDefinition = ResourceDefinition<
  ClusterEndpointSpec,
  ClusterEndpointSnapshot,
  ClusterEndpointChanges
>;

export interface ClusterEndpointOptions extends OrchestratorOptions {
  /**
   * Replaces the default signatures call by call
   */
  absence?: AbsenceSignatures;
  waits?: {
    available?: Partial<WaitDefinition>;
    deleted?: Partial<WaitDefinition>;
  };
}

/**
 * Mutable attributes are the endpoint type and the member lists; tags are
 * carried but never diffed.
 */
export function diffClusterEndpoint(
  prior: ClusterEndpointSpec,
  desired: ClusterEndpointSpec
): ClusterEndpointChanges | undefined {
  const changes: ClusterEndpointChanges = {};

  if (prior.endpointType !== desired.endpointType) {
    changes.endpointType = desired.endpointType;
  }
  if (!sameMembers(prior.staticMembers, desired.staticMembers)) {
    changes.staticMembers = [...(desired.staticMembers ?? [])];
  }
  if (!sameMembers(prior.excludedMembers, desired.excludedMembers)) {
    changes.excludedMembers = [...(desired.excludedMembers ?? [])];
  }

  return Object.keys(changes).length > 0 ? changes : undefined;
}

export function createClusterEndpointDefinition(
  api: ClusterEndpointApi,
  options: Pick<ClusterEndpointOptions, 'absence' | 'waits'> = {}
): ClusterEndpointDefinition {
  return {
    kind: CLUSTER_ENDPOINT_KIND,
    codec: clusterEndpointIdCodec,

    async create(spec) {
      const key = await api.createEndpoint(spec);
      return [key.clusterIdentifier, key.clusterEndpointIdentifier];
    },

    async modify(parts, changes) {
      await api.modifyEndpoint(clusterEndpointKeyFromParts(parts), changes);
    },

    async remove(parts) {
      await api.deleteEndpoint(clusterEndpointKeyFromParts(parts));
    },

    async describe(parts) {
      return api.describeEndpoints(clusterEndpointKeyFromParts(parts));
    },

    extractStatus: extractClusterEndpointStatus,
    diff: diffClusterEndpoint,
    validate: validateClusterEndpointSpec,
    absence: { ...CLUSTER_ENDPOINT_ABSENCE, ...options.absence },
    waits: {
      available: { ...CLUSTER_ENDPOINT_AVAILABLE, ...options.waits?.available },
      deleted: { ...CLUSTER_ENDPOINT_DELETED, ...options.waits?.deleted },
    },
  };
}

export function createClusterEndpointOrchestrator(
  api: ClusterEndpointApi,
  options: ClusterEndpointOptions = {}
): LifecycleOrchestrator<ClusterEndpointSpec, ClusterEndpointSnapshot, ClusterEndpointChanges> {
  const { absence, waits, ...orchestratorOptions } = options;
  return new LifecycleOrchestrator(
    createClusterEndpointDefinition(api, { absence, waits }),
    orchestratorOptions
  );
}
