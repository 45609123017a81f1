/**
 * Cluster endpoints stored as Kubernetes custom objects
 *
 * Each endpoint is a `ClusterEndpoint` object named `<cluster>.<endpoint>`
 * and labelled with its cluster. Identifiers never contain a dot, so two
 * identifiers never name the same object, and equally named endpoints of
 * different clusters can share a namespace. A controller on the far side
 * reports progress in `status.phase`.
 */

import { PatchStrategy } from '@kubernetes/client-node';
import { type } from 'arktype';
import type { CustomObjectClient, CustomObjectLocation } from '../shared.js';
import { CLUSTER_LABEL, DEFAULT_API_VERSION, DEFAULT_NAMESPACE } from '../shared.js';
import type {
  ClusterEndpointApi,
  ClusterEndpointChanges,
  ClusterEndpointKey,
  ClusterEndpointSnapshot,
  ClusterEndpointSpec,
} from './types.js';

export function clusterEndpointObjectName(key: ClusterEndpointKey): string {
  return `${key.clusterIdentifier}.${key.clusterEndpointIdentifier}`;
}

const clusterEndpointObject = type({
  metadata: { name: 'string' },
  spec: {
    clusterIdentifier: 'string',
    clusterEndpointIdentifier: 'string',
    endpointType: 'string',
    'staticMembers?': 'string[]',
    'excludedMembers?': 'string[]',
    'tags?': 'Record<string, string>',
  },
  'status?': {
    'phase?': 'string',
    'endpoint?': 'string',
    'arn?': 'string',
  },
});

/**
 * Build a snapshot from a custom object returned by the API server
 *
 * @throws Error when the object does not have the expected shape
 */
export function toClusterEndpointSnapshot(object: unknown): ClusterEndpointSnapshot {
  const parsed = clusterEndpointObject(object);
  if (parsed instanceof type.errors) {
    throw new Error(`Malformed ClusterEndpoint object: ${parsed.summary}`);
  }

  const { spec, status } = parsed;
  return {
    clusterIdentifier: spec.clusterIdentifier,
    clusterEndpointIdentifier: spec.clusterEndpointIdentifier,
    endpointType: spec.endpointType,
    staticMembers: spec.staticMembers ?? [],
    excludedMembers: spec.excludedMembers ?? [],
    tags: spec.tags ?? {},
    ...(status?.endpoint !== undefined && { endpoint: status.endpoint }),
    ...(status?.arn !== undefined && { arn: status.arn }),
    ...(status?.phase !== undefined && { status: status.phase }),
  };
}

export class KubernetesClusterEndpointApi implements ClusterEndpointApi {
  static readonly kind = 'ClusterEndpoint';

  private readonly apiVersion: string;
  private readonly namespace: string;

  constructor(
    private readonly client: CustomObjectClient,
    location: CustomObjectLocation = {}
  ) {
    this.apiVersion = location.apiVersion ?? DEFAULT_API_VERSION;
    this.namespace = location.namespace ?? DEFAULT_NAMESPACE;
  }

  async createEndpoint(spec: ClusterEndpointSpec): Promise<ClusterEndpointKey> {
    const created = await this.client.create({
      apiVersion: this.apiVersion,
      kind: KubernetesClusterEndpointApi.kind,
      metadata: {
        name: clusterEndpointObjectName(spec),
        namespace: this.namespace,
        labels: { [CLUSTER_LABEL]: spec.clusterIdentifier },
      },
      spec: {
        clusterIdentifier: spec.clusterIdentifier,
        clusterEndpointIdentifier: spec.clusterEndpointIdentifier,
        endpointType: spec.endpointType,
        ...(spec.staticMembers && spec.staticMembers.length > 0 && { staticMembers: spec.staticMembers }),
        ...(spec.excludedMembers &&
          spec.excludedMembers.length > 0 && { excludedMembers: spec.excludedMembers }),
        ...(spec.tags && { tags: spec.tags }),
      },
    });

    const snapshot = toClusterEndpointSnapshot(created);
    return {
      clusterIdentifier: snapshot.clusterIdentifier,
      clusterEndpointIdentifier: snapshot.clusterEndpointIdentifier,
    };
  }

  async modifyEndpoint(key: ClusterEndpointKey, changes: ClusterEndpointChanges): Promise<void> {
    await this.client.patch(
      {
        apiVersion: this.apiVersion,
        kind: KubernetesClusterEndpointApi.kind,
        metadata: { name: clusterEndpointObjectName(key), namespace: this.namespace },
        spec: changes,
      },
      undefined,
      undefined,
      undefined,
      undefined,
      PatchStrategy.MergePatch
    );
  }

  async deleteEndpoint(key: ClusterEndpointKey): Promise<void> {
    await this.client.delete({
      apiVersion: this.apiVersion,
      kind: KubernetesClusterEndpointApi.kind,
      metadata: { name: clusterEndpointObjectName(key), namespace: this.namespace },
    });
  }

  /**
   * Objects matching both the object name and the cluster label
   */
  async describeEndpoints(key: ClusterEndpointKey): Promise<ClusterEndpointSnapshot[]> {
    const list = await this.client.list(
      this.apiVersion,
      KubernetesClusterEndpointApi.kind,
      this.namespace,
      undefined,
      undefined,
      undefined,
      `metadata.name=${clusterEndpointObjectName(key)}`,
      `${CLUSTER_LABEL}=${key.clusterIdentifier}`
    );

    return list.items.map(toClusterEndpointSnapshot);
  }
}
