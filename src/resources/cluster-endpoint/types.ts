/**
 * Cluster endpoint types
 */

export const CLUSTER_ENDPOINT_TYPES = ['READER', 'WRITER', 'ANY'] as const;

export type ClusterEndpointType = (typeof CLUSTER_ENDPOINT_TYPES)[number];

/**
 * Desired state of a custom endpoint of a database cluster
 */
export interface ClusterEndpointSpec {
  clusterIdentifier: string;
  clusterEndpointIdentifier: string;
  endpointType: ClusterEndpointType;
  staticMembers?: string[];
  excludedMembers?: string[];
  tags?: Record<string, string>;
}

/**
 * Control-plane view of a cluster endpoint, built once per describe call
 */
export interface ClusterEndpointSnapshot {
  readonly clusterIdentifier: string;
  readonly clusterEndpointIdentifier: string;
  readonly endpointType: string;
  readonly staticMembers: readonly string[];
  readonly excludedMembers: readonly string[];
  readonly tags: Readonly<Record<string, string>>;
  /**
   * DNS address of the endpoint, once assigned
   */
  readonly endpoint?: string;
  readonly arn?: string;
  readonly status?: string;
}

/**
 * Mutable attributes that changed between two specs
 */
export interface ClusterEndpointChanges {
  endpointType?: ClusterEndpointType;
  staticMembers?: string[];
  excludedMembers?: string[];
}

export interface ClusterEndpointKey {
  clusterIdentifier: string;
  clusterEndpointIdentifier: string;
}

/**
 * Remote control-plane calls for cluster endpoints
 */
export interface ClusterEndpointApi {
  createEndpoint(spec: ClusterEndpointSpec): Promise<ClusterEndpointKey>;
  modifyEndpoint(key: ClusterEndpointKey, changes: ClusterEndpointChanges): Promise<void>;
  deleteEndpoint(key: ClusterEndpointKey): Promise<void>;
  describeEndpoints(key: ClusterEndpointKey): Promise<ClusterEndpointSnapshot[]>;
}
