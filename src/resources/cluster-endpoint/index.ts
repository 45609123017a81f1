export {
  CLUSTER_ENDPOINT_ABSENCE,
  CLUSTER_ENDPOINT_KIND,
  createClusterEndpointDefinition,
  createClusterEndpointOrchestrator,
  diffClusterEndpoint,
} from './definition.js';
export type { ClusterEndpointDefinition, ClusterEndpointOptions } from './definition.js';
export { clusterEndpointIdCodec, clusterEndpointKeyFromParts } from './identifier.js';
export {
  clusterEndpointObjectName,
  KubernetesClusterEndpointApi,
  toClusterEndpointSnapshot,
} from './kubernetes-api.js';
export { clusterEndpointSpecSchema, validateClusterEndpointSpec } from './schema.js';
export {
  CLUSTER_ENDPOINT_AVAILABLE,
  CLUSTER_ENDPOINT_AVAILABLE_TIMEOUT,
  CLUSTER_ENDPOINT_DELETED,
  CLUSTER_ENDPOINT_DELETED_TIMEOUT,
  ClusterEndpointStatus,
  extractClusterEndpointStatus,
} from './status.js';
export { CLUSTER_ENDPOINT_TYPES } from './types.js';
export type {
  ClusterEndpointApi,
  ClusterEndpointChanges,
  ClusterEndpointKey,
  ClusterEndpointSnapshot,
  ClusterEndpointSpec,
  ClusterEndpointType,
} from './types.js';
