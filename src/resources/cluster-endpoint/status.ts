import { statusFromField } from '../../core/convergence/index.js';
import type { WaitDefinition } from '../../core/lifecycle/index.js';
import type { ClusterEndpointSnapshot } from './types.js';

export const ClusterEndpointStatus = {
  Available: 'available',
  Creating: 'creating',
  Deleting: 'deleting',
  Inactive: 'inactive',
  Modifying: 'modifying',
} as const;

export const CLUSTER_ENDPOINT_AVAILABLE_TIMEOUT = 10 * 60 * 1000;
export const CLUSTER_ENDPOINT_DELETED_TIMEOUT = 10 * 60 * 1000;

export const extractClusterEndpointStatus = statusFromField<ClusterEndpointSnapshot, 'status'>('status');

export const CLUSTER_ENDPOINT_AVAILABLE: WaitDefinition = {
  pending: [ClusterEndpointStatus.Creating, ClusterEndpointStatus.Modifying],
  target: [ClusterEndpointStatus.Available],
  timeout: CLUSTER_ENDPOINT_AVAILABLE_TIMEOUT,
};

export const CLUSTER_ENDPOINT_DELETED: WaitDefinition = {
  pending: [ClusterEndpointStatus.Deleting],
  target: [],
  timeout: CLUSTER_ENDPOINT_DELETED_TIMEOUT,
};
