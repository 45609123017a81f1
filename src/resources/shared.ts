/**
 * Helpers shared by the resource kinds
 */

import type { KubernetesObjectApi } from '@kubernetes/client-node';

/**
 * The KubernetesObjectApi calls the custom-object adapters make
 */
export type CustomObjectClient = Pick<KubernetesObjectApi, 'create' | 'list' | 'patch' | 'delete'>;

export interface CustomObjectLocation {
  /**
   * @default 'infra.convergent.dev/v1alpha1'
   */
  apiVersion?: string;
  /**
   * @default 'default'
   */
  namespace?: string;
}

export const DEFAULT_API_VERSION = 'infra.convergent.dev/v1alpha1';
export const DEFAULT_NAMESPACE = 'default';

export const CLUSTER_LABEL = 'infra.convergent.dev/cluster';

/**
 * Compare two member lists as sets; a missing list equals an empty one
 */
export function sameMembers(
  a: readonly string[] | undefined,
  b: readonly string[] | undefined
): boolean {
  const left = new Set(a ?? []);
  const right = new Set(b ?? []);
  if (left.size !== right.size) {
    return false;
  }
  for (const member of left) {
    if (!right.has(member)) {
      return false;
    }
  }
  return true;
}
