/**
 * Kubernetes Module
 *
 * Client construction and error classification for control planes backed by
 * Kubernetes custom objects.
 */

export { KubernetesClientProvider, createKubernetesClientProvider } from './client-provider.js';
export type { KubernetesClientConfig } from './client-provider.js';

export {
  formatKubernetesError,
  getErrorMessage,
  getErrorReason,
  getErrorStatusCode,
} from './errors.js';

export {
  getStatusBody,
  hasStatusCode,
  isRecord,
} from './type-guards.js';
export type { KubernetesStatusBody } from './type-guards.js';
