/**
 * Resource kinds managed through the lifecycle orchestrator
 */

import type { AbsenceTable } from '../core/lookup/index.js';
import { ANOMALY_MONITOR_ABSENCE, ANOMALY_MONITOR_KIND } from './anomaly-monitor/index.js';
import { CLUSTER_ENDPOINT_ABSENCE, CLUSTER_ENDPOINT_KIND } from './cluster-endpoint/index.js';

export * from './anomaly-monitor/index.js';
export * from './cluster-endpoint/index.js';
export {
  CLUSTER_LABEL,
  DEFAULT_API_VERSION,
  DEFAULT_NAMESPACE,
  sameMembers,
  type CustomObjectClient,
  type CustomObjectLocation,
} from './shared.js';

/**
 * Built-in absence signatures of every kind, keyed by kind
 */
export const DEFAULT_ABSENCE_TABLE: AbsenceTable = {
  [CLUSTER_ENDPOINT_KIND]: CLUSTER_ENDPOINT_ABSENCE,
  [ANOMALY_MONITOR_KIND]: ANOMALY_MONITOR_ABSENCE,
};
