export {
  ANOMALY_MONITOR_ABSENCE,
  ANOMALY_MONITOR_KIND,
  anomalyMonitorIdCodec,
  createAnomalyMonitorDefinition,
  createAnomalyMonitorOrchestrator,
  diffAnomalyMonitor,
} from './definition.js';
export type { AnomalyMonitorDefinition, AnomalyMonitorOptions } from './definition.js';
export { KubernetesAnomalyMonitorApi, toAnomalyMonitorSnapshot } from './kubernetes-api.js';
export { anomalyMonitorSpecSchema, validateAnomalyMonitorSpec } from './schema.js';
export { ANOMALY_MONITOR_DIMENSIONS, ANOMALY_MONITOR_TYPES } from './types.js';
export type {
  AnomalyMonitorApi,
  AnomalyMonitorChanges,
  AnomalyMonitorDimension,
  AnomalyMonitorSnapshot,
  AnomalyMonitorSpec,
  AnomalyMonitorType,
} from './types.js';
