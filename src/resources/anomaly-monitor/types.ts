export const ANOMALY_MONITOR_TYPES = ['DIMENSIONAL', 'CUSTOM'] as const;

export type AnomalyMonitorType = (typeof ANOMALY_MONITOR_TYPES)[number];

export const ANOMALY_MONITOR_DIMENSIONS = ['SERVICE'] as const;

export type AnomalyMonitorDimension = (typeof ANOMALY_MONITOR_DIMENSIONS)[number];

/**
 * Desired state of a cost anomaly monitor.
 *
 * DIMENSIONAL monitors need `dimension`; CUSTOM monitors need `specification`,
 * a JSON cost-category expression.
 */
export interface AnomalyMonitorSpec {
  name: string;
  type: AnomalyMonitorType;
  dimension?: AnomalyMonitorDimension;
  specification?: string;
  tags?: Record<string, string>;
}

export interface AnomalyMonitorSnapshot {
  /**
   * Assigned by the control plane on creation
   */
  readonly monitorId: string;
  readonly name: string;
  readonly type: string;
  readonly dimension?: string;
  readonly specification?: string;
  readonly tags: Readonly<Record<string, string>>;
}

export interface AnomalyMonitorChanges {
  name?: string;
}

/**
 * Remote control-plane calls for anomaly monitors. Mutations take effect
 * before the call returns.
 */
export interface AnomalyMonitorApi {
  createMonitor(spec: AnomalyMonitorSpec): Promise<{ monitorId: string }>;
  updateMonitor(monitorId: string, changes: AnomalyMonitorChanges): Promise<void>;
  deleteMonitor(monitorId: string): Promise<void>;
  /**
   * Monitors among `monitorIds`; unknown ids are left out of the result
   */
  getMonitors(monitorIds: readonly string[]): Promise<AnomalyMonitorSnapshot[]>;
}
