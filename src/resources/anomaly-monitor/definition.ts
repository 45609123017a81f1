import { UNKNOWN_STATUS } from '../../core/convergence/index.js';
import { MalformedIdentifierError } from '../../core/errors.js';
import { createIdentifierCodec } from '../../core/identifier/index.js';
import {
  LifecycleOrchestrator,
  type OrchestratorOptions,
  type ResourceDefinition,
} from '../../core/lifecycle/index.js';
import type { AbsenceSignatures } from '../../core/lookup/index.js';
import { validateAnomalyMonitorSpec } from './schema.js';
import type {
  AnomalyMonitorApi,
  AnomalyMonitorChanges,
  AnomalyMonitorSnapshot,
  AnomalyMonitorSpec,
} from './types.js';

export const ANOMALY_MONITOR_KIND = 'AnomalyMonitor';

export const anomalyMonitorIdCodec = createIdentifierCodec({ parts: ['MONITOR-ID'] });

export const ANOMALY_MONITOR_ABSENCE: AbsenceSignatures = {
  describe: [{ statusCode: 404 }],
  delete: [{ statusCode: 404 }],
};

export type AnomalyMonitorDefinition = ResourceDefinition<
  AnomalyMonitorSpec,
  AnomalyMonitorSnapshot,
  AnomalyMonitorChanges
>;

export interface AnomalyMonitorOptions extends OrchestratorOptions {
  absence?: AbsenceSignatures;
}

function monitorId(parts: readonly string[]): string {
  const [id] = parts;
  if (id === undefined) {
    throw new MalformedIdentifierError(
      parts.join(anomalyMonitorIdCodec.separator),
      anomalyMonitorIdCodec.format
    );
  }
  return id;
}

/**
 * Only the name can change in place; type, dimension and specification
 * changes require a new monitor.
 */
export function diffAnomalyMonitor(
  prior: AnomalyMonitorSpec,
  desired: AnomalyMonitorSpec
): AnomalyMonitorChanges | undefined {
  return prior.name === desired.name ? undefined : { name: desired.name };
}

export function createAnomalyMonitorDefinition(
  api: AnomalyMonitorApi,
  options: Pick<AnomalyMonitorOptions, 'absence'> = {}
): AnomalyMonitorDefinition {
  return {
    kind: ANOMALY_MONITOR_KIND,
    codec: anomalyMonitorIdCodec,

    async create(spec) {
      const { monitorId: id } = await api.createMonitor(spec);
      return [id];
    },

    async modify(parts, changes) {
      await api.updateMonitor(monitorId(parts), changes);
    },

    async remove(parts) {
      await api.deleteMonitor(monitorId(parts));
    },

    async describe(parts) {
      return api.getMonitors([monitorId(parts)]);
    },

    // Monitors report no lifecycle status
    extractStatus: () => UNKNOWN_STATUS,
    diff: diffAnomalyMonitor,
    validate: validateAnomalyMonitorSpec,
    absence: { ...ANOMALY_MONITOR_ABSENCE, ...options.absence },
  };
}

export function createAnomalyMonitorOrchestrator(
  api: AnomalyMonitorApi,
  options: AnomalyMonitorOptions = {}
): LifecycleOrchestrator<AnomalyMonitorSpec, AnomalyMonitorSnapshot, AnomalyMonitorChanges> {
  const { absence, ...orchestratorOptions } = options;
  return new LifecycleOrchestrator(
    createAnomalyMonitorDefinition(api, { absence }),
    orchestratorOptions
  );
}
