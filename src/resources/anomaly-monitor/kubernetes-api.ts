/**
 * Anomaly monitors stored as Kubernetes custom objects. The API server
 * generates the object name, which becomes the monitor id.
 */

import { PatchStrategy } from '@kubernetes/client-node';
import { type } from 'arktype';
import {
  DEFAULT_API_VERSION,
  DEFAULT_NAMESPACE,
  type CustomObjectClient,
  type CustomObjectLocation,
} from '../shared.js';
import type {
  AnomalyMonitorApi,
  AnomalyMonitorChanges,
  AnomalyMonitorSnapshot,
  AnomalyMonitorSpec,
} from './types.js';

const GENERATED_NAME_PREFIX = 'anomaly-monitor-';

const anomalyMonitorObject = type({
  metadata: { name: 'string' },
  spec: {
    name: 'string',
    type: 'string',
    'dimension?': 'string',
    'specification?': 'string',
    'tags?': 'Record<string, string>',
  },
});

/**
 * @throws Error when the object does not have the expected shape
 */
export function toAnomalyMonitorSnapshot(object: unknown): AnomalyMonitorSnapshot {
  const parsed = anomalyMonitorObject(object);
  if (parsed instanceof type.errors) {
    throw new Error(`Malformed AnomalyMonitor object: ${parsed.summary}`);
  }

  const { metadata, spec } = parsed;
  return {
    monitorId: metadata.name,
    name: spec.name,
    type: spec.type,
    tags: spec.tags ?? {},
    ...(spec.dimension !== undefined && { dimension: spec.dimension }),
    ...(spec.specification !== undefined && { specification: spec.specification }),
  };
}

export class KubernetesAnomalyMonitorApi implements AnomalyMonitorApi {
  static readonly kind = 'AnomalyMonitor';

  private readonly apiVersion: string;
  private readonly namespace: string;

  constructor(
    private readonly client: CustomObjectClient,
    location: CustomObjectLocation = {}
  ) {
    this.apiVersion = location.apiVersion ?? DEFAULT_API_VERSION;
    this.namespace = location.namespace ?? DEFAULT_NAMESPACE;
  }

  async createMonitor(spec: AnomalyMonitorSpec): Promise<{ monitorId: string }> {
    const created = await this.client.create({
      apiVersion: this.apiVersion,
      kind: KubernetesAnomalyMonitorApi.kind,
      metadata: { generateName: GENERATED_NAME_PREFIX, namespace: this.namespace },
      spec: {
        name: spec.name,
        type: spec.type,
        ...(spec.dimension && { dimension: spec.dimension }),
        ...(spec.specification && { specification: spec.specification }),
        ...(spec.tags && { tags: spec.tags }),
      },
    });

    return { monitorId: toAnomalyMonitorSnapshot(created).monitorId };
  }

  async updateMonitor(monitorId: string, changes: AnomalyMonitorChanges): Promise<void> {
    await this.client.patch(
      {
        apiVersion: this.apiVersion,
        kind: KubernetesAnomalyMonitorApi.kind,
        metadata: { name: monitorId, namespace: this.namespace },
        spec: changes,
      },
      undefined,
      undefined,
      undefined,
      undefined,
      PatchStrategy.MergePatch
    );
  }

  async deleteMonitor(monitorId: string): Promise<void> {
    await this.client.delete({
      apiVersion: this.apiVersion,
      kind: KubernetesAnomalyMonitorApi.kind,
      metadata: { name: monitorId, namespace: this.namespace },
    });
  }

  async getMonitors(monitorIds: readonly string[]): Promise<AnomalyMonitorSnapshot[]> {
    const [only] = monitorIds;
    const list = await this.client.list(
      this.apiVersion,
      KubernetesAnomalyMonitorApi.kind,
      this.namespace,
      undefined,
      undefined,
      undefined,
      monitorIds.length === 1 && only !== undefined ? `metadata.name=${only}` : undefined
    );

    const wanted = new Set(monitorIds);
    return list.items
      .map(toAnomalyMonitorSnapshot)
      .filter((monitor) => wanted.has(monitor.monitorId));
  }
}
