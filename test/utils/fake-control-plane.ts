/**
 * In-memory control planes for lifecycle tests
 *
 * Mutations are acknowledged immediately; each describe call then walks a
 * scripted sequence of statuses. `GONE` in a script removes the object.
 */

import type {
  AnomalyMonitorApi,
  AnomalyMonitorChanges,
  AnomalyMonitorSnapshot,
  AnomalyMonitorSpec,
  ClusterEndpointApi,
  ClusterEndpointChanges,
  ClusterEndpointKey,
  ClusterEndpointSnapshot,
  ClusterEndpointSpec,
} from '../../src/index.js';

export const GONE = null;

export type StatusScript = ReadonlyArray<string | typeof GONE>;

/**
 * Shaped like the `ApiException` of @kubernetes/client-node
 */
export class FakeApiError extends Error {
  readonly body: { code: number; reason: string; message: string };

  constructor(
    readonly code: number,
    reason: string,
    message = `fake control plane: ${reason}`
  ) {
    super(message);
    this.name = 'FakeApiError';
    this.body = { code, reason, message };
  }
}

export function notFound(what = 'object'): FakeApiError {
  return new FakeApiError(404, 'NotFound', `${what} not found`);
}

type FailableCall = 'create' | 'modify' | 'delete' | 'describe';

interface ScriptedObject<T> {
  value: T;
  script: StatusScript;
  cursor: number;
}

class ScriptedStore<T> {
  readonly calls: Record<FailableCall, number> = { create: 0, modify: 0, delete: 0, describe: 0 };
  private readonly objects = new Map<string, ScriptedObject<T>>();
  private readonly failures = new Map<FailableCall, unknown>();

  failNext(call: FailableCall, error: unknown): void {
    this.failures.set(call, error);
  }

  record(call: FailableCall): void {
    this.calls[call]++;
    if (this.failures.has(call)) {
      const error = this.failures.get(call);
      this.failures.delete(call);
      throw error;
    }
  }

  put(id: string, value: T, script: StatusScript): void {
    this.objects.set(id, { value, script, cursor: 0 });
  }

  get(id: string): ScriptedObject<T> | undefined {
    return this.objects.get(id);
  }

  has(id: string): boolean {
    return this.objects.has(id);
  }

  remove(id: string): void {
    this.objects.delete(id);
  }

  /**
   * Advance the object's script; `undefined` once the object is gone
   */
  observe(id: string): { value: T; status: string } | undefined {
    const object = this.objects.get(id);
    if (!object) {
      return undefined;
    }

    const last = object.script.length - 1;
    const status = object.script[Math.min(object.cursor, last)];
    object.cursor++;

    if (status === undefined || status === GONE) {
      this.objects.delete(id);
      return undefined;
    }
    return { value: object.value, status };
  }
}

export interface ClusterEndpointScripts {
  create: StatusScript;
  modify: StatusScript;
  delete: StatusScript;
}

export const DEFAULT_CLUSTER_ENDPOINT_SCRIPTS: ClusterEndpointScripts = {
  create: ['creating', 'available'],
  modify: ['modifying', 'available'],
  delete: ['deleting', GONE],
};

function endpointKey(key: ClusterEndpointKey): string {
  return `${key.clusterIdentifier}:${key.clusterEndpointIdentifier}`;
}

export class FakeClusterEndpointApi implements ClusterEndpointApi {
  readonly modifications: ClusterEndpointChanges[] = [];
  readonly scripts: ClusterEndpointScripts;
  private readonly store = new ScriptedStore<ClusterEndpointSpec>();

  constructor(scripts: Partial<ClusterEndpointScripts> = {}) {
    this.scripts = { ...DEFAULT_CLUSTER_ENDPOINT_SCRIPTS, ...scripts };
  }

  get calls(): Readonly<Record<FailableCall, number>> {
    return this.store.calls;
  }

  failNext(call: FailableCall, error: unknown): void {
    this.store.failNext(call, error);
  }

  /**
   * Add an endpoint that already exists on the control plane
   */
  seed(spec: ClusterEndpointSpec, script: StatusScript = ['available']): string {
    const id = endpointKey(spec);
    this.store.put(id, spec, script);
    return id;
  }

  has(key: ClusterEndpointKey): boolean {
    return this.store.has(endpointKey(key));
  }

  /**
   * Remove an endpoint out of band
   */
  disappear(key: ClusterEndpointKey): void {
    this.store.remove(endpointKey(key));
  }

  async createEndpoint(spec: ClusterEndpointSpec): Promise<ClusterEndpointKey> {
    this.store.record('create');
    this.store.put(endpointKey(spec), spec, this.scripts.create);
    return {
      clusterIdentifier: spec.clusterIdentifier,
      clusterEndpointIdentifier: spec.clusterEndpointIdentifier,
    };
  }

  async modifyEndpoint(key: ClusterEndpointKey, changes: ClusterEndpointChanges): Promise<void> {
    this.store.record('modify');
    const existing = this.store.get(endpointKey(key));
    if (!existing) {
      throw notFound(`endpoint ${key.clusterEndpointIdentifier}`);
    }
    this.modifications.push(changes);
    this.store.put(endpointKey(key), { ...existing.value, ...changes }, this.scripts.modify);
  }

  async deleteEndpoint(key: ClusterEndpointKey): Promise<void> {
    this.store.record('delete');
    const existing = this.store.get(endpointKey(key));
    if (!existing) {
      throw notFound(`endpoint ${key.clusterEndpointIdentifier}`);
    }
    this.store.put(endpointKey(key), existing.value, this.scripts.delete);
  }

  async describeEndpoints(key: ClusterEndpointKey): Promise<ClusterEndpointSnapshot[]> {
    this.store.record('describe');
    const observed = this.store.observe(endpointKey(key));
    if (!observed) {
      return [];
    }

    const { value, status } = observed;
    return [
      {
        clusterIdentifier: value.clusterIdentifier,
        clusterEndpointIdentifier: value.clusterEndpointIdentifier,
        endpointType: value.endpointType,
        staticMembers: value.staticMembers ?? [],
        excludedMembers: value.excludedMembers ?? [],
        tags: value.tags ?? {},
        endpoint: `${value.clusterEndpointIdentifier}.cluster-custom.example.test`,
        status,
      },
    ];
  }
}

export class FakeAnomalyMonitorApi implements AnomalyMonitorApi {
  readonly updates: Array<{ monitorId: string; changes: AnomalyMonitorChanges }> = [];
  private readonly store = new ScriptedStore<AnomalyMonitorSpec>();
  private nextId = 1;

  get calls(): Readonly<Record<FailableCall, number>> {
    return this.store.calls;
  }

  failNext(call: FailableCall, error: unknown): void {
    this.store.failNext(call, error);
  }

  has(monitorId: string): boolean {
    return this.store.has(monitorId);
  }

  disappear(monitorId: string): void {
    this.store.remove(monitorId);
  }

  async createMonitor(spec: AnomalyMonitorSpec): Promise<{ monitorId: string }> {
    this.store.record('create');
    const monitorId = `anomaly-monitor-${this.nextId++}`;
    this.store.put(monitorId, spec, ['present']);
    return { monitorId };
  }

  async updateMonitor(monitorId: string, changes: AnomalyMonitorChanges): Promise<void> {
    this.store.record('modify');
    const existing = this.store.get(monitorId);
    if (!existing) {
      throw notFound(`monitor ${monitorId}`);
    }
    this.updates.push({ monitorId, changes });
    this.store.put(monitorId, { ...existing.value, ...changes }, existing.script);
  }

  async deleteMonitor(monitorId: string): Promise<void> {
    this.store.record('delete');
    if (!this.store.has(monitorId)) {
      throw notFound(`monitor ${monitorId}`);
    }
    this.store.remove(monitorId);
  }

  async getMonitors(monitorIds: readonly string[]): Promise<AnomalyMonitorSnapshot[]> {
    this.store.record('describe');
    const monitors: AnomalyMonitorSnapshot[] = [];
    for (const monitorId of monitorIds) {
      const observed = this.store.observe(monitorId);
      if (observed) {
        const { value } = observed;
        monitors.push({
          monitorId,
          name: value.name,
          type: value.type,
          tags: value.tags ?? {},
          ...(value.dimension !== undefined && { dimension: value.dimension }),
          ...(value.specification !== undefined && { specification: value.specification }),
        });
      }
    }
    return monitors;
  }
}
