/**
 * Lifecycle types
 */

import type { ConvergenceConfig } from '../config/index.js';
import type { ConvergenceEvent, StatusExtractor } from '../convergence/index.js';
import type { IdentifierCodec } from '../identifier/index.js';
import type { ConvergentLogger } from '../logging/index.js';
import type { AbsenceSignatures } from '../lookup/index.js';

export type LifecycleOperation = 'create' | 'read' | 'update' | 'delete' | 'import';

/**
 * Pending and target labels of one kind of wait
 */
export interface WaitDefinition {
  pending: readonly string[];
  /**
   * Empty means "wait until the object is gone"
   */
  target: readonly string[];
  timeout?: number;
}

/**
 * Everything the orchestrator needs to know about one resource kind
 */
export interface ResourceDefinition<TSpec, TSnapshot, TChanges> {
  kind: string;
  codec: IdentifierCodec;

  /**
   * Issue the remote creation call and return the key parts of the new object
   */
  create(spec: TSpec): Promise<readonly string[]>;
  modify(parts: readonly string[], changes: TChanges): Promise<void>;
  remove(parts: readonly string[]): Promise<void>;
  describe(parts: readonly string[]): Promise<readonly TSnapshot[]>;

  extractStatus: StatusExtractor<TSnapshot>;

  /**
   * Changes to mutable attributes, or `undefined` when there are none
   */
  diff(prior: TSpec, desired: TSpec): TChanges | undefined;

  /**
   * Check a desired-state descriptor before any remote call
   */
  validate?(spec: TSpec): TSpec;

  absence: AbsenceSignatures;

  /**
   * Kinds whose control plane applies mutations synchronously omit these
   */
  waits?: {
    available?: WaitDefinition;
    deleted?: WaitDefinition;
  };
}

export type PresentOutcome<S> = { status: 'present'; identifier: string; snapshot: S };

export type AbsentOutcome = { status: 'absent'; identifier: string };

/**
 * Result of one orchestrated operation. Failures reject instead.
 */
export type LifecycleOutcome<S> = PresentOutcome<S> | AbsentOutcome;

export interface OperationOptions {
  signal?: AbortSignal;
  /**
   * Overrides the wait's timeout (ms)
   */
  timeout?: number;
  onProgress?: (event: ConvergenceEvent) => void;
}

export interface OrchestratorOptions {
  polling?: Partial<ConvergenceConfig>;
  logger?: ConvergentLogger;
}
