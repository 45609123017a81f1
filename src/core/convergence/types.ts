/**
 * Convergence types
 */

import type { OperationContext } from '../errors.js';

/**
 * One observation of a remote object. `found: false` is the NotFound branch:
 * the object does not currently exist.
 */
export type RefreshResult<S> = { found: true; label: string; snapshot: S } | { found: false };

/**
 * Capability polled by the engine. Must be safe to call repeatedly and keep
 * no state between calls. Failures other than absence are thrown.
 */
export type Refreshable<S> = () => Promise<RefreshResult<S>>;

/**
 * Maps a remote snapshot to a coarse status label
 */
export type StatusExtractor<S> = (snapshot: S) => string;

export interface PollingOptions {
  /**
   * Wait before the first poll (ms)
   */
  delay?: number;
  /**
   * Interval after the first poll (ms)
   */
  initialInterval?: number;
  maxInterval?: number;
  backoffMultiplier?: number;
}

export interface ConvergenceEvent {
  type: 'pending' | 'not-found' | 'converged' | 'absent';
  context: OperationContext;
  attempt: number;
  label?: string;
  elapsed: number;
  message: string;
  timestamp: Date;
}

export interface ConvergenceRequest<S> extends PollingOptions {
  context: OperationContext;
  refresh: Refreshable<S>;
  /**
   * Labels meaning "still in progress"
   */
  pending: readonly string[];
  /**
   * Labels meaning "done". Empty means the object must become absent.
   */
  target: readonly string[];
  /**
   * Deadline for the whole wait (ms)
   */
  timeout: number;
  signal?: AbortSignal;
  /**
   * Consecutive NotFound results tolerated while `target` is non-empty.
   * Unlimited by default.
   */
  notFoundChecks?: number;
  /**
   * Consecutive target observations required before succeeding (default 1)
   */
  continuousTargetOccurrence?: number;
  onProgress?: (event: ConvergenceEvent) => void;
}

export type ConvergenceResult<S> =
  | { outcome: 'converged'; label: string; snapshot: S; attempts: number; elapsed: number }
  | { outcome: 'absent'; attempts: number; elapsed: number };
