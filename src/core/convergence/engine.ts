/**
 * State convergence engine
 *
 * Polls a remote object until it reaches a target status or, when the target
 * set is empty, until it disappears. Bridges a caller's "make it so" request to
 * a control plane that acknowledges mutations before they complete.
 */

import {
  ConvergenceCancelledError,
  ConvergenceNotFoundError,
  ConvergenceTimeoutError,
  InvalidConvergenceRequestError,
  UnexpectedStateError,
  type OperationContext,
} from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { backoffDelay, sleep } from '../utils/timing.js';
import type {
  ConvergenceEvent,
  ConvergenceRequest,
  ConvergenceResult,
  PollingOptions,
} from './types.js';

const logger = getComponentLogger('convergence-engine');

export const DEFAULT_POLLING_OPTIONS: Required<PollingOptions> = {
  delay: 0,
  initialInterval: 1000,
  maxInterval: 10000,
  backoffMultiplier: 1.5,
};

function validateRequest<S>(request: ConvergenceRequest<S>): void {
  const { context, pending, target, timeout } = request;

  const overlap = pending.filter((label) => target.includes(label));
  if (overlap.length > 0) {
    throw new InvalidConvergenceRequestError(
      `pending and target states overlap: ${overlap.join(', ')}`,
      context
    );
  }

  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new InvalidConvergenceRequestError(`timeout must be positive, got ${timeout}`, context);
  }

  if (request.continuousTargetOccurrence !== undefined && request.continuousTargetOccurrence < 1) {
    throw new InvalidConvergenceRequestError('continuousTargetOccurrence must be at least 1', context);
  }
}

async function pause(ms: number, signal: AbortSignal | undefined, context: OperationContext) {
  try {
    await sleep(ms, signal);
  } catch (reason) {
    throw new ConvergenceCancelledError(context, reason);
  }
}

/**
 * Wait for a remote object to converge.
 *
 * Resolves with the last snapshot once a target label is observed, or with
 * `absent` when the target set is empty and the object is gone. NotFound while
 * a non-empty target is awaited counts as pending, since the object may not
 * have propagated yet.
 *
 * @throws UnexpectedStateError when a label is neither pending nor target
 * @throws ConvergenceTimeoutError when the deadline passes while pending
 * @throws ConvergenceCancelledError when `signal` aborts
 * @throws ConvergenceNotFoundError when `notFoundChecks` is exceeded
 * @throws whatever `refresh` throws, without polling again
 *
 * @example
 * ```typescript
 * const result = await waitForState({
 *   context: { resourceKind: 'ClusterEndpoint', identifier: id, operation: 'create' },
 *   refresh: createRefresh(lookup, extractStatus, id),
 *   pending: ['creating', 'modifying'],
 *   target: ['available'],
 *   timeout: 10 * 60 * 1000,
 * });
 * ```
 */
export async function waitForState<S>(request: ConvergenceRequest<S>): Promise<ConvergenceResult<S>> {
  validateRequest(request);

  const { context, refresh, pending, target, timeout, signal, onProgress } = request;
  const delay = request.delay ?? DEFAULT_POLLING_OPTIONS.delay;
  const initialInterval = request.initialInterval ?? DEFAULT_POLLING_OPTIONS.initialInterval;
  const maxInterval = request.maxInterval ?? DEFAULT_POLLING_OPTIONS.maxInterval;
  const backoffMultiplier = request.backoffMultiplier ?? DEFAULT_POLLING_OPTIONS.backoffMultiplier;
  const notFoundChecks = request.notFoundChecks ?? Number.POSITIVE_INFINITY;
  const requiredOccurrences = request.continuousTargetOccurrence ?? 1;

  const pendingStates = new Set(pending);
  const targetStates = new Set(target);
  const awaitAbsence = targetStates.size === 0;

  const log = logger.child({
    resourceKind: context.resourceKind,
    resourceId: context.identifier,
    operation: context.operation,
  });

  const startTime = Date.now();
  const deadline = startTime + timeout;

  const emit = (event: Omit<ConvergenceEvent, 'context' | 'elapsed' | 'timestamp'>): void => {
    onProgress?.({ ...event, context, elapsed: Date.now() - startTime, timestamp: new Date() });
  };

  log.debug('Waiting for state', { pending, target, timeout });

  if (delay > 0) {
    await pause(Math.min(delay, timeout), signal, context);
  }

  let attempt = 0;
  let notFoundCount = 0;
  let targetOccurrences = 0;
  let lastLabel: string | undefined;
  let lastSnapshot: S | undefined;

  for (;;) {
    if (signal?.aborted) {
      throw new ConvergenceCancelledError(context, signal.reason);
    }

    attempt++;
    const result = await refresh();

    if (!result.found) {
      lastLabel = undefined;
      lastSnapshot = undefined;
      targetOccurrences = 0;

      if (awaitAbsence) {
        log.debug('Object is absent', { attempt });
        emit({ type: 'absent', attempt, message: `${context.resourceKind} is gone` });
        return { outcome: 'absent', attempts: attempt, elapsed: Date.now() - startTime };
      }

      notFoundCount++;
      if (notFoundCount > notFoundChecks) {
        throw new ConvergenceNotFoundError(context, notFoundCount);
      }

      log.debug('Object not found yet', { attempt, notFoundCount });
      emit({ type: 'not-found', attempt, message: `${context.resourceKind} not found yet` });
    } else {
      const { label, snapshot } = result;
      notFoundCount = 0;
      lastLabel = label;
      lastSnapshot = snapshot;

      if (targetStates.has(label)) {
        targetOccurrences++;
        if (targetOccurrences >= requiredOccurrences) {
          log.debug('Object converged', { attempt, label });
          emit({ type: 'converged', attempt, label, message: `${context.resourceKind} is ${label}` });
          return {
            outcome: 'converged',
            label,
            snapshot,
            attempts: attempt,
            elapsed: Date.now() - startTime,
          };
        }
      } else if (pendingStates.has(label)) {
        targetOccurrences = 0;
      } else {
        log.warn('Object reached an unexpected state', { attempt, label, pending, target });
        throw new UnexpectedStateError(context, label, pending, target, snapshot);
      }

      log.debug('Object still pending', { attempt, label });
      emit({ type: 'pending', attempt, label, message: `${context.resourceKind} is ${label}` });
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      log.warn('Timed out waiting for state', { attempt, lastLabel, timeout });
      throw new ConvergenceTimeoutError(context, timeout, lastLabel, lastSnapshot, target);
    }

    const interval = backoffDelay(attempt, initialInterval, backoffMultiplier, maxInterval);
    await pause(Math.min(interval, remaining), signal, context);
  }
}
