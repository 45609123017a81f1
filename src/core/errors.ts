/**
 * Error taxonomy for convergent
 *
 * Every error carries a machine-readable `code` and a `context` record. Errors
 * raised while operating on a remote object also carry the resource kind, the
 * external identifier (when one exists) and the attempted operation, so an
 * operator can inspect the object by hand.
 */

import type { ArkErrors } from 'arktype';
import { formatKubernetesError } from './kubernetes/errors.js';

export class ConvergentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConvergentError';
  }
}

/**
 * Where an operation on a remote object happened
 */
export interface OperationContext {
  resourceKind: string;
  /**
   * External identifier; absent when the remote create call itself failed
   */
  identifier?: string | undefined;
  operation: string;
}

function describeTarget(context: OperationContext): string {
  return context.identifier
    ? `${context.resourceKind} (${context.identifier})`
    : context.resourceKind;
}

export class MalformedIdentifierError extends ConvergentError {
  constructor(
    public readonly identifier: string,
    public readonly expectedFormat: string
  ) {
    super(
      `unexpected format for ID (${identifier}), expected ${expectedFormat}`,
      'MALFORMED_IDENTIFIER',
      { identifier, expectedFormat }
    );
    this.name = 'MalformedIdentifierError';
  }
}

export type RemoteCall = 'create' | 'modify' | 'delete' | 'describe';

const REMOTE_CALL_VERBS: Record<RemoteCall, string> = {
  create: 'creating',
  modify: 'updating',
  delete: 'deleting',
  describe: 'describing',
};

/**
 * A remote control-plane call failed for a reason other than absence.
 * The underlying error is kept as `cause`.
 */
export class RemoteOperationError extends ConvergentError {
  public readonly resourceKind: string;
  public readonly identifier: string | undefined;
  public readonly operation: RemoteCall;

  constructor(context: OperationContext & { operation: RemoteCall }, cause: unknown) {
    super(
      `${REMOTE_CALL_VERBS[context.operation]} ${describeTarget(context)}: ${formatKubernetesError(cause)}`,
      'REMOTE_OPERATION_FAILURE',
      { ...context },
      { cause }
    );
    this.name = 'RemoteOperationError';
    this.resourceKind = context.resourceKind;
    this.identifier = context.identifier;
    this.operation = context.operation;
  }
}

/**
 * Base for failures of a convergence wait
 */
export abstract class ConvergenceError extends ConvergentError {
  public readonly resourceKind: string;
  public readonly identifier: string | undefined;
  public readonly operation: string;

  constructor(
    message: string,
    code: string,
    context: OperationContext,
    extra?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(
      `waiting for ${describeTarget(context)} during ${context.operation}: ${message}`,
      code,
      { ...context, ...extra },
      options
    );
    this.resourceKind = context.resourceKind;
    this.identifier = context.identifier;
    this.operation = context.operation;
  }
}

export class UnexpectedStateError extends ConvergenceError {
  constructor(
    context: OperationContext,
    public readonly label: string,
    public readonly pending: readonly string[],
    public readonly target: readonly string[],
    public readonly snapshot: unknown
  ) {
    super(
      `unexpected state '${label}', wanted target ${formatLabels(target)}`,
      'UNEXPECTED_STATE',
      context,
      { label, pending, target }
    );
    this.name = 'UnexpectedStateError';
  }
}

export class ConvergenceTimeoutError extends ConvergenceError {
  constructor(
    context: OperationContext,
    public readonly timeout: number,
    public readonly lastLabel: string | undefined,
    public readonly lastSnapshot: unknown,
    public readonly target: readonly string[]
  ) {
    super(
      `timeout while waiting for state to become ${formatLabels(target)} (last state: '${lastLabel ?? 'not found'}', timeout: ${timeout}ms)`,
      'CONVERGENCE_TIMEOUT',
      context,
      { timeout, lastLabel, target }
    );
    this.name = 'ConvergenceTimeoutError';
  }
}

export class ConvergenceCancelledError extends ConvergenceError {
  constructor(context: OperationContext, reason?: unknown) {
    super('cancelled', 'CONVERGENCE_CANCELLED', context, undefined, { cause: reason });
    this.name = 'ConvergenceCancelledError';
  }
}

/**
 * The object stayed missing for more polls than the request allows while a
 * non-empty target was awaited.
 */
export class ConvergenceNotFoundError extends ConvergenceError {
  constructor(
    context: OperationContext,
    public readonly checks: number
  ) {
    super(`couldn't find resource (${checks} retries)`, 'CONVERGENCE_NOT_FOUND', context, {
      checks,
    });
    this.name = 'ConvergenceNotFoundError';
  }
}

export class InvalidConvergenceRequestError extends ConvergentError {
  constructor(message: string, context: OperationContext) {
    super(
      `invalid convergence request for ${describeTarget(context)}: ${message}`,
      'INVALID_CONVERGENCE_REQUEST',
      { ...context }
    );
    this.name = 'InvalidConvergenceRequestError';
  }
}

/**
 * An object that must exist (just created, updated or imported) was not found.
 */
export class ResourceNotFoundError extends ConvergentError {
  public readonly resourceKind: string;
  public readonly identifier: string | undefined;
  public readonly operation: string;

  constructor(context: OperationContext) {
    super(
      `${describeTarget(context)} not found during ${context.operation}`,
      'RESOURCE_NOT_FOUND',
      { ...context }
    );
    this.name = 'ResourceNotFoundError';
    this.resourceKind = context.resourceKind;
    this.identifier = context.identifier;
    this.operation = context.operation;
  }
}

export class ValidationError extends ConvergentError {
  constructor(
    message: string,
    public readonly resourceKind: string,
    public readonly field?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'VALIDATION_ERROR', { resourceKind, field, suggestions });
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends ConvergentError {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message, 'CONFIGURATION_ERROR', { source });
    this.name = 'ConfigurationError';
  }
}

function formatPath(path: readonly PropertyKey[]): string {
  return path.length > 0 ? path.map(String).join('.') : 'root';
}

function formatLabels(labels: readonly string[]): string {
  return labels.length === 0 ? 'absent' : `[${labels.join(', ')}]`;
}

/**
 * Format arktype validation errors with the failing field and suggestions
 */
export function formatArktypeError(errors: ArkErrors, resourceKind: string): ValidationError {
  const [first, ...rest] = errors;

  if (!first) {
    return new ValidationError(
      `Invalid ${resourceKind}: ${errors.summary}`,
      resourceKind,
      undefined,
      ['Check the resource specification against the schema']
    );
  }

  const fieldPath = formatPath(first.path);
  let message = `Invalid ${resourceKind} at field '${fieldPath}': ${first.message}`;

  const suggestions: string[] = [];
  if (first.code === 'required') {
    suggestions.push(`Add the required field '${fieldPath}' to your ${resourceKind} spec`);
  } else {
    suggestions.push(`Change '${fieldPath}' to match: ${first.expected}`);
  }

  if (rest.length > 0) {
    message += '\n\nAdditional validation errors:';
    rest.forEach((problem, index) => {
      message += `\n  ${index + 2}. ${formatPath(problem.path)}: ${problem.message}`;
    });
    suggestions.push(`Fix all ${rest.length + 1} validation errors listed above`);
  }

  return new ValidationError(message, resourceKind, fieldPath, suggestions);
}
