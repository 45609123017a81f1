/**
 * "Already absent" error signatures
 *
 * Which remote errors mean the object does not exist is decided per resource
 * kind and per remote call. A missing object, a missing parent container and
 * an unreachable network are not assumed to be equivalent: each kind lists the
 * signatures it tolerates for each call.
 */

import { getErrorMessage, getErrorReason, getErrorStatusCode } from '../kubernetes/errors.js';

export type AbsenceCall = 'describe' | 'delete' | 'wait';

export const ABSENCE_CALLS: readonly AbsenceCall[] = ['describe', 'delete', 'wait'];

/**
 * An error matches when every field that is set matches.
 */
export interface AbsenceSignature {
  statusCode?: number;
  /**
   * Kubernetes `Status.reason`, e.g. `NotFound`
   */
  reason?: string;
  /**
   * Substring of the error message
   */
  message?: string;
}

export type AbsenceSignatures = Partial<Record<AbsenceCall, readonly AbsenceSignature[]>>;

/**
 * Signatures keyed by resource kind
 */
export type AbsenceTable = Record<string, AbsenceSignatures>;

export function matchesSignature(error: unknown, signature: AbsenceSignature): boolean {
  const { statusCode, reason, message } = signature;

  // An empty signature would match every failure.
  if (statusCode === undefined && reason === undefined && message === undefined) {
    return false;
  }

  if (statusCode !== undefined && getErrorStatusCode(error) !== statusCode) {
    return false;
  }
  if (reason !== undefined && getErrorReason(error) !== reason) {
    return false;
  }
  if (message !== undefined && !getErrorMessage(error).includes(message)) {
    return false;
  }
  return true;
}

export function matchesAbsence(
  error: unknown,
  signatures: readonly AbsenceSignature[] | undefined
): boolean {
  return (signatures ?? []).some((signature) => matchesSignature(error, signature));
}

/**
 * Overlay `overrides` on `base`. A call listed for a kind in `overrides`
 * replaces that call's signatures; other calls and kinds are kept.
 */
export function mergeAbsenceTables(base: AbsenceTable, overrides: AbsenceTable): AbsenceTable {
  const merged: AbsenceTable = { ...base };
  for (const [kind, signatures] of Object.entries(overrides)) {
    merged[kind] = { ...merged[kind], ...signatures };
  }
  return merged;
}
