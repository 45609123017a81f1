/**
 * Kubernetes Error Handling Utilities
 *
 * Centralized handling of Kubernetes API errors. Supports the request-based
 * errors of the 0.x client and the fetch-based `ApiException` of 1.x.
 */

import { getComponentLogger } from '../logging/index.js';
import { getStatusBody, hasStatusCode, isRecord } from './type-guards.js';

const logger = getComponentLogger('kubernetes-errors');

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * Checked in order:
 * - `statusCode` (0.x style)
 * - `code` (1.x `ApiException`)
 * - `response.statusCode`
 * - `body.code` (the `Status` object of the response)
 *
 * @example
 * ```typescript
 * try {
 *   await api.read(resource);
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // Handle not found
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  if (typeof error.code === 'number') {
    return error.code;
  }

  if (hasStatusCode(error.response)) {
    return error.response.statusCode;
  }

  const bodyCode = getStatusBody(error)?.code;
  if (typeof bodyCode === 'number') {
    return bodyCode;
  }

  logger.debug('Could not extract status code from error', {
    hasStatusCode: 'statusCode' in error,
    hasResponse: 'response' in error,
    hasBody: 'body' in error,
    errorKeys: Object.keys(error),
  });

  return undefined;
}

/**
 * Extract the error reason (`NotFound`, `AlreadyExists`, ...) from a
 * Kubernetes API error.
 */
export function getErrorReason(error: unknown): string | undefined {
  return getStatusBody(error)?.reason;
}

/**
 * Best available human-readable message of an error.
 */
export function getErrorMessage(error: unknown): string {
  const bodyMessage = getStatusBody(error)?.message;
  if (bodyMessage) {
    return bodyMessage;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Format a Kubernetes API error into a human-readable message.
 *
 * @example
 * ```typescript
 * formatKubernetesError({ code: 404, body: { reason: 'NotFound', message: 'gone' } });
 * // "Kubernetes API error (404): NotFound: gone"
 * ```
 */
export function formatKubernetesError(error: unknown): string {
  if (!isRecord(error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const parts: string[] = [];

  if (statusCode !== undefined) {
    parts.push(`Kubernetes API error (${statusCode})`);
  } else {
    parts.push('Kubernetes API error');
  }

  const reason = getErrorReason(error);
  if (reason) {
    parts.push(reason);
  }

  parts.push(getErrorMessage(error));

  return parts.join(': ');
}
