/**
 * Kubernetes Type Guards
 *
 * Guards for validating Kubernetes API response and error shapes, which differ
 * between client versions.
 */

/**
 * Shape of a Kubernetes `Status` body returned with failed requests.
 */
export interface KubernetesStatusBody {
  code?: number;
  message?: string;
  reason?: string;
  details?: unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if an object has a numeric statusCode property.
 */
export function hasStatusCode(obj: unknown): obj is { statusCode: number } {
  return isRecord(obj) && typeof obj.statusCode === 'number';
}

/**
 * Read the `Status` body of a failed request.
 *
 * The 1.x client parses the body before throwing `ApiException`, but some
 * paths leave it as raw JSON text.
 */
export function getStatusBody(error: unknown): KubernetesStatusBody | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  let body = error.body;
  if (typeof body === 'string') {
    const text = body;
    try {
      body = JSON.parse(text);
    } catch {
      return { message: text };
    }
  }

  if (!isRecord(body)) {
    return undefined;
  }

  return {
    ...(typeof body.code === 'number' && { code: body.code }),
    ...(typeof body.message === 'string' && { message: body.message }),
    ...(typeof body.reason === 'string' && { reason: body.reason }),
    ...('details' in body && { details: body.details }),
  };
}
