import { type } from 'arktype';
import { formatArktypeError, ValidationError } from '../../core/errors.js';
import type { AnomalyMonitorSpec } from './types.js';

export const anomalyMonitorSpecSchema = type({
  name: 'string > 0',
  type: "'DIMENSIONAL' | 'CUSTOM'",
  'dimension?': "'SERVICE'",
  'specification?': 'string',
  'tags?': 'Record<string, string>',
});

function isJsonObject(text: string): boolean {
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed);
  } catch {
    return false;
  }
}

/**
 * @throws ValidationError
 */
export function validateAnomalyMonitorSpec(input: unknown): AnomalyMonitorSpec {
  const spec = anomalyMonitorSpecSchema(input);
  if (spec instanceof type.errors) {
    throw formatArktypeError(spec, 'AnomalyMonitor');
  }

  if (spec.type === 'DIMENSIONAL' && spec.dimension === undefined) {
    throw new ValidationError(
      "Invalid AnomalyMonitor at field 'dimension': required when type is DIMENSIONAL",
      'AnomalyMonitor',
      'dimension',
      ["Set dimension to 'SERVICE'"]
    );
  }

  if (spec.type === 'CUSTOM') {
    if (spec.specification === undefined || !isJsonObject(spec.specification)) {
      throw new ValidationError(
        "Invalid AnomalyMonitor at field 'specification': must be a JSON object when type is CUSTOM",
        'AnomalyMonitor',
        'specification',
        ['Provide the cost category expression as a JSON document']
      );
    }
  }

  return spec;
}
