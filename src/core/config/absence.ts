import { readFileSync } from 'node:fs';
import { type } from 'arktype';
import * as yaml from 'js-yaml';
import { ConfigurationError } from '../errors.js';
import type { AbsenceTable } from '../lookup/index.js';

const absenceSignatureSchema = type({
  'statusCode?': 'number.integer',
  'reason?': 'string > 0',
  'message?': 'string > 0',
}).narrow(
  (signature, ctx) =>
    signature.statusCode !== undefined ||
    signature.reason !== undefined ||
    signature.message !== undefined ||
    ctx.mustBe('a signature with statusCode, reason or message')
);

const absenceTableSchema = type({
  '[string]': {
    'describe?': absenceSignatureSchema.array(),
    'delete?': absenceSignatureSchema.array(),
    'wait?': absenceSignatureSchema.array(),
    '+': 'reject',
  },
});

/**
 * Validate a parsed absence table
 *
 * @throws ConfigurationError
 */
export function parseAbsenceTable(data: unknown, source = 'absence table'): AbsenceTable {
  const result = absenceTableSchema(data);
  if (result instanceof type.errors) {
    throw new ConfigurationError(`Invalid ${source}: ${result.summary}`, source);
  }
  return result;
}

/**
 * Load absence signatures from a YAML file.
 *
 * @example
 * ```yaml
 * ClusterEndpoint:
 *   delete:
 *     - statusCode: 404
 *     - reason: Gone
 * ```
 */
export function loadAbsenceTable(path: string): AbsenceTable {
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read absence table ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse absence table ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  return parseAbsenceTable(data ?? {}, path);
}
