import { type } from 'arktype';
import { formatArktypeError } from '../../core/errors.js';
import type { ClusterEndpointSpec } from './types.js';

/**
 * Lowercase letters, digits and hyphens, starting with a letter. No dot, which
 * separates the two identifiers in object names.
 */
const IDENTIFIER_PATTERN = /^[a-z][0-9a-z-]*$/;

/**
 * The cluster identifier is stored as a label value
 */
const MAX_IDENTIFIER_LENGTH = 63;

const identifier = type('string').narrow(
  (value, ctx) =>
    value.length <= MAX_IDENTIFIER_LENGTH ||
    ctx.mustBe(`at most ${MAX_IDENTIFIER_LENGTH} characters long`)
);

export const clusterEndpointSpecSchema = type({
  clusterIdentifier: identifier.narrow(
    (value, ctx) => IDENTIFIER_PATTERN.test(value) || ctx.mustBe('a valid cluster identifier')
  ),
  clusterEndpointIdentifier: identifier.narrow(
    (value, ctx) => IDENTIFIER_PATTERN.test(value) || ctx.mustBe('a valid endpoint identifier')
  ),
  endpointType: "'READER' | 'WRITER' | 'ANY'",
  'staticMembers?': 'string[]',
  'excludedMembers?': 'string[]',
  'tags?': 'Record<string, string>',
});

/**
 * @throws ValidationError
 */
export function validateClusterEndpointSpec(spec: unknown): ClusterEndpointSpec {
  const result = clusterEndpointSpecSchema(spec);
  if (result instanceof type.errors) {
    throw formatArktypeError(result, 'ClusterEndpoint');
  }
  return result;
}
