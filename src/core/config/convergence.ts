import { type } from 'arktype';
import { DEFAULT_POLLING_OPTIONS } from '../convergence/engine.js';
import { ConfigurationError } from '../errors.js';

/**
 * Maximum time to wait for an object to reach its target state or disappear
 */
export const DEFAULT_CONVERGENCE_TIMEOUT = 10 * 60 * 1000;

const convergenceConfigSchema = type({
  timeout: 'number > 0',
  initialInterval: 'number > 0',
  maxInterval: 'number > 0',
  backoffMultiplier: 'number >= 1',
});

export type ConvergenceConfig = typeof convergenceConfigSchema.infer;

export const DEFAULT_CONVERGENCE_CONFIG: ConvergenceConfig = {
  timeout: DEFAULT_CONVERGENCE_TIMEOUT,
  initialInterval: DEFAULT_POLLING_OPTIONS.initialInterval,
  maxInterval: DEFAULT_POLLING_OPTIONS.maxInterval,
  backoffMultiplier: DEFAULT_POLLING_OPTIONS.backoffMultiplier,
};

const CONFIG_FIELDS = ['timeout', 'initialInterval', 'maxInterval', 'backoffMultiplier'] as const;

const ENV_KEYS: Record<(typeof CONFIG_FIELDS)[number], string> = {
  timeout: 'CONVERGENT_TIMEOUT_MS',
  initialInterval: 'CONVERGENT_POLL_INITIAL_MS',
  maxInterval: 'CONVERGENT_POLL_MAX_MS',
  backoffMultiplier: 'CONVERGENT_POLL_BACKOFF',
};

/**
 * Validate a convergence configuration
 *
 * @throws ConfigurationError naming the offending setting
 */
export function validateConvergenceConfig(
  config: Record<keyof ConvergenceConfig, number>,
  source = 'convergence config'
): ConvergenceConfig {
  const result = convergenceConfigSchema(config);
  if (result instanceof type.errors) {
    throw new ConfigurationError(`Invalid ${source}: ${result.summary}`, source);
  }
  return result;
}

/**
 * Get convergence defaults from environment variables
 */
export function getConvergenceConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConvergenceConfig {
  const config = { ...DEFAULT_CONVERGENCE_CONFIG };

  for (const field of CONFIG_FIELDS) {
    const raw = env[ENV_KEYS[field]];
    if (raw !== undefined && raw.trim() !== '') {
      config[field] = Number(raw);
    }
  }

  return validateConvergenceConfig(config, 'environment');
}
