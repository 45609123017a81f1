export {
  DEFAULT_CONVERGENCE_CONFIG,
  DEFAULT_CONVERGENCE_TIMEOUT,
  getConvergenceConfigFromEnv,
  validateConvergenceConfig,
} from './convergence.js';
export type { ConvergenceConfig } from './convergence.js';
export { loadAbsenceTable, parseAbsenceTable } from './absence.js';
