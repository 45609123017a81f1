export { DEFAULT_POLLING_OPTIONS, waitForState } from './engine.js';
export { createRefresh, statusFromField, UNKNOWN_STATUS } from './status.js';
export type {
  ConvergenceEvent,
  ConvergenceRequest,
  ConvergenceResult,
  PollingOptions,
  Refreshable,
  RefreshResult,
  StatusExtractor,
} from './types.js';
