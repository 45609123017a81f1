/**
 * convergent core - consolidated exports
 */

// =============================================================================
// Configuration
// =============================================================================
export {
  DEFAULT_CONVERGENCE_CONFIG,
  DEFAULT_CONVERGENCE_TIMEOUT,
  getConvergenceConfigFromEnv,
  loadAbsenceTable,
  parseAbsenceTable,
  validateConvergenceConfig,
  type ConvergenceConfig,
} from './core/config/index.js';
// =============================================================================
// Convergence Engine
// =============================================================================
export {
  createRefresh,
  DEFAULT_POLLING_OPTIONS,
  statusFromField,
  UNKNOWN_STATUS,
  waitForState,
  type ConvergenceEvent,
  type ConvergenceRequest,
  type ConvergenceResult,
  type PollingOptions,
  type Refreshable,
  type RefreshResult,
  type StatusExtractor,
} from './core/convergence/index.js';
// =============================================================================
// Errors
// =============================================================================
export {
  ConfigurationError,
  ConvergenceCancelledError,
  ConvergenceError,
  ConvergenceNotFoundError,
  ConvergenceTimeoutError,
  ConvergentError,
  formatArktypeError,
  InvalidConvergenceRequestError,
  MalformedIdentifierError,
  RemoteOperationError,
  ResourceNotFoundError,
  UnexpectedStateError,
  ValidationError,
  type OperationContext,
  type RemoteCall,
} from './core/errors.js';
// =============================================================================
// Identifiers
// =============================================================================
export {
  createIdentifierCodec,
  DEFAULT_IDENTIFIER_SEPARATOR,
  type IdentifierCodec,
  type IdentifierCodecOptions,
} from './core/identifier/index.js';
// =============================================================================
// Kubernetes
// =============================================================================
export {
  createKubernetesClientProvider,
  formatKubernetesError,
  getErrorStatusCode,
  KubernetesClientProvider,
  type KubernetesClientConfig,
} from './core/kubernetes/index.js';
// =============================================================================
// Lifecycle
// =============================================================================
export {
  LifecycleOrchestrator,
  type AbsentOutcome,
  type LifecycleOperation,
  type LifecycleOutcome,
  type OperationOptions,
  type OrchestratorOptions,
  type PresentOutcome,
  type ResourceDefinition,
  type WaitDefinition,
} from './core/lifecycle/index.js';
// =============================================================================
// Logging
// =============================================================================
export {
  createLogger,
  getComponentLogger,
  getResourceLogger,
  type ConvergentLogger,
  type LoggerConfig,
} from './core/logging/index.js';
// =============================================================================
// Lookup
// =============================================================================
export {
  createLookup,
  matchesAbsence,
  mergeAbsenceTables,
  type AbsenceCall,
  type AbsenceSignature,
  type AbsenceSignatures,
  type AbsenceTable,
  type Lookup,
  type LookupResult,
} from './core/lookup/index.js';
