export { LifecycleOrchestrator } from './orchestrator.js';
export type {
  AbsentOutcome,
  LifecycleOperation,
  LifecycleOutcome,
  OperationOptions,
  OrchestratorOptions,
  PresentOutcome,
  ResourceDefinition,
  WaitDefinition,
} from './types.js';
