// Module
export { WorkflowModule } from './workflow.module';

// Services
export { WorkflowManager } from './services/workflow-manager.service';
export type { WorkflowManagerOptions } from './services/workflow-manager.service';
export { WorkflowRegistry } from './services/workflow-registry.service';
export type { RegisteredWorkflow } from './services/workflow-registry.service';

// Decorators
export { Workflow } from './decorators/workflow.decorator';

// Engine
export { TransitionEngine } from './engines/transition-engine';
export type {
  TransitionCheck,
  TransitionEngineOptions,
} from './engines/transition-engine';
export { TransitionTable } from './engines/transition-table';
export type { TransitionEdge } from './engines/transition-table';
export { GuardRegistry } from './engines/guard-registry';

// Guards
export {
  createActorGuard,
  createMaxValueGuard,
  requireNotesGuard,
} from './guards';
export type { ActorGuardOptions, MaxValueGuardOptions } from './guards';

// Interfaces
export type {
  GuardRegistration,
  TerminalKind,
  TerminalStates,
  WorkflowDefinition,
} from './interfaces/workflow-definition.interface';
export type {
  GuardEvaluation,
  GuardInput,
  GuardResult,
  TransitionContext,
  TransitionContextInput,
  TransitionGuard,
  TransitionOutcome,
  WorkflowEntity,
} from './interfaces/transition.interface';
export type {
  AuditRecord,
  IAuditSink,
} from './interfaces/audit-sink.interface';
export type {
  WorkflowModuleOptions,
  WorkflowModuleAsyncOptions,
} from './interfaces/workflow-module-options.interface';

// Adapters
export { InMemoryAuditSink } from './adapters/in-memory-audit-sink.adapter';
export { LoggerAuditSink } from './adapters/logger-audit-sink.adapter';

// Errors
export { WorkflowError } from './errors/workflow.error';
export type { WorkflowErrorCode } from './errors/workflow.error';
export { ConfigurationError } from './errors/configuration.error';
export { InvalidContextError } from './errors/invalid-context.error';
export { TransitionRejectedError } from './errors/transition-rejected.error';
export { TerminalStateError } from './errors/terminal-state.error';
export { InvalidTransitionError } from './errors/invalid-transition.error';
export { GuardDeniedError } from './errors/guard-denied.error';
export { GuardContractError } from './errors/guard-contract.error';
export { AuditEmissionError } from './errors/audit-emission.error';
export { WorkflowNotRegisteredError } from './errors/workflow-not-registered.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';

// Events
export { WorkflowEventType } from './events/workflow-event-type.enum';
export type {
  WorkflowTransitionEvent,
  WorkflowTransitionRejectedEvent,
} from './events/workflow-events';

// Utils
export { createTransitionContext } from './utils/create-transition-context';
export {
  collectDefinitionProblems,
  validateWorkflowDefinition,
} from './utils/validate-workflow-definition';
export type { WorkflowGraph } from './utils/validate-workflow-definition';
export { KeyedLock } from './utils/keyed-lock';
export { deepFreeze } from './utils/deep-freeze';

// Constants
export {
  WORKFLOW_MODULE_OPTIONS,
  WORKFLOW_AUDIT_SINK,
  WORKFLOW_DEFINITION_METADATA,
  DEFAULT_SERIALIZE_BY_ENTITY,
} from './workflow.constants';
