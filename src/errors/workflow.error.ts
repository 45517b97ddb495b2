export type WorkflowErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'INVALID_CONTEXT'
  | 'TERMINAL_STATE'
  | 'INVALID_TRANSITION'
  | 'GUARD_DENIED'
  | 'GUARD_CONTRACT'
  | 'AUDIT_EMISSION_FAILED'
  | 'WORKFLOW_NOT_REGISTERED'
  | 'DUPLICATE_REGISTRATION';

export abstract class WorkflowError extends Error {
  abstract readonly code: WorkflowErrorCode;
}
