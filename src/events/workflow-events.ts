import type { WorkflowErrorCode } from '../errors/workflow.error';
import type { AuditRecord } from '../interfaces/audit-sink.interface';
import type { TerminalKind } from '../interfaces/workflow-definition.interface';

export interface WorkflowTransitionEvent {
  workflowId: string;
  entityId: string;
  fromState: string;
  toState: string;
  terminal: TerminalKind | null;
  actor: string;
  record: AuditRecord;
  timestamp: Date;
}

export interface WorkflowTransitionRejectedEvent {
  workflowId: string;
  entityId: string;
  fromState: string;
  toState: string;
  code: WorkflowErrorCode;
  reason: string;
  /** Set for guard denials. */
  guard?: string;
  actor: string;
  timestamp: Date;
}
