import { WorkflowError } from './workflow.error';
import type { TransitionOutcome } from '../interfaces/transition.interface';

export class AuditEmissionError extends WorkflowError {
  readonly code = 'AUDIT_EMISSION_FAILED' as const;

  constructor(
    public readonly outcome: TransitionOutcome,
    cause: unknown,
  ) {
    super(
      `Transition ${outcome.fromState} -> ${outcome.toState} for entity ${outcome.entityId} ` +
        `was committed but its audit record (#${outcome.record.sequence}) could not be recorded: ` +
        (cause instanceof Error ? cause.message : String(cause)),
      { cause },
    );
    this.name = 'AuditEmissionError';
  }
}
