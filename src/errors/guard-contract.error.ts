import { WorkflowError } from './workflow.error';

export class GuardContractError extends WorkflowError {
  readonly code = 'GUARD_CONTRACT' as const;

  constructor(
    public readonly guard: string,
    public readonly fromState: string,
    public readonly toState: string,
  ) {
    super(
      `Guard "${guard}" on ${fromState} -> ${toState} must return { allowed: boolean, reason?: string }`,
    );
    this.name = 'GuardContractError';
  }
}
