import { TransitionRejectedError } from './transition-rejected.error';

export class GuardDeniedError extends TransitionRejectedError {
  readonly code = 'GUARD_DENIED' as const;

  constructor(
    entityId: string,
    fromState: string,
    toState: string,
    public readonly guard: string,
    public readonly reason: string,
  ) {
    super(entityId, fromState, toState, reason);
    this.name = 'GuardDeniedError';
  }
}
