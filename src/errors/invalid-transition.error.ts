import { TransitionRejectedError } from './transition-rejected.error';

export class InvalidTransitionError extends TransitionRejectedError {
  readonly code = 'INVALID_TRANSITION' as const;

  constructor(
    entityId: string,
    fromState: string,
    toState: string,
    public readonly allowed: readonly string[],
    public readonly unknownState = false,
  ) {
    super(
      entityId,
      fromState,
      toState,
      unknownState
        ? `Entity ${entityId} reports unknown state "${fromState}".`
        : `Transition from "${fromState}" to "${toState}" is not allowed for entity ${entityId}. ` +
            `Allowed: ${allowed.length > 0 ? allowed.join(', ') : '(none)'}.`,
    );
    this.name = 'InvalidTransitionError';
  }
}
