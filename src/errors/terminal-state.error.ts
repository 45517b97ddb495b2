import { TransitionRejectedError } from './transition-rejected.error';

export class TerminalStateError extends TransitionRejectedError {
  readonly code = 'TERMINAL_STATE' as const;

  constructor(entityId: string, fromState: string, toState: string) {
    super(
      entityId,
      fromState,
      toState,
      `Entity ${entityId} is in terminal state "${fromState}" and cannot move to "${toState}".`,
    );
    this.name = 'TerminalStateError';
  }
}
