import { WorkflowError } from './workflow.error';

export class InvalidContextError extends WorkflowError {
  readonly code = 'INVALID_CONTEXT' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidContextError';
  }
}
