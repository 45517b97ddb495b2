import { WorkflowError } from './workflow.error';

export class WorkflowNotRegisteredError extends WorkflowError {
  readonly code = 'WORKFLOW_NOT_REGISTERED' as const;

  constructor(public readonly workflowId: string) {
    super(`No workflow registered with id "${workflowId}".`);
    this.name = 'WorkflowNotRegisteredError';
  }
}
