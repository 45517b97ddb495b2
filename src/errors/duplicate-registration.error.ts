import { WorkflowError } from './workflow.error';

export class DuplicateRegistrationError extends WorkflowError {
  readonly code = 'DUPLICATE_REGISTRATION' as const;

  constructor(
    public readonly workflowId: string,
    public readonly source1: string,
    public readonly source2: string,
  ) {
    super(
      `Duplicate workflow id "${workflowId}". ` +
        `Both ${source1} and ${source2} register the same id.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
