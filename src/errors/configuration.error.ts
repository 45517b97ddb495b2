import { WorkflowError } from './workflow.error';

export class ConfigurationError extends WorkflowError {
  readonly code = 'CONFIGURATION_ERROR' as const;

  /** `workflowId` is undefined for settings that belong to no single definition. */
  constructor(
    public readonly workflowId: string | undefined,
    public readonly problems: readonly string[],
  ) {
    super(
      workflowId === undefined
        ? `Invalid workflow configuration: ${problems.join('; ')}`
        : `Workflow definition ${workflowId} is invalid: ${problems.join('; ')}`,
    );
    this.name = 'ConfigurationError';
  }
}
