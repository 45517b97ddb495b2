import { WorkflowError } from './workflow.error';

/**
 * Base for every rejection of a single attempt. Rejections are
 * deterministic: the same entity state and destination always produce the
 * same error, so they are never retryable as-is.
 */
export abstract class TransitionRejectedError extends WorkflowError {
  readonly retryable = false as const;

  protected constructor(
    public readonly entityId: string,
    public readonly fromState: string,
    public readonly toState: string,
    message: string,
  ) {
    super(message);
  }
}
