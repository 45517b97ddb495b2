import type { TransitionContext } from './transition.interface';

export interface AuditRecord<S extends string = string> {
  readonly sequence: number;
  readonly workflowId: string;
  readonly entityId: string;
  readonly fromState: S;
  readonly toState: S;
  readonly context: TransitionContext;
  readonly recordedAt: Date;
}

export interface IAuditSink {
  /**
   * Receive one committed transition. The state change has already been
   * applied when this is called and is not reverted if it fails.
   */
  record(record: AuditRecord): void | Promise<void>;
}
