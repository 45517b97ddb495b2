import type { AuditRecord } from './audit-sink.interface';
import type { TerminalKind } from './workflow-definition.interface';

export interface WorkflowEntity<S extends string = string> {
  readonly id: string;
  state: S;
}

export interface TransitionContext {
  readonly actor: string;
  readonly notes?: string;
  readonly attemptedAt: Date;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface TransitionContextInput {
  actor: string;
  notes?: string;
  /** Defaults to the time the context is created. */
  attemptedAt?: Date;
  metadata?: Record<string, unknown>;
}

export interface GuardResult {
  allowed: boolean;
  /** Human-readable; surfaced to the caller on denial. */
  reason?: string;
}

export interface GuardInput<
  S extends string = string,
  E extends WorkflowEntity<S> = WorkflowEntity<S>,
> {
  entity: Readonly<E>;
  from: S;
  to: S;
  context: TransitionContext;
}

export interface TransitionGuard<
  S extends string = string,
  E extends WorkflowEntity<S> = WorkflowEntity<S>,
> {
  name: string;
  check(input: GuardInput<S, E>): GuardResult | Promise<GuardResult>;
}

export type GuardEvaluation =
  | { allowed: true }
  | { allowed: false; guard: string; reason: string };

export interface TransitionOutcome<S extends string = string> {
  entityId: string;
  fromState: S;
  toState: S;
  /** Set when the destination is a terminal state. */
  terminal: TerminalKind | null;
  record: AuditRecord<S>;
}
