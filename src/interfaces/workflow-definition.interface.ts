import type { TransitionGuard, WorkflowEntity } from './transition.interface';

export type TerminalKind = 'completed' | 'rejected';

export interface TerminalStates<S extends string = string> {
  /** States that represent successful completion. At least one. */
  completed: readonly S[];
  /** States that represent a rejected or aborted workflow. At least one. */
  rejected: readonly S[];
}

export interface GuardRegistration<
  S extends string = string,
  E extends WorkflowEntity<S> = WorkflowEntity<S>,
> {
  from: S;
  to: S;
  guard: TransitionGuard<S, E>;
}

export interface WorkflowDefinition<
  S extends string = string,
  E extends WorkflowEntity<S> = WorkflowEntity<S>,
> {
  id: string;
  /** Closed state universe, in declaration order. */
  states: readonly S[];
  /** Entry state used for the reachability check. */
  initial: S;
  /** Direct successors per state. Terminal states have none. */
  transitions: Readonly<Partial<Record<S, readonly S[]>>>;
  terminal: TerminalStates<S>;
  /** Evaluated in array order for each edge. */
  guards?: readonly GuardRegistration<S, E>[];
}
