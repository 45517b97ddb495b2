import { GuardDeniedError } from '../errors/guard-denied.error';
import { InvalidTransitionError } from '../errors/invalid-transition.error';
import { TerminalStateError } from '../errors/terminal-state.error';
import type { TransitionRejectedError } from '../errors/transition-rejected.error';
import type { AuditRecord } from '../interfaces/audit-sink.interface';
import type {
  TransitionContext,
  TransitionContextInput,
  TransitionOutcome,
  WorkflowEntity,
} from '../interfaces/transition.interface';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import { createTransitionContext } from '../utils/create-transition-context';
import { GuardRegistry } from './guard-registry';
import { TransitionTable } from './transition-table';

export interface TransitionEngineOptions {
  /** Clock for record timestamps and defaulted attempt times. */
  now?: () => Date;
}

export type TransitionCheck =
  | { allowed: true }
  | { allowed: false; error: TransitionRejectedError };

/**
 * Decides and commits transitions for one workflow definition.
 *
 * The engine reads and writes `entity.state` within a single call but does
 * not lock: callers must serialize attempts on the same entity.
 */
export class TransitionEngine<
  S extends string = string,
  E extends WorkflowEntity<S> = WorkflowEntity<S>,
> {
  readonly table: TransitionTable<S>;
  readonly guards: GuardRegistry<S, E>;

  private readonly now: () => Date;
  private sequence = 0;

  constructor(
    definition: WorkflowDefinition<S, E>,
    options: TransitionEngineOptions = {},
  ) {
    this.table = new TransitionTable(definition);
    this.guards = new GuardRegistry<S, E>(this.table);
    for (const registration of definition.guards ?? []) {
      this.guards.register(
        registration.from,
        registration.to,
        registration.guard,
      );
    }
    this.now = options.now ?? (() => new Date());
  }

  get workflowId(): string {
    return this.table.workflowId;
  }

  async attempt(
    entity: E,
    destination: S,
    input: TransitionContext | TransitionContextInput,
  ): Promise<TransitionOutcome<S>> {
    const context = createTransitionContext(input, this.now);
    const fromState = entity.state;

    const rejection = await this.evaluate(entity, fromState, destination, context);
    if (rejection) {
      throw rejection;
    }

    entity.state = destination;
    const record = this.buildRecord(entity.id, fromState, destination, context);

    return {
      entityId: entity.id,
      fromState,
      toState: destination,
      terminal: this.table.terminalKind(destination),
      record,
    };
  }

  /** Same decision as attempt() without touching the entity. */
  async check(
    entity: E,
    destination: S,
    input: TransitionContext | TransitionContextInput,
  ): Promise<TransitionCheck> {
    const context = createTransitionContext(input, this.now);
    const error = await this.evaluate(entity, entity.state, destination, context);
    return error ? { allowed: false, error } : { allowed: true };
  }

  /** Destinations whose guards currently pass, in declaration order. */
  async permittedDestinations(
    entity: E,
    input: TransitionContext | TransitionContextInput,
  ): Promise<S[]> {
    const context = createTransitionContext(input, this.now);
    const source = entity.state;
    if (!this.table.has(source) || this.table.isTerminal(source)) {
      return [];
    }

    const permitted: S[] = [];
    for (const destination of this.table.outgoing(source)) {
      const verdict = await this.guards.evaluate(
        source,
        destination,
        entity,
        context,
      );
      if (verdict.allowed) {
        permitted.push(destination);
      }
    }
    return permitted;
  }

  private async evaluate(
    entity: E,
    fromState: S,
    destination: S,
    context: TransitionContext,
  ): Promise<TransitionRejectedError | null> {
    if (!this.table.has(fromState)) {
      return new InvalidTransitionError(entity.id, fromState, destination, [], true);
    }

    if (this.table.isTerminal(fromState)) {
      return new TerminalStateError(entity.id, fromState, destination);
    }

    if (!this.table.isStructurallyValid(fromState, destination)) {
      return new InvalidTransitionError(entity.id, fromState, destination, [
        ...this.table.outgoing(fromState),
      ]);
    }

    const verdict = await this.guards.evaluate(
      fromState,
      destination,
      entity,
      context,
    );
    if (!verdict.allowed) {
      return new GuardDeniedError(
        entity.id,
        fromState,
        destination,
        verdict.guard,
        verdict.reason,
      );
    }

    return null;
  }

  private buildRecord(
    entityId: string,
    fromState: S,
    toState: S,
    context: TransitionContext,
  ): AuditRecord<S> {
    this.sequence += 1;
    const recordedAt = this.now().getTime();
    return Object.freeze({
      sequence: this.sequence,
      workflowId: this.table.workflowId,
      entityId,
      fromState,
      toState,
      context,
      get recordedAt(): Date {
        return new Date(recordedAt);
      },
    });
  }
}
