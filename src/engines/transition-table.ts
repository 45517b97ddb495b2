import type { TerminalKind } from '../interfaces/workflow-definition.interface';
import {
  validateWorkflowDefinition,
  WorkflowGraph,
} from '../utils/validate-workflow-definition';

export interface TransitionEdge<S extends string = string> {
  from: S;
  to: S;
}

/**
 * Adjacency of a validated workflow graph. Construction throws
 * ConfigurationError when the graph is malformed; an instance is never
 * modified afterwards.
 */
export class TransitionTable<S extends string = string> {
  readonly workflowId: string;
  readonly initial: S;
  readonly states: readonly S[];

  private readonly stateSet: ReadonlySet<string>;
  private readonly adjacency = new Map<S, ReadonlySet<S>>();
  private readonly terminalKinds = new Map<S, TerminalKind>();
  private readonly none: ReadonlySet<S> = new Set<S>();

  constructor(definition: WorkflowGraph<S>) {
    validateWorkflowDefinition(definition);

    this.workflowId = definition.id;
    this.initial = definition.initial;
    this.states = Object.freeze([...definition.states]);
    this.stateSet = new Set<string>(definition.states);

    for (const state of definition.states) {
      this.adjacency.set(state, new Set(definition.transitions[state] ?? []));
    }
    for (const state of definition.terminal.completed) {
      this.terminalKinds.set(state, 'completed');
    }
    for (const state of definition.terminal.rejected) {
      this.terminalKinds.set(state, 'rejected');
    }
  }

  has(state: string): state is S {
    return this.stateSet.has(state);
  }

  isStructurallyValid(source: S, destination: S): boolean {
    return this.outgoing(source).has(destination);
  }

  outgoing(source: S): ReadonlySet<S> {
    return this.adjacency.get(source) ?? this.none;
  }

  isTerminal(state: S): boolean {
    return this.has(state) && this.outgoing(state).size === 0;
  }

  terminalKind(state: S): TerminalKind | null {
    return this.terminalKinds.get(state) ?? null;
  }

  edges(): TransitionEdge<S>[] {
    const edges: TransitionEdge<S>[] = [];
    for (const from of this.states) {
      for (const to of this.outgoing(from)) {
        edges.push({ from, to });
      }
    }
    return edges;
  }
}
