import { ConfigurationError } from '../errors/configuration.error';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';

/** The structural part of a definition; guards are checked by the registry. */
export type WorkflowGraph<S extends string = string> = Pick<
  WorkflowDefinition<S>,
  'id' | 'states' | 'initial' | 'transitions' | 'terminal'
>;

function reachableFrom(
  start: Iterable<string>,
  edges: Map<string, readonly string[]>,
): Set<string> {
  const seen = new Set<string>(start);
  const queue = [...seen];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of edges.get(current) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return seen;
}

/**
 * Returns every problem found in the graph, in a stable order. An empty
 * list means the definition is usable.
 */
export function collectDefinitionProblems<S extends string>(
  definition: WorkflowGraph<S>,
): string[] {
  const problems: string[] = [];

  if (typeof definition.id !== 'string' || definition.id.length === 0) {
    problems.push('id must be a non-empty string');
  }

  const universe = new Set<string>();
  for (const state of definition.states) {
    if (universe.has(state)) {
      problems.push(`state "${state}" is declared more than once`);
    }
    universe.add(state);
  }
  if (universe.size === 0) {
    problems.push('at least one state must be declared');
  }

  const assertKnown = (state: string, where: string): void => {
    if (!universe.has(state)) {
      problems.push(`${where} references unknown state "${state}"`);
    }
  };

  assertKnown(definition.initial, 'initial');

  const completed = definition.terminal.completed;
  const rejected = definition.terminal.rejected;
  if (completed.length === 0) {
    problems.push('at least one completed terminal state must be declared');
  }
  if (rejected.length === 0) {
    problems.push('at least one rejected terminal state must be declared');
  }
  for (const state of completed) {
    assertKnown(state, 'terminal.completed');
    if (rejected.includes(state)) {
      problems.push(`state "${state}" is declared both completed and rejected`);
    }
  }
  for (const state of rejected) {
    assertKnown(state, 'terminal.rejected');
  }
  const terminal = new Set<string>([...completed, ...rejected]);

  for (const key of Object.keys(definition.transitions)) {
    if (!universe.has(key)) {
      problems.push(`transitions references unknown state "${key}"`);
    }
  }

  const forward = new Map<string, readonly string[]>();
  const backward = new Map<string, string[]>();
  for (const state of universe) {
    backward.set(state, []);
  }

  const visited = new Set<string>();
  for (const state of definition.states) {
    if (visited.has(state)) continue;
    visited.add(state);

    const destinations: readonly string[] = definition.transitions[state] ?? [];
    const listed = new Set<string>();
    for (const destination of destinations) {
      if (listed.has(destination)) {
        problems.push(
          `state "${state}" lists destination "${destination}" more than once`,
        );
      }
      listed.add(destination);
      assertKnown(destination, `state "${state}"`);
    }

    if (terminal.has(state) && destinations.length > 0) {
      problems.push(
        `terminal state "${state}" must not have outgoing transitions`,
      );
    }
    if (!terminal.has(state) && destinations.length === 0) {
      problems.push(`non-terminal state "${state}" has no outgoing transitions`);
    }

    const known = [...listed].filter((destination) => universe.has(destination));
    forward.set(state, known);
    for (const destination of known) {
      backward.get(destination)?.push(state);
    }
  }

  if (universe.has(definition.initial)) {
    const reachable = reachableFrom([definition.initial], forward);
    for (const state of universe) {
      if (!reachable.has(state)) {
        problems.push(
          `state "${state}" is not reachable from initial state "${definition.initial}"`,
        );
      }
    }
  }

  const exits = [...terminal].filter(
    (state) => universe.has(state) && (forward.get(state) ?? []).length === 0,
  );
  const canFinish = reachableFrom(exits, backward);
  for (const state of universe) {
    const dangling = (forward.get(state) ?? []).length === 0;
    if (!terminal.has(state) && !dangling && !canFinish.has(state)) {
      problems.push(`state "${state}" cannot reach any terminal state`);
    }
  }

  return problems;
}

export function validateWorkflowDefinition<S extends string>(
  definition: WorkflowGraph<S>,
): void {
  const problems = collectDefinitionProblems(definition);
  if (problems.length > 0) {
    throw new ConfigurationError(String(definition.id), problems);
  }
}
