import type {
  TransitionGuard,
  WorkflowEntity,
} from '../interfaces/transition.interface';

export function requireNotesGuard<
  S extends string,
  E extends WorkflowEntity<S>,
>(name = 'require-notes'): TransitionGuard<S, E> {
  return {
    name,
    check: ({ from, to, context }) =>
      context.notes && context.notes.trim().length > 0
        ? { allowed: true }
        : { allowed: false, reason: `Notes are required to move from ${from} to ${to}` },
  };
}
