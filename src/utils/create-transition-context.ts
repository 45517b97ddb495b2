import { InvalidContextError } from '../errors/invalid-context.error';
import type {
  TransitionContext,
  TransitionContextInput,
} from '../interfaces/transition.interface';
import { deepFreeze } from './deep-freeze';

/**
 * Builds the frozen context carried by guards and audit records. Inputs
 * are copied, so later changes by the caller do not leak into records.
 * `attemptedAt` hands out a fresh Date on every read.
 */
export function createTransitionContext(
  input: TransitionContext | TransitionContextInput,
  now: () => Date = () => new Date(),
): TransitionContext {
  if (typeof input.actor !== 'string' || input.actor.trim().length === 0) {
    throw new InvalidContextError('Transition context requires a non-empty actor');
  }

  const attemptedAt = (input.attemptedAt ?? now()).getTime();
  if (Number.isNaN(attemptedAt)) {
    throw new InvalidContextError(
      'Transition context attemptedAt must be a valid date',
    );
  }

  let metadata: Readonly<Record<string, unknown>> | undefined;
  if (input.metadata !== undefined) {
    try {
      metadata = deepFreeze(structuredClone(input.metadata));
    } catch (error) {
      throw new InvalidContextError(
        `Transition context metadata must be cloneable: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  return Object.freeze({
    actor: input.actor,
    get attemptedAt(): Date {
      return new Date(attemptedAt);
    },
    ...(input.notes !== undefined ? { notes: input.notes } : {}),
    ...(metadata !== undefined ? { metadata } : {}),
  });
}
