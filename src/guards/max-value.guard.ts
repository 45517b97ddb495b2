import { ConfigurationError } from '../errors/configuration.error';
import type {
  TransitionGuard,
  WorkflowEntity,
} from '../interfaces/transition.interface';

export interface MaxValueGuardOptions<E> {
  /** Defaults to `max-<label>`. */
  name?: string;
  /** Used in denial reasons, e.g. "Amount". */
  label: string;
  max: number;
  select: (entity: Readonly<E>) => number | null | undefined;
}

/**
 * Denies when the selected number is missing or above `max`. The limit is
 * supplied by the embedding service.
 */
export function createMaxValueGuard<
  S extends string,
  E extends WorkflowEntity<S>,
>(options: MaxValueGuardOptions<E>): TransitionGuard<S, E> {
  if (!Number.isFinite(options.max)) {
    throw new ConfigurationError(undefined, [
      `max value guard "${options.label}" needs a finite max`,
    ]);
  }

  return {
    name: options.name ?? `max-${options.label.toLowerCase().replace(/\s+/g, '-')}`,
    check: ({ entity }) => {
      const value = options.select(entity);
      if (typeof value !== 'number' || Number.isNaN(value)) {
        return { allowed: false, reason: `${options.label} is not set` };
      }
      if (value > options.max) {
        return {
          allowed: false,
          reason: `${options.label} ${value} exceeds the limit of ${options.max}`,
        };
      }
      return { allowed: true };
    },
  };
}
