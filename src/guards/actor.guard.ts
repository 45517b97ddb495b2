import type {
  TransitionGuard,
  WorkflowEntity,
} from '../interfaces/transition.interface';

export interface ActorGuardOptions {
  name?: string;
  /** Actor ids, or a predicate that may consult an external directory. */
  allow: readonly string[] | ((actor: string) => boolean | Promise<boolean>);
  /** Completes "Actor "x" is not ...", e.g. "a credit officer". */
  description: string;
}

export function createActorGuard<
  S extends string,
  E extends WorkflowEntity<S>,
>(options: ActorGuardOptions): TransitionGuard<S, E> {
  const { allow } = options;
  const isAllowed =
    typeof allow === 'function'
      ? allow
      : (actor: string) => allow.includes(actor);

  return {
    name: options.name ?? 'actor',
    check: async ({ context }) => {
      if (await isAllowed(context.actor)) {
        return { allowed: true };
      }
      return {
        allowed: false,
        reason: `Actor "${context.actor}" is not ${options.description}`,
      };
    },
  };
}
