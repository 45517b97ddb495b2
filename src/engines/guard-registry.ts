import { ConfigurationError } from '../errors/configuration.error';
import { GuardContractError } from '../errors/guard-contract.error';
import type {
  GuardEvaluation,
  GuardResult,
  TransitionContext,
  TransitionGuard,
  WorkflowEntity,
} from '../interfaces/transition.interface';
import type { TransitionTable } from './transition-table';

function isGuardResult(value: unknown): value is GuardResult {
  if (typeof value !== 'object' || value === null) return false;
  if (!('allowed' in value) || typeof value.allowed !== 'boolean') {
    return false;
  }
  return (
    !('reason' in value) ||
    value.reason === undefined ||
    typeof value.reason === 'string'
  );
}

export class GuardRegistry<
  S extends string = string,
  E extends WorkflowEntity<S> = WorkflowEntity<S>,
> {
  private readonly byEdge = new Map<S, Map<S, TransitionGuard<S, E>[]>>();

  constructor(private readonly table: TransitionTable<S>) {}

  /**
   * Attach a guard to an existing edge. Guards on the same edge run in
   * registration order.
   */
  register(source: S, destination: S, guard: TransitionGuard<S, E>): this {
    if (typeof guard.name !== 'string' || guard.name.trim().length === 0) {
      throw new ConfigurationError(this.table.workflowId, [
        `guard on ${source} -> ${destination} must have a non-empty name`,
      ]);
    }

    if (!this.table.isStructurallyValid(source, destination)) {
      throw new ConfigurationError(this.table.workflowId, [
        `guard "${guard.name}" is attached to ${source} -> ${destination}, which is not a declared transition`,
      ]);
    }

    let bySource = this.byEdge.get(source);
    if (!bySource) {
      bySource = new Map<S, TransitionGuard<S, E>[]>();
      this.byEdge.set(source, bySource);
    }
    const guards = bySource.get(destination) ?? [];
    guards.push(guard);
    bySource.set(destination, guards);
    return this;
  }

  guardsFor(source: S, destination: S): string[] {
    return (this.byEdge.get(source)?.get(destination) ?? []).map(
      (guard) => guard.name,
    );
  }

  /**
   * Runs the edge's guards one at a time and stops at the first denial.
   * Errors thrown by a guard propagate unchanged.
   */
  async evaluate(
    source: S,
    destination: S,
    entity: Readonly<E>,
    context: TransitionContext,
  ): Promise<GuardEvaluation> {
    const guards = this.byEdge.get(source)?.get(destination) ?? [];

    for (const guard of guards) {
      const result: unknown = await guard.check({
        entity,
        from: source,
        to: destination,
        context,
      });

      if (!isGuardResult(result)) {
        throw new GuardContractError(guard.name, source, destination);
      }

      if (!result.allowed) {
        const reason = result.reason?.trim();
        return {
          allowed: false,
          guard: guard.name,
          reason: reason ? reason : `Guard "${guard.name}" denied the transition`,
        };
      }
    }

    return { allowed: true };
  }
}
