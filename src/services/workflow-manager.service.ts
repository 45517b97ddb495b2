import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { WorkflowRegistry } from './workflow-registry.service';
import type { TransitionCheck } from '../engines/transition-engine';
import { AuditEmissionError } from '../errors/audit-emission.error';
import { GuardDeniedError } from '../errors/guard-denied.error';
import { TransitionRejectedError } from '../errors/transition-rejected.error';
import { WorkflowEventType } from '../events/workflow-event-type.enum';
import type {
  WorkflowTransitionEvent,
  WorkflowTransitionRejectedEvent,
} from '../events/workflow-events';
import { IAuditSink } from '../interfaces/audit-sink.interface';
import type {
  TransitionContext,
  TransitionContextInput,
  TransitionOutcome,
  WorkflowEntity,
} from '../interfaces/transition.interface';
import { createTransitionContext } from '../utils/create-transition-context';
import { KeyedLock } from '../utils/keyed-lock';
import {
  WORKFLOW_AUDIT_SINK,
  WORKFLOW_MODULE_OPTIONS,
} from '../workflow.constants';

export interface WorkflowManagerOptions {
  serializeByEntity: boolean;
  now?: () => Date;
}

@Injectable()
export class WorkflowManager {
  private readonly logger = new Logger(WorkflowManager.name);
  private readonly locks = new KeyedLock();

  constructor(
    private readonly registry: WorkflowRegistry,
    @Inject(WORKFLOW_AUDIT_SINK) private readonly auditSink: IAuditSink,
    private readonly eventEmitter: EventEmitter2,
    @Inject(WORKFLOW_MODULE_OPTIONS)
    private readonly options: WorkflowManagerOptions,
  ) {}

  /**
   * Attempt one transition and forward its audit record.
   *
   * The entity is mutated in place; persisting it is up to the caller. The
   * committed event is emitted before the record reaches the sink. If the
   * sink fails, the state change stays and an AuditEmissionError carrying
   * the outcome is thrown.
   */
  async attempt(
    workflowId: string,
    entity: WorkflowEntity,
    destination: string,
    input: TransitionContext | TransitionContextInput,
  ): Promise<TransitionOutcome> {
    const { engine } = this.registry.getOrThrow(workflowId);
    const context = createTransitionContext(input, this.options.now);

    const run = async (): Promise<TransitionOutcome> => {
      let outcome: TransitionOutcome;
      try {
        outcome = await engine.attempt(entity, destination, context);
      } catch (error) {
        if (error instanceof TransitionRejectedError) {
          this.reportRejection(workflowId, error, context);
        }
        throw error;
      }

      this.eventEmitter.emit(WorkflowEventType.TRANSITION_COMMITTED, {
        workflowId,
        entityId: outcome.entityId,
        fromState: outcome.fromState,
        toState: outcome.toState,
        terminal: outcome.terminal,
        actor: context.actor,
        record: outcome.record,
        timestamp: new Date(),
      } satisfies WorkflowTransitionEvent);

      await this.forwardRecord(outcome);

      this.logger.log(
        `Workflow ${workflowId}/${outcome.entityId}: ${outcome.fromState} -> ${outcome.toState} ` +
          `(record #${outcome.record.sequence}, actor=${context.actor})`,
      );

      return outcome;
    };

    if (!this.options.serializeByEntity) {
      return run();
    }
    return this.locks.run(JSON.stringify([workflowId, entity.id]), run);
  }

  async check(
    workflowId: string,
    entity: WorkflowEntity,
    destination: string,
    input: TransitionContext | TransitionContextInput,
  ): Promise<TransitionCheck> {
    const { engine } = this.registry.getOrThrow(workflowId);
    return engine.check(entity, destination, input);
  }

  async permittedDestinations(
    workflowId: string,
    entity: WorkflowEntity,
    input: TransitionContext | TransitionContextInput,
  ): Promise<string[]> {
    const { engine } = this.registry.getOrThrow(workflowId);
    return engine.permittedDestinations(entity, input);
  }

  private async forwardRecord(outcome: TransitionOutcome): Promise<void> {
    try {
      await this.auditSink.record(outcome.record);
    } catch (error) {
      this.logger.error(
        `Audit record #${outcome.record.sequence} for ${outcome.record.workflowId}/${outcome.entityId} could not be recorded`,
        error instanceof Error ? error.stack : error,
      );
      throw new AuditEmissionError(outcome, error);
    }
  }

  private reportRejection(
    workflowId: string,
    error: TransitionRejectedError,
    context: TransitionContext,
  ): void {
    this.logger.warn(`Workflow ${workflowId}/${error.entityId}: ${error.message}`);

    this.eventEmitter.emit(WorkflowEventType.TRANSITION_REJECTED, {
      workflowId,
      entityId: error.entityId,
      fromState: error.fromState,
      toState: error.toState,
      code: error.code,
      reason: error.message,
      guard: error instanceof GuardDeniedError ? error.guard : undefined,
      actor: context.actor,
      timestamp: new Date(),
    } satisfies WorkflowTransitionRejectedEvent);
  }
}
