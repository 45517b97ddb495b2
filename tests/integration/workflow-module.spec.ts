import { Injectable, Logger, Module } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { InMemoryAuditSink } from '../../src/adapters/in-memory-audit-sink.adapter';
import { LoggerAuditSink } from '../../src/adapters/logger-audit-sink.adapter';
import { Workflow } from '../../src/decorators/workflow.decorator';
import { ConfigurationError } from '../../src/errors/configuration.error';
import { WorkflowEventType } from '../../src/events/workflow-event-type.enum';
import type { WorkflowDefinition } from '../../src/interfaces/workflow-definition.interface';
import { WorkflowManager } from '../../src/services/workflow-manager.service';
import { WorkflowRegistry } from '../../src/services/workflow-registry.service';
import { WORKFLOW_AUDIT_SINK } from '../../src/workflow.constants';
import { WorkflowModule } from '../../src/workflow.module';
import {
  createLoan,
  createLoanWorkflow,
} from '../fixtures/loan-application.workflow';
import { FIXED_NOW, fixedClock } from '../helpers';

const ticketWorkflow: WorkflowDefinition = {
  id: 'ticket',
  states: ['OPEN', 'DONE', 'CANCELLED'],
  initial: 'OPEN',
  transitions: { OPEN: ['DONE', 'CANCELLED'] },
  terminal: { completed: ['DONE'], rejected: ['CANCELLED'] },
};

@Workflow(ticketWorkflow)
@Injectable()
class TicketWorkflow {}

@Injectable()
class LendingConfig {
  readonly maxAmount = 250_000;
}

@Module({ providers: [LendingConfig], exports: [LendingConfig] })
class LendingConfigModule {}

describe('WorkflowModule integration', () => {
  let module: TestingModule | undefined;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(async () => {
    try {
      await module?.close();
    } finally {
      module = undefined;
      jest.restoreAllMocks();
    }
  });

  it('should bootstrap with forRoot and register configured and decorated workflows', async () => {
    module = await Test.createTestingModule({
      imports: [
        WorkflowModule.forRoot({
          workflows: [createLoanWorkflow()],
          auditSink: new InMemoryAuditSink(),
        }),
      ],
      providers: [TicketWorkflow],
    }).compile();

    await module.init();

    const registry = module.get<WorkflowRegistry>(WorkflowRegistry);
    expect(registry.getOrThrow('loan-application').source).toBe('module options');
    expect(registry.getOrThrow('ticket').source).toBe('TicketWorkflow');
  });

  it('should provide WorkflowManager wired to the configured sink and clock', async () => {
    const sink = new InMemoryAuditSink();
    module = await Test.createTestingModule({
      imports: [
        WorkflowModule.forRoot({
          workflows: [createLoanWorkflow()],
          auditSink: sink,
          now: fixedClock,
        }),
      ],
    }).compile();
    await module.init();

    const manager = module.get<WorkflowManager>(WorkflowManager);
    const emitter = module.get<EventEmitter2>(EventEmitter2);
    const committed = jest.fn();
    emitter.on(WorkflowEventType.TRANSITION_COMMITTED, committed);

    const loan = createLoan();
    await manager.attempt('loan-application', loan, 'BACKGROUND_CHECK', {
      actor: 'officer-1',
    });

    expect(loan.state).toBe('BACKGROUND_CHECK');
    expect(sink.all()).toHaveLength(1);
    expect(sink.all()[0].recordedAt).toEqual(FIXED_NOW);
    expect(sink.all()[0].context.attemptedAt).toEqual(FIXED_NOW);
    expect(committed).toHaveBeenCalledTimes(1);
    expect(module.get(WORKFLOW_AUDIT_SINK)).toBe(sink);
  });

  it('should default to the logger audit sink', async () => {
    module = await Test.createTestingModule({
      imports: [WorkflowModule.forRoot()],
    }).compile();

    expect(module.get(WORKFLOW_AUDIT_SINK)).toBeInstanceOf(LoggerAuditSink);
  });

  it('should resolve options through forRootAsync', async () => {
    const sink = new InMemoryAuditSink();
    module = await Test.createTestingModule({
      imports: [
        WorkflowModule.forRootAsync({
          imports: [LendingConfigModule],
          useFactory: (config: LendingConfig) => ({
            workflows: [createLoanWorkflow({ maxAmount: config.maxAmount })],
            auditSink: sink,
          }),
          inject: [LendingConfig],
        }),
      ],
    }).compile();
    await module.init();

    const manager = module.get<WorkflowManager>(WorkflowManager);
    const loan = createLoan({ amount: 150_000 });
    await manager.attempt('loan-application', loan, 'BACKGROUND_CHECK', {
      actor: 'officer-1',
    });

    expect(loan.state).toBe('BACKGROUND_CHECK');
    expect(sink.all()).toHaveLength(1);
  });

  it('should fail initialisation for a malformed definition', async () => {
    module = await Test.createTestingModule({
      imports: [
        WorkflowModule.forRoot({
          workflows: [
            {
              ...ticketWorkflow,
              id: 'broken-ticket',
              transitions: { OPEN: ['CANCELLED'] },
            },
          ],
        }),
      ],
    }).compile();

    await expect(module.init()).rejects.toThrow(ConfigurationError);
    await expect(module.close()).rejects.toThrow(ConfigurationError);
    module = undefined;
  });
});
