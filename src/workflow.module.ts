import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { LoggerAuditSink } from './adapters/logger-audit-sink.adapter';
import { WorkflowManager } from './services/workflow-manager.service';
import { WorkflowRegistry } from './services/workflow-registry.service';
import {
  ResolvedWorkflowOptions,
  WorkflowModuleAsyncOptions,
  WorkflowModuleOptions,
} from './interfaces/workflow-module-options.interface';
import {
  DEFAULT_SERIALIZE_BY_ENTITY,
  WORKFLOW_AUDIT_SINK,
  WORKFLOW_MODULE_OPTIONS,
} from './workflow.constants';

const WORKFLOW_RAW_OPTIONS = Symbol('WORKFLOW_RAW_OPTIONS');

function resolveOptions(options: WorkflowModuleOptions): ResolvedWorkflowOptions {
  return {
    workflows: options.workflows ?? [],
    serializeByEntity: options.serializeByEntity ?? DEFAULT_SERIALIZE_BY_ENTITY,
    now: options.now ?? (() => new Date()),
  };
}

function createProviders(rawOptions: Provider): Provider[] {
  return [
    rawOptions,
    {
      provide: WORKFLOW_MODULE_OPTIONS,
      useFactory: (options: WorkflowModuleOptions) => resolveOptions(options),
      inject: [WORKFLOW_RAW_OPTIONS],
    },
    {
      provide: WORKFLOW_AUDIT_SINK,
      useFactory: (options: WorkflowModuleOptions) =>
        options.auditSink ?? new LoggerAuditSink(),
      inject: [WORKFLOW_RAW_OPTIONS],
    },
    WorkflowRegistry,
    WorkflowManager,
  ];
}

@Module({})
export class WorkflowModule {
  static forRoot(options: WorkflowModuleOptions = {}): DynamicModule {
    return {
      module: WorkflowModule,
      imports: [DiscoveryModule, EventEmitterModule.forRoot()],
      providers: createProviders({
        provide: WORKFLOW_RAW_OPTIONS,
        useValue: options,
      }),
      exports: [WorkflowManager, WorkflowRegistry, WORKFLOW_AUDIT_SINK],
      global: true,
    };
  }

  static forRootAsync(options: WorkflowModuleAsyncOptions): DynamicModule {
    return {
      module: WorkflowModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: createProviders({
        provide: WORKFLOW_RAW_OPTIONS,
        useFactory: options.useFactory,
        inject: options.inject ?? [],
      }),
      exports: [WorkflowManager, WorkflowRegistry, WORKFLOW_AUDIT_SINK],
      global: true,
    };
  }
}
