import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { IAuditSink } from './audit-sink.interface';
import type { WorkflowDefinition } from './workflow-definition.interface';

export interface WorkflowModuleOptions {
  /** Definitions registered when the module initialises */
  workflows?: WorkflowDefinition[];

  /** Receives every committed transition. Default: LoggerAuditSink */
  auditSink?: IAuditSink;

  /** Serialize attempts per workflow/entity pair in-process. Default: true */
  serializeByEntity?: boolean;

  /** Clock used for audit timestamps. Default: () => new Date() */
  now?: () => Date;
}

export interface WorkflowModuleAsyncOptions
  extends Pick<ModuleMetadata, 'imports'> {
  useFactory: (
    ...args: any[]
  ) => Promise<WorkflowModuleOptions> | WorkflowModuleOptions;
  inject?: FactoryProvider['inject'];
}

export interface ResolvedWorkflowOptions {
  workflows: WorkflowDefinition[];
  serializeByEntity: boolean;
  now: () => Date;
}
