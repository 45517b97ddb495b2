import {
  Inject,
  Injectable,
  Logger,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { TransitionEngine } from '../engines/transition-engine';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { WorkflowNotRegisteredError } from '../errors/workflow-not-registered.error';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import { ResolvedWorkflowOptions } from '../interfaces/workflow-module-options.interface';
import {
  WORKFLOW_DEFINITION_METADATA,
  WORKFLOW_MODULE_OPTIONS,
} from '../workflow.constants';

export interface RegisteredWorkflow {
  workflowId: string;
  definition: WorkflowDefinition;
  engine: TransitionEngine;
  /** Provider class or "module options" */
  source: string;
}

@Injectable()
export class WorkflowRegistry implements OnModuleInit {
  private readonly logger = new Logger(WorkflowRegistry.name);
  private readonly registrations = new Map<string, RegisteredWorkflow>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
    @Optional()
    @Inject(WORKFLOW_MODULE_OPTIONS)
    private readonly options?: ResolvedWorkflowOptions,
  ) {}

  onModuleInit(): void {
    for (const definition of this.options?.workflows ?? []) {
      this.register(definition, 'module options');
      this.logger.log(`Registered workflow: ${definition.id} (module options)`);
    }

    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      if (!wrapper.metatype) continue;

      const definition = this.reflector.get<WorkflowDefinition | undefined>(
        WORKFLOW_DEFINITION_METADATA,
        wrapper.metatype,
      );

      if (definition) {
        this.register(definition, wrapper.metatype.name);
        this.logger.log(
          `Registered workflow: ${definition.id} (${wrapper.metatype.name})`,
        );
      }
    }
  }

  /**
   * Builds the engine for a definition. Throws ConfigurationError when the
   * definition is malformed, leaving the registry unchanged.
   */
  register(definition: WorkflowDefinition, source = 'manual'): TransitionEngine {
    const existing = this.registrations.get(definition.id);
    if (existing) {
      throw new DuplicateRegistrationError(
        definition.id,
        existing.source,
        source,
      );
    }

    const engine = new TransitionEngine(definition, { now: this.options?.now });
    this.registrations.set(definition.id, {
      workflowId: definition.id,
      definition,
      engine,
      source,
    });
    return engine;
  }

  get(workflowId: string): RegisteredWorkflow | undefined {
    return this.registrations.get(workflowId);
  }

  getAll(): RegisteredWorkflow[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(workflowId: string): RegisteredWorkflow {
    const registration = this.registrations.get(workflowId);
    if (!registration) {
      throw new WorkflowNotRegisteredError(workflowId);
    }
    return registration;
  }
}
