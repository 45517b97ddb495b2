import { SetMetadata } from '@nestjs/common';
import { WORKFLOW_DEFINITION_METADATA } from '../workflow.constants';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';

/**
 * Marks a provider as the owner of a workflow definition. The registry
 * picks it up when the module initialises.
 */
export function Workflow(definition: WorkflowDefinition): ClassDecorator {
  return SetMetadata(WORKFLOW_DEFINITION_METADATA, definition);
}
