export enum WorkflowEventType {
  TRANSITION_COMMITTED = 'workflow.transition.committed',
  TRANSITION_REJECTED = 'workflow.transition.rejected',
}
