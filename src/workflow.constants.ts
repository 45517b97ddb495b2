export const WORKFLOW_MODULE_OPTIONS = Symbol('WORKFLOW_MODULE_OPTIONS');
export const WORKFLOW_AUDIT_SINK = Symbol('WORKFLOW_AUDIT_SINK');
export const WORKFLOW_DEFINITION_METADATA = 'guarded-workflows:definition';

export const DEFAULT_SERIALIZE_BY_ENTITY = true;
