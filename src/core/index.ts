export * from './Types';
export * from './Errors';
export * from './Interface';
export * from './GraphPrimitives';
export * from './NodeRules';
export * from './WorkflowTemplate';
