// src/index.ts
// Main entry point for @workflow-fields/adapters

export { primaryFile, type AdaptableWorkflow, type DeploymentFile, type DeploymentSource, type WorkflowAdapter } from './adapter.js';
export { cleanAndFormatString } from './format-utils.js';
export { LocalWorkflowAdapter, type LocalAdapterOptions } from './local-adapter.js';
