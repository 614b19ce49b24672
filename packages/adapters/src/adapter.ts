// src/adapter.ts
// Deployment adapter contract

import type { WorkflowExample, WorkflowSchema } from '@workflow-fields/core';

/** The parts of a workflow an adapter reads. */
export interface AdaptableWorkflow {
  readonly title: string;
  readonly version: string;
  readonly examples: readonly WorkflowExample[];
  schema(): WorkflowSchema;
}

export interface DeploymentFile {
  path: string;
  content: string;
  /** The file to execute. */
  primary?: boolean;
}

export interface DeploymentSource {
  files: DeploymentFile[];
}

export interface WorkflowAdapter<O> {
  readonly name: string;
  convertWorkflow(workflow: AdaptableWorkflow, options: O): DeploymentSource;
}

export function primaryFile(source: DeploymentSource): DeploymentFile | undefined {
  return source.files.find((file) => file.primary);
}
