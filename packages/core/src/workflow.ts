// src/workflow.ts
// Workflow definition: immutable metadata, declared parameters and a bound run handler

import { bindArguments, type BoundRun, type Kwargs, type ParamSpecs, type RunHandler } from './binder.js';
import { createLogger } from './logger.js';
import { errorNotification, toResultStream, type HandlerOutput, type WorkflowResult } from './results.js';
import { extractSchema, type WorkflowSchema } from './schema.js';
import type { ContentType } from './types.js';

const logger = createLogger('workflow');

export interface WorkflowExample {
  title: string;
  description?: string;
  /** Arguments passed to `run`. */
  data: Record<string, unknown>;
}

export interface WorkflowConfig {
  title: string;
  version: string;
  description: string;
  tooltip?: string;
  /** Kind of content the workflow produces. */
  content_type?: ContentType;
  examples?: readonly WorkflowExample[];
}

type LifecycleHook = () => void | Promise<void>;

export interface WorkflowDefinition<P extends ParamSpecs, R extends HandlerOutput> {
  config: WorkflowConfig;
  params: P;
  run: RunHandler<P, R>;
  /** Fetch weights or other assets ahead of the first run. */
  download?: LifecycleHook;
  /** Bring the model into memory. */
  load?: LifecycleHook;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !ArrayBuffer.isView(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export class Workflow<P extends ParamSpecs = ParamSpecs, R extends HandlerOutput = HandlerOutput> {
  readonly title: string;
  readonly version: string;
  readonly description: string;
  readonly tooltip?: string;
  readonly content_type?: ContentType;
  readonly examples: readonly WorkflowExample[];
  readonly run: BoundRun<P, R>;

  private readonly hooks: { download?: LifecycleHook; load?: LifecycleHook };

  constructor(definition: WorkflowDefinition<P, R>) {
    const { config } = definition;
    this.title = config.title;
    this.version = config.version;
    this.description = config.description;
    this.tooltip = config.tooltip;
    this.content_type = config.content_type;
    this.examples = deepFreeze(structuredClone(config.examples ?? []));
    this.run = bindArguments(definition.params, definition.run);
    this.hooks = { download: definition.download, load: definition.load };
    Object.freeze(this);
  }

  schema(): WorkflowSchema {
    return extractSchema(this);
  }

  async download(): Promise<void> {
    await this.hooks.download?.();
  }

  async load(): Promise<void> {
    await this.hooks.load?.();
  }

  /**
   * Run with loose kwargs and yield results one at a time. A failed run ends
   * the stream with an error notification instead of throwing.
   */
  async *stream(kwargs: Kwargs = {}): AsyncGenerator<WorkflowResult, void, undefined> {
    try {
      yield* toResultStream(this.run(kwargs));
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      logger.error({ err: error, workflow: this.title }, 'Workflow run failed');
      yield errorNotification(`${error.name}: ${error.message}`, { traceback: error.stack });
    }
  }
}

export function defineWorkflow<P extends ParamSpecs, R extends HandlerOutput>(
  definition: WorkflowDefinition<P, R>,
): Workflow<P, R> {
  return new Workflow(definition);
}
