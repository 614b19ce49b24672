// src/results.ts
// Result records a workflow handler yields: notifications and content responses

import { z } from 'zod';

import { ContentType, type ContentPayload } from './types.js';

// ============ Records ============

export enum NotificationType {
  PROGRESS = 'progress',
  SUCCESS = 'success',
  ERROR = 'error',
}

export interface Notification {
  type: NotificationType;
  /** Fraction done, 0..1. */
  progress: number;
  message?: string;
  title?: string;
  traceback?: string;
}

export interface WorkflowResponse {
  content_type: ContentType;
  content: ContentPayload;
}

export type WorkflowResult = Notification | WorkflowResponse;

type MaybePromise<T> = T | Promise<T>;

type ResultSource = WorkflowResult | Iterable<WorkflowResult> | AsyncIterable<WorkflowResult>;

/** Anything a run handler may return. */
export type HandlerOutput = MaybePromise<ResultSource | undefined>;

// ============ Schemas ============

export const NotificationSchema = z.object({
  type: z.nativeEnum(NotificationType),
  progress: z.number().min(0).max(1),
  message: z.string().optional(),
  title: z.string().optional(),
  traceback: z.string().optional(),
});

export const ResponseSchema = z.object({
  content_type: z.nativeEnum(ContentType),
  content: z.union([z.string(), z.instanceof(Uint8Array)]),
});

export function isNotification(value: unknown): value is Notification {
  return NotificationSchema.safeParse(value).success;
}

export function isResponse(value: unknown): value is WorkflowResponse {
  return ResponseSchema.safeParse(value).success;
}

// ============ Factories ============

function clampProgress(value: number): number {
  if (Number.isNaN(value) || value < 0.0) return 0.0;
  if (value > 1.0) return 1.0;
  return value;
}

function notification(type: NotificationType, progress: number, message?: string, title?: string): Notification {
  const result: Notification = { type, progress: clampProgress(progress) };
  if (message !== undefined) result.message = message;
  if (title !== undefined) result.title = title;
  return result;
}

export function progressNotification(progress: number, message?: string, title?: string): Notification {
  return notification(NotificationType.PROGRESS, progress, message, title);
}

export function successNotification(message?: string, title?: string): Notification {
  return notification(NotificationType.SUCCESS, 1.0, message, title);
}

export function errorNotification(message: string, options: { title?: string; traceback?: string } = {}): Notification {
  const result = notification(NotificationType.ERROR, 1.0, message, options.title);
  if (options.traceback !== undefined) result.traceback = options.traceback;
  return result;
}

export function createResponse(content_type: ContentType, content: ContentPayload): WorkflowResponse {
  return { content_type, content };
}

// ============ Streaming ============

function isAsyncIterable(source: ResultSource): source is AsyncIterable<WorkflowResult> {
  return Symbol.asyncIterator in source;
}

function isIterable(source: ResultSource): source is Iterable<WorkflowResult> {
  return Symbol.iterator in source;
}

/**
 * Flatten whatever a handler returned into one async sequence of results.
 */
export async function* toResultStream(output: HandlerOutput): AsyncGenerator<WorkflowResult, void, undefined> {
  const resolved = await output;
  if (resolved === undefined) {
    return;
  }
  if (isAsyncIterable(resolved)) {
    for await (const item of resolved) {
      yield item;
    }
    return;
  }
  if (isIterable(resolved)) {
    yield* resolved;
    return;
  }
  yield resolved;
}
