// src/config.ts
// Runtime configuration read from the environment (and an optional .env file)

import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { z } from 'zod';

import { WorkflowError } from './errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const RuntimeEnvSchema = z.object({
  WORKFLOW_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  WORKFLOW_OUTPUT_DIR: z.string().min(1).default('workflow-output'),
});

export interface RuntimeConfig {
  logLevel: LogLevel;
  outputDir: string;
}

export interface LoadConfigOptions {
  /** Variables to read instead of `process.env`. */
  env?: Record<string, string | undefined>;
  /** A .env file merged into `process.env` before reading. */
  envPath?: string;
}

export function loadRuntimeConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  if (options.envPath && fs.existsSync(options.envPath)) {
    dotenv.config({ path: options.envPath });
  }

  const env = options.env ?? process.env;
  const parsed = RuntimeEnvSchema.safeParse({
    WORKFLOW_LOG_LEVEL: env.WORKFLOW_LOG_LEVEL || undefined,
    WORKFLOW_OUTPUT_DIR: env.WORKFLOW_OUTPUT_DIR || undefined,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new WorkflowError(`Invalid runtime configuration: ${detail}`);
  }

  return {
    logLevel: parsed.data.WORKFLOW_LOG_LEVEL,
    outputDir: parsed.data.WORKFLOW_OUTPUT_DIR,
  };
}
