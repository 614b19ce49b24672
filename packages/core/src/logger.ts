// src/logger.ts
// pino loggers, one child per module

import { pino, type Logger } from 'pino';

import { loadRuntimeConfig } from './config.js';

let root: Logger | null = null;

function getRootLogger(): Logger {
  if (!root) {
    root = pino({ name: 'workflow-fields', level: loadRuntimeConfig().logLevel });
  }
  return root;
}

export function createLogger(module: string): Logger {
  return getRootLogger().child({ module });
}

export type { Logger };
