// src/index.ts
// Main entry point for @workflow-fields/core

// Vocabulary, content kinds, validation results
export * from './types.js';
export * from './constants.js';
export * from './errors.js';

// Runtime configuration and logging
export { LOG_LEVELS, loadRuntimeConfig, type LogLevel, type LoadConfigOptions, type RuntimeConfig } from './config.js';
export { createLogger, type Logger } from './logger.js';

// Data model
export * from './conditionals.js';
export { generate, type RandomSource } from './generators.js';
export { FIELD_BRAND, DEFAULT_SLOT, isFieldDescriptor, getFieldDefault, type FieldDefault } from './field-slots.js';
export * from './fields.js';
export * from './options.js';
export * from './controls.js';
export * from './values.js';

// Engine
export * from './binder.js';
export * from './schema.js';
export * from './results.js';
export * from './workflow.js';
