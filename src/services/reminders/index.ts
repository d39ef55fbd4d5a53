/**
 * @fileoverview Reminder service exports.
 *
 * Provides:
 * - Prompt templates and rendering
 * - Model response parsing and validation
 * - Canonical serialization
 * - Occurrence expansion and next-fire computation
 * - The interpreter tying them to a completion provider
 */

export * from './types.js';
export * from './errors.js';
export * from './time.js';
export * from './prompts.js';
export * from './parser.js';
export * from './serializer.js';
export * from './schedule.js';
export * from './provider.js';
export * from './interpreter.js';
