/**
 * devprompt
 *
 * Adaptive interview that turns a developer's coding preferences into
 * rules files for coding assistants.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './profile/index.js';
export * from './catalog/index.js';
export * from './planner/index.js';
export * from './interview/index.js';
export * from './render/index.js';
export * from './vendors/index.js';
export * from './project-context/index.js';
export * from './router/index.js';
export * from './config/index.js';
export { Logger, silentLogger } from './utils/logger.js';
export type { LogEntry, LoggerOptions, LogLevel } from './utils/logger.js';
export { PathValidationError } from './utils/safe-fs.js';
