/**
 * Vendor adapters: rules file formats of coding assistants.
 *
 * @packageDocumentation
 */

export { AiderAdapter } from './aider.js';
export { ContinueAdapter } from './continue.js';
export type { ContinueRules } from './continue.js';
export { CursorAdapter, formatDate } from './cursor.js';
export { VendorRegistry, createDefaultVendorRegistry, writeVendorOutput } from './registry.js';
export { GENERATOR_NAME, UnknownVendorError } from './types.js';
export type { VendorAdapter } from './types.js';
