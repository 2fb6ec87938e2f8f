/**
 * Vendor adapter types.
 *
 * @packageDocumentation
 */

import type { ProfileSnapshot } from '../profile/store.js';

/**
 * Formats a finished prompt into one coding assistant's rules file.
 */
export interface VendorAdapter {
  /** Registry key, as accepted by `--output-format`. */
  readonly key: string;
  /** Human-readable tool name. */
  readonly vendorName: string;
  /** File name the tool reads its rules from. */
  readonly outputFilename: string;
  formatPrompt(prompt: string, snapshot: ProfileSnapshot): string;
}

/** Name written into generated file headers. */
export const GENERATOR_NAME = 'devprompt';

/**
 * Error thrown when a vendor key is not registered.
 */
export class UnknownVendorError extends Error {
  /** The requested key. */
  public readonly vendor: string;
  /** Registered keys, in registry order. */
  public readonly available: readonly string[];

  constructor(vendor: string, available: readonly string[]) {
    super(`Unknown vendor: ${vendor}. Available: ${available.join(', ')}`);
    this.name = 'UnknownVendorError';
    this.vendor = vendor;
    this.available = available;
  }
}
