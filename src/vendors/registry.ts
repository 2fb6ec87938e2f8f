/**
 * Vendor registry and output writing.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import type { ProfileSnapshot } from '../profile/store.js';
import { safeWriteFile } from '../utils/safe-fs.js';
import { AiderAdapter } from './aider.js';
import { ContinueAdapter } from './continue.js';
import { CursorAdapter } from './cursor.js';
import { UnknownVendorError, type VendorAdapter } from './types.js';

/**
 * Adapters keyed by their registry key.
 *
 * @example
 * ```typescript
 * const registry = createDefaultVendorRegistry().register({
 *   key: 'notes',
 *   vendorName: 'Plain notes',
 *   outputFilename: 'RULES.md',
 *   formatPrompt: (prompt) => prompt,
 * });
 * registry.get('notes').outputFilename; // "RULES.md"
 * ```
 */
export class VendorRegistry {
  private readonly adapters = new Map<string, VendorAdapter>();

  constructor(adapters: readonly VendorAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  /**
   * Adds an adapter under its key.
   *
   * @throws Error when the key is already registered.
   */
  register(adapter: VendorAdapter): this {
    if (this.adapters.has(adapter.key)) {
      throw new Error(`Duplicate vendor key: ${adapter.key}`);
    }
    this.adapters.set(adapter.key, adapter);
    return this;
  }

  keys(): string[] {
    return [...this.adapters.keys()];
  }

  has(key: string): boolean {
    return this.adapters.has(key);
  }

  /**
   * @throws UnknownVendorError when the key is not registered.
   */
  get(key: string): VendorAdapter {
    const adapter = this.adapters.get(key);
    if (adapter === undefined) {
      throw new UnknownVendorError(key, this.keys());
    }
    return adapter;
  }

  /**
   * Key to vendor name, in registry order.
   */
  available(): Record<string, string> {
    return Object.fromEntries([...this.adapters].map(([key, adapter]) => [key, adapter.vendorName]));
  }
}

/**
 * Registry of the built-in adapters: cursor, continue, aider.
 */
export function createDefaultVendorRegistry(now?: () => Date): VendorRegistry {
  return new VendorRegistry([new CursorAdapter(now), new ContinueAdapter(), new AiderAdapter()]);
}

/**
 * Formats the prompt for a vendor and writes `<outputDir>/<outputFilename>`,
 * creating the directory when needed.
 *
 * @returns The written path.
 */
export async function writeVendorOutput(
  adapter: VendorAdapter,
  prompt: string,
  snapshot: ProfileSnapshot,
  outputDir = '.'
): Promise<string> {
  const outputPath = path.join(outputDir, adapter.outputFilename);
  await safeWriteFile(outputPath, adapter.formatPrompt(prompt, snapshot));
  return outputPath;
}
