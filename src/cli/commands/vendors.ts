/**
 * Lists the vendors `--output-format` accepts.
 */

import type { OutputWriter } from '../../interview/cli.js';
import { createDefaultVendorRegistry, type VendorRegistry } from '../../vendors/registry.js';
import type { CliCommandResult } from '../types.js';

export function handleVendorsCommand(
  writer: OutputWriter,
  registry: VendorRegistry = createDefaultVendorRegistry()
): CliCommandResult {
  writer.writeLine('Supported vendors:');
  for (const key of registry.keys()) {
    const adapter = registry.get(key);
    writer.writeLine(`  ${key.padEnd(10)} ${adapter.vendorName} (${adapter.outputFilename})`);
  }
  return { exitCode: 0 };
}
