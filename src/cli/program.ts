/**
 * Command-line program definition. Kept apart from the entry point so it
 * can be built without parsing process.argv.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { DecodeError, DownloadCancelledError, TransportError, errorMessage } from '../core/errors.js';
import { registerAcquireCommands } from './commands/acquire.js';
import { registerDiscoveryCommands } from './commands/discovery.js';
import { registerHealthCommand } from './commands/health.js';
import { EXIT_CODES, type ExitCode } from './exit-codes.js';
import { parsePositiveInteger } from './lib/options.js';

function getVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (err) {
    console.warn(`Could not read package version: ${errorMessage(err)}`);
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('layerpull')
    .description('Safety-gated feature downloads from ArcGIS REST services')
    .version(getVersion())
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parsePositiveInteger)
    .option('--batch-size <n>', 'Object IDs per batch request', parsePositiveInteger)
    .option('--verify-tls', 'Verify TLS certificates');

  registerDiscoveryCommands(program);
  registerHealthCommand(program);
  registerAcquireCommands(program);

  return program;
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof TransportError || error instanceof DecodeError) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  if (error instanceof DownloadCancelledError) {
    return EXIT_CODES.USER_CANCELLED;
  }
  return EXIT_CODES.ERRORS;
}
