import type { Command } from 'commander';
import { checkServicesHealth } from '../../core/discovery.js';
import { openHealthCache, type SqliteHealthCache } from '../../core/health-cache.js';
import { EXIT_CODES } from '../exit-codes.js';
import { parsePositiveInteger, resolveCliConfig, type GlobalOptions } from '../lib/options.js';

interface HealthOptions {
  cache?: string;
  /** Minutes */
  maxAge?: number;
  concurrency: number;
  json?: boolean;
}

export function registerHealthCommand(program: Command): void {
  program
    .command('health <serviceUrls...>')
    .description('Probe services for reachability and response time')
    .option('--cache <dbPath>', 'Keep results in a SQLite cache')
    .option('--max-age <minutes>', 'Reuse cached results newer than this', parsePositiveInteger)
    .option('-c, --concurrency <n>', 'Probes in flight at once', parsePositiveInteger, 4)
    .option('--json', 'Output as JSON')
    .action(async (serviceUrls: string[], options: HealthOptions) => {
      const { download } = resolveCliConfig(program.opts<GlobalOptions>());

      let cache: SqliteHealthCache | undefined;
      if (options.cache) {
        cache = await openHealthCache(options.cache);
      }

      try {
        const reports = await checkServicesHealth(serviceUrls, {
          config: download,
          cache,
          maxAgeMs: options.maxAge !== undefined ? options.maxAge * 60_000 : undefined,
          concurrency: options.concurrency,
        });

        if (options.json) {
          console.log(JSON.stringify(reports, null, 2));
        } else {
          for (const r of reports) {
            const status = r.alive ? `UP   ${String(r.responseMs).padStart(6)} ms` : 'DOWN';
            const detail = r.alive ? `${r.layerCount} layers` : r.error ?? '';
            console.log(`${status.padEnd(16)} ${r.url}  ${detail}`);
          }
        }

        if (reports.some((r) => !r.alive)) {
          process.exitCode = EXIT_CODES.WARNINGS;
        }
      } finally {
        cache?.close();
      }
    });
}
