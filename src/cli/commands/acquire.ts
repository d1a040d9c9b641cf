/**
 * Gated acquisition: `check` runs the safety gate alone, `download` runs the
 * whole pipeline into a GeoJSON directory.
 */
import type { Command } from 'commander';
import { SafetyBlockedError } from '../../core/errors.js';
import { acquireLayer } from '../../core/pipeline.js';
import { checkDownloadSafety, formatConfirmationMessage, summarizeVerdict } from '../../core/safety.js';
import { GeoJsonDirectorySink } from '../../sinks/geojson-sink.js';
import {
  parseInteger,
  resolveCliConfig,
  resolveFilter,
  type FilterOptions,
  type GlobalOptions,
} from '../lib/options.js';
import { EXIT_CODES } from '../exit-codes.js';
import { createConfirm } from '../lib/prompt.js';

interface CheckOptions extends FilterOptions {
  layerType?: string;
  json?: boolean;
}

interface DownloadCommandOptions extends FilterOptions {
  out: string;
  name?: string;
  layerType?: string;
  outSr?: number;
  yes?: boolean;
}

function addFilterOptions(command: Command): Command {
  return command
    .option('--bbox <xmin,ymin,xmax,ymax>', 'Envelope filter')
    .option('--clip <file>', 'Polygon filter from a GeoJSON file')
    .option('--wkid <wkid>', 'Spatial reference of --bbox / --clip (default 4326)', parseInteger)
    .option('--layer-type <type>', 'Density hint, e.g. parcels or contours');
}

export function registerAcquireCommands(program: Command): void {
  addFilterOptions(
    program
      .command('check <serviceUrl> <layerId>')
      .description('Run the pre-download safety check without downloading')
  )
    .option('--json', 'Output as JSON')
    .action(async (serviceUrl: string, layerIdArg: string, options: CheckOptions) => {
      const { download, safety } = resolveCliConfig(program.opts<GlobalOptions>());
      const filter = await resolveFilter(options);

      const verdict = await checkDownloadSafety(
        { serviceUrl, layerId: parseInteger(layerIdArg), filter, layerType: options.layerType },
        { config: safety, download }
      );

      if (options.json) {
        console.log(JSON.stringify(verdict, null, 2));
      } else {
        console.log(summarizeVerdict(verdict));
        console.log(formatConfirmationMessage(verdict));
      }

      if (verdict.action === 'block') process.exitCode = EXIT_CODES.BLOCKED;
      else if (verdict.action === 'warn') process.exitCode = EXIT_CODES.WARNINGS;
    });

  addFilterOptions(
    program
      .command('download <serviceUrl> <layerId>')
      .description('Download a layer into a directory of GeoJSON files')
  )
    .requiredOption('-o, --out <dir>', 'Output directory')
    .option('-n, --name <layerName>', 'Layer name (defaults to the service layer name)')
    .option('--out-sr <wkid>', 'Ask the server for this output spatial reference', parseInteger)
    .option('-y, --yes', 'Accept safety warnings without asking')
    .action(async (serviceUrl: string, layerIdArg: string, options: DownloadCommandOptions) => {
      const { download, safety } = resolveCliConfig(program.opts<GlobalOptions>());
      const filter = await resolveFilter(options);

      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);

      try {
        const result = await acquireLayer({
          serviceUrl,
          layerId: parseInteger(layerIdArg),
          filter,
          sink: new GeoJsonDirectorySink(options.out),
          layerName: options.name,
          layerType: options.layerType,
          outSpatialReference: options.outSr,
          download,
          safety,
          confirm: createConfirm(options.yes ?? false),
          onProgress: (percent, _total, message) =>
            console.log(`[${String(percent).padStart(3)}%] ${message}`),
          signal: controller.signal,
        });

        switch (result.status) {
          case 'declined':
            process.exitCode = EXIT_CODES.USER_CANCELLED;
            break;
          case 'empty':
            console.log(`No features in the query area; nothing written for ${result.layerName}.`);
            break;
          case 'written':
            if (result.skipped > 0) {
              console.warn(`${result.skipped} features had no usable geometry and were skipped.`);
            }
            break;
        }
      } catch (err) {
        if (err instanceof SafetyBlockedError) {
          console.error(formatConfirmationMessage(err.verdict));
          process.exitCode = EXIT_CODES.BLOCKED;
          return;
        }
        throw err;
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
}
