/**
 * Browsing commands: services, layers, schema.
 */
import type { Command } from 'commander';
import { getLayerSchema, listDirectoryServices, listServiceLayers } from '../../core/discovery.js';
import { parseInteger, resolveCliConfig, type GlobalOptions } from '../lib/options.js';

interface OutputOptions {
  json?: boolean;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function registerDiscoveryCommands(program: Command): void {
  program
    .command('services <directoryUrl>')
    .description('List map and feature services under a services directory')
    .option('--json', 'Output as JSON')
    .action(async (directoryUrl: string, options: OutputOptions) => {
      const { download } = resolveCliConfig(program.opts<GlobalOptions>());
      const services = await listDirectoryServices(directoryUrl, { config: download });

      if (options.json) {
        printJson(services);
        return;
      }
      if (services.length === 0) {
        console.log('No map or feature services found.');
        return;
      }
      for (const svc of services) {
        console.log(`${svc.displayName.padEnd(40)} ${svc.type.padEnd(14)} ${svc.url}`);
      }
    });

  program
    .command('layers <serviceUrl>')
    .description('List the layers of a map or feature service')
    .option('--json', 'Output as JSON')
    .action(async (serviceUrl: string, options: OutputOptions) => {
      const { download } = resolveCliConfig(program.opts<GlobalOptions>());
      const layers = await listServiceLayers(serviceUrl, { config: download });

      if (options.json) {
        printJson(layers);
        return;
      }
      for (const layer of layers) {
        const indent = layer.parentId >= 0 ? '  ' : '';
        const kind = layer.geometryKind ?? layer.type;
        console.log(`${String(layer.id).padStart(4)}  ${indent}${layer.name} (${kind})`);
      }
    });

  program
    .command('schema <serviceUrl> <layerId>')
    .description('Show the fields, geometry and spatial reference of a layer')
    .option('--json', 'Output as JSON')
    .action(async (serviceUrl: string, layerIdArg: string, options: OutputOptions) => {
      const { download } = resolveCliConfig(program.opts<GlobalOptions>());
      const schema = await getLayerSchema(serviceUrl, parseInteger(layerIdArg), { config: download });

      if (options.json) {
        printJson(schema);
        return;
      }
      const sr = schema.spatialReference;
      console.log(`${schema.name} (layer ${schema.id})`);
      console.log(`Geometry:        ${schema.geometryKind}`);
      console.log(`Object ID field: ${schema.objectIdField}`);
      console.log(`Spatial ref:     ${sr?.latestWkid ?? sr?.wkid ?? 'unknown'}`);
      if (schema.maxRecordCount !== null) {
        console.log(`Max records:     ${schema.maxRecordCount}`);
      }
      console.log(`\nFields (${schema.fields.length}):`);
      for (const field of schema.fields) {
        const width = field.length !== null ? `(${field.length})` : '';
        console.log(`  ${field.name.padEnd(30)} ${field.kind}${width}  ${field.sourceType}`);
      }
    });
}
