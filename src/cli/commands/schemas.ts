/**
 * Schemas command — write one field schema per inventory family.
 */

import { resolve } from 'path';
import type { Command } from 'commander';

import { buildFamilySchemas, writeFamilySchemas } from '../../inventory/schema-generator.js';
import { validateInventoryFile } from '../../inventory/validator.js';
import {
  addRootOption,
  addVerboseOption,
  pathOption,
  printBanner,
  printInfo,
  printSuccess,
  requireInputFile,
  resolveCommandConfig,
  type RootOptions,
} from '../options.js';

interface SchemasOptions extends RootOptions {
  outdir?: string;
  templates?: string;
}

export function registerSchemasCommand(program: Command): void {
  const cmd = program
    .command('schemas')
    .description('Generate per-family field schemas from the inventory')
    .option('-o, --outdir <dir>', 'Output directory (default: inventory/schemas)')
    .option('-t, --templates <dir>', 'Directory of schema templates that override the defaults');
  addRootOption(cmd);
  addVerboseOption(cmd);
  cmd.action((options: SchemasOptions) => {
    runSchemas(options);
  });
}

function runSchemas(options: SchemasOptions): void {
  printBanner('Use-Case Factory — Family Schemas');

  const config = resolveCommandConfig(options);
  const { sources } = validateInventoryFile(requireInputFile(config.paths.inventory, 'Inventory'));
  const outDir = pathOption(options.outdir, config.paths.schemasDir);
  const templatesDir = options.templates
    ? requireInputFile(resolve(options.templates), 'Templates directory')
    : undefined;

  const written = writeFamilySchemas(buildFamilySchemas(sources), outDir, { templatesDir });

  for (const schema of written) {
    printInfo(`${schema.family} → ${schema.path}${schema.fromTemplate ? ' (template)' : ''}`);
  }
  console.log('');
  printSuccess(`${written.length} schema(s) written to ${outDir}`);
  console.log('');
}
