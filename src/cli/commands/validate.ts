/**
 * Validate command — check the log-source inventory.
 *
 * Runs the inventory validator over devices.csv and prints the families
 * found. Any problem aborts with every offending line listed.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { validateInventoryFile } from '../../inventory/validator.js';
import { createFileEvidenceResolver } from '../../utils/evidence.js';
import {
  addRootOption,
  addVerboseOption,
  pathOption,
  printBanner,
  printInfo,
  printSuccess,
  printWarning,
  requireInputFile,
  resolveCommandConfig,
  type RootOptions,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface ValidateOptions extends RootOptions {
  inventory?: string;
  checkSamples?: boolean;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerValidateCommand(program: Command): void {
  const cmd = program
    .command('validate')
    .description('Validate the log-source inventory (devices.csv)')
    .option('-i, --inventory <file>', 'Inventory CSV (default: inventory/devices.csv)')
    .option('--check-samples', 'Require every sample reference to resolve to a file under the root');
  addRootOption(cmd);
  addVerboseOption(cmd);
  cmd.action((options: ValidateOptions) => {
    runValidate(options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

function runValidate(options: ValidateOptions): void {
  printBanner('Use-Case Factory — Inventory Validator');

  const config = resolveCommandConfig(options);
  const inventoryPath = requireInputFile(pathOption(options.inventory, config.paths.inventory), 'Inventory');

  printInfo(`Inventory: ${inventoryPath}`);
  console.log('');

  const result = validateInventoryFile(inventoryPath, {
    sampleResolver: options.checkSamples ? createFileEvidenceResolver(config.root) : undefined,
  });

  for (const warning of result.warnings) {
    printWarning(warning);
  }

  const proven = result.sources.filter((s) => s.siemIngestionProven).length;
  printSuccess(`${result.sources.length} log source(s) valid, ${proven} with proven SIEM ingestion`);
  printInfo(`Families (${result.families.length}): ${chalk.white(result.families.join(', '))}`);
  console.log('');
}
