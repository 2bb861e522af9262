/**
 * Seed command — cross techniques with inventory families into the
 * mapping scaffold, preserving prior status and evidence.
 */

import type { Command } from 'commander';

import { runSeeder } from '../../mapping/seeder.js';
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

interface SeedCommandOptions extends RootOptions {
  platformFilter?: boolean;
  archiveRetired?: boolean;
  inventory?: string;
  attack?: string;
  tactics?: string;
  out?: string;
  retiredOut?: string;
}

export function registerSeedCommand(program: Command): void {
  const cmd = program
    .command('seed')
    .description('Seed the technique × family mapping scaffold')
    .option('--platform-filter', 'Leave pairs outside the family platform unseeded')
    .option('--archive-retired', 'Archive cells of techniques removed from ATT&CK instead of failing')
    .option('-i, --inventory <file>', 'Inventory CSV (default: inventory/devices.csv)')
    .option('-a, --attack <file>', 'Technique master CSV')
    .option('--tactics <file>', 'Tactic order CSV')
    .option('-o, --out <file>', 'Mapping scaffold CSV')
    .option('--retired-out <file>', 'Retired cells archive CSV');
  addRootOption(cmd);
  addVerboseOption(cmd);
  cmd.action((options: SeedCommandOptions) => {
    runSeed(options);
  });
}

function runSeed(options: SeedCommandOptions): void {
  printBanner('Use-Case Factory — Scaffold Seeder');

  const config = resolveCommandConfig(options);
  const paths = {
    inventory: requireInputFile(pathOption(options.inventory, config.paths.inventory), 'Inventory'),
    techniqueMaster: requireInputFile(
      pathOption(options.attack, config.paths.techniqueMaster),
      'Technique master (run "usecase-factory techniques" first)',
    ),
    tacticOrder: pathOption(options.tactics, config.paths.tacticOrder),
    scaffold: pathOption(options.out, config.paths.scaffold),
    retiredCells: pathOption(options.retiredOut, config.paths.retiredCells),
  };

  const result = runSeeder(paths, {
    platformFilter: options.platformFilter ?? false,
    archiveRetired: options.archiveRetired ?? false,
  });

  if (result.retired.length > 0) {
    printWarning(`Archived ${result.retired.length} cell(s) of retired techniques to ${paths.retiredCells}`);
  }
  printSuccess(
    `${result.cells.length} cells over ${result.families.length} families ` +
      `(${result.added} new, ${result.preserved} preserved)`,
  );
  printInfo(result.changed ? `Wrote ${paths.scaffold}` : `${paths.scaffold} is up to date`);
  console.log('');
}
