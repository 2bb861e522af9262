/**
 * Coverage command — roll the scaffold up into per-tactic coverage.
 *
 * Writes coverage_matrix.csv and coverage.json, optionally exports an
 * ATT&CK Navigator layer, and displays a coverage summary in the terminal.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { runCoverage } from '../../coverage/run.js';
import { printSummary } from '../../reporting/summary-reporter.js';
import { getPackageVersion } from '../version.js';
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

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface CoverageOptions extends RootOptions {
  navigatorLayer: boolean;
  listGaps?: boolean;
  scaffold?: string;
  attack?: string;
  tactics?: string;
  metadata?: string;
  inventory?: string;
  matrixOut?: string;
  reportOut?: string;
  layersOut?: string;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerCoverageCommand(program: Command): void {
  const cmd = program
    .command('coverage')
    .description('Compute per-tactic ATT&CK telemetry coverage from the scaffold')
    .option('--no-navigator-layer', 'Skip the ATT&CK Navigator layer export')
    .option('--list-gaps', 'Print every technique without a mapped family')
    .option('--scaffold <file>', 'Mapping scaffold CSV (default: mappings/generated/mapping_scaffold.csv)')
    .option('-a, --attack <file>', 'Technique master CSV')
    .option('--tactics <file>', 'Tactic order CSV')
    .option('--metadata <file>', 'Dataset metadata JSON')
    .option('-i, --inventory <file>', 'Inventory CSV, read for the per-platform layers')
    .option('--matrix-out <file>', 'Coverage matrix CSV')
    .option('--report-out <file>', 'Coverage report JSON')
    .option('--layers-out <dir>', 'Directory for the Navigator layers');
  addRootOption(cmd);
  addVerboseOption(cmd);
  cmd.action((options: CoverageOptions) => {
    runCoverageCommand(options);
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

function runCoverageCommand(options: CoverageOptions): void {
  printBanner('Use-Case Factory — ATT&CK Coverage');

  const config = resolveCommandConfig(options);
  const paths = {
    scaffold: requireInputFile(
      pathOption(options.scaffold, config.paths.scaffold),
      'Mapping scaffold (run "usecase-factory seed" first)',
    ),
    techniqueMaster: pathOption(options.attack, config.paths.techniqueMaster),
    tacticOrder: pathOption(options.tactics, config.paths.tacticOrder),
    attackMetadata: pathOption(options.metadata, config.paths.attackMetadata),
    inventory: pathOption(options.inventory, config.paths.inventory),
    coverageMatrix: pathOption(options.matrixOut, config.paths.coverageMatrix),
    coverageReport: pathOption(options.reportOut, config.paths.coverageReport),
    navigatorDir: pathOption(options.layersOut, config.paths.navigatorDir),
  };

  const startTime = Date.now();
  const { result, outputs } = runCoverage(paths, {
    factoryVersion: getPackageVersion(),
    navigatorLayer: options.navigatorLayer,
  });

  printSummary({
    title: 'TELEMETRY COVERAGE',
    processingTimeMs: Date.now() - startTime,
    rows: result.rows,
    overall: result.overall,
    gapCount: result.gaps.length,
    pairCoverage: result.pairCoverage.overall,
  });
  console.log('');

  if (options.listGaps && result.gaps.length > 0) {
    printInfo(`Gap techniques (${result.gaps.length}):`);
    for (const id of result.gaps) {
      console.log(chalk.gray(`    ${id}`));
    }
    console.log('');
  }

  for (const output of outputs) {
    printSuccess(`Wrote ${output}`);
  }
  console.log('');
}
