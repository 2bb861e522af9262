/**
 * Run command — the whole factory in one pass.
 *
 * Executes validate → techniques → seed → verify → coverage with a spinner
 * per stage. Each stage commits its artifact before the next starts, so a
 * failure leaves every earlier artifact in place and nothing later touched.
 */

import { existsSync } from 'fs';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { runCoverage } from '../../coverage/run.js';
import { validateInventoryFile } from '../../inventory/validator.js';
import { buildTechniqueMasterFromFile } from '../../knowledge/mitre-attack/technique-master.js';
import { runSeeder } from '../../mapping/seeder.js';
import { runVerificationMerge } from '../../mapping/verification-merger.js';
import { printSummary } from '../../reporting/summary-reporter.js';
import type { FactoryConfig } from '../../types/config.js';
import { createFileEvidenceResolver } from '../../utils/evidence.js';
import { getPackageVersion } from '../version.js';
import {
  addRootOption,
  addVerboseOption,
  printBanner,
  printInfo,
  printWarning,
  resolveCommandConfig,
  type RootOptions,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface RunOptions extends RootOptions {
  skipTechniques?: boolean;
  platformFilter?: boolean;
  archiveRetired?: boolean;
  skipEvidenceCheck?: boolean;
  navigatorLayer: boolean;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command): void {
  const cmd = program
    .command('run')
    .description('Run every stage: validate, techniques, seed, verify, coverage')
    .option('--skip-techniques', 'Reuse the existing technique master instead of rebuilding it')
    .option('--platform-filter', 'Leave pairs outside the family platform unseeded')
    .option('--archive-retired', 'Archive cells of techniques removed from ATT&CK instead of failing')
    .option('--skip-evidence-check', 'Accept sample references without checking the files exist')
    .option('--no-navigator-layer', 'Skip the ATT&CK Navigator layer export');
  addRootOption(cmd);
  addVerboseOption(cmd);
  cmd.action((options: RunOptions) => {
    runPipeline(options);
  });
}

// ---------------------------------------------------------------------------
// Stage helper
// ---------------------------------------------------------------------------

/**
 * Run one stage under a spinner. The spinner fails and the error is
 * rethrown when the stage throws.
 */
function stage<T>(label: string, fn: () => T, describe: (value: T) => string): T {
  const spinner = ora(label).start();
  try {
    const value = fn();
    spinner.succeed(chalk.green(describe(value)));
    return value;
  } catch (err) {
    spinner.fail(chalk.red(`${label} failed`));
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

function runPipeline(options: RunOptions): void {
  printBanner('Use-Case Factory — Full Pipeline');

  const config: FactoryConfig = resolveCommandConfig(options);
  const { paths } = config;
  const startTime = Date.now();

  printInfo(`Root: ${config.root}`);
  console.log('');

  stage(
    'Validating inventory...',
    () => validateInventoryFile(paths.inventory),
    (r) => `Inventory valid: ${r.sources.length} source(s), ${r.families.length} famil${r.families.length === 1 ? 'y' : 'ies'}`,
  );

  if (options.skipTechniques) {
    printInfo('Technique master rebuild skipped');
  } else {
    stage(
      'Building ATT&CK technique master...',
      () => buildTechniqueMasterFromFile(paths.attackBundle, paths),
      (m) => `ATT&CK ${m.metadata.attackVersion}: ${m.metadata.techniqueCount} techniques`,
    );
  }

  stage(
    'Seeding mapping scaffold...',
    () =>
      runSeeder(paths, {
        platformFilter: options.platformFilter ?? false,
        archiveRetired: options.archiveRetired ?? false,
      }),
    (r) => `Scaffold: ${r.cells.length} cells (${r.added} new, ${r.preserved} preserved)`,
  );

  if (existsSync(paths.verificationRecords)) {
    stage(
      'Merging verification records...',
      () =>
        runVerificationMerge(paths, {
          evidenceResolver: options.skipEvidenceCheck ? undefined : createFileEvidenceResolver(config.root),
        }),
      (r) => `Verification: ${r.upgraded} upgraded, ${r.alreadyVerified} already verified`,
    );
  } else {
    printWarning(`No verification records at ${paths.verificationRecords}; verify stage skipped`);
  }

  const { result } = stage(
    'Computing coverage...',
    () =>
      runCoverage(paths, {
        factoryVersion: getPackageVersion(),
        navigatorLayer: options.navigatorLayer,
      }),
    (r) => `Coverage: ${r.result.overall.verifiedCount}/${r.result.overall.totalTechniques} techniques verified`,
  );

  console.log('');
  printSummary({
    title: 'TELEMETRY COVERAGE',
    processingTimeMs: Date.now() - startTime,
    rows: result.rows,
    overall: result.overall,
    gapCount: result.gaps.length,
    pairCoverage: result.pairCoverage.overall,
  });
  console.log('');
}
