/**
 * Verify command — merge proof-of-telemetry records into the scaffold.
 */

import type { Command } from 'commander';

import { runVerificationMerge } from '../../mapping/verification-merger.js';
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

interface VerifyOptions extends RootOptions {
  records?: string;
  scaffold?: string;
  skipEvidenceCheck?: boolean;
}

export function registerVerifyCommand(program: Command): void {
  const cmd = program
    .command('verify')
    .description('Upgrade scaffold cells to verified from verification records')
    .option('--records <file>', 'Verification records CSV (default: mappings/verification/verification_records.csv)')
    .option('--scaffold <file>', 'Mapping scaffold CSV (default: mappings/generated/mapping_scaffold.csv)')
    .option('--skip-evidence-check', 'Accept sample references without checking the files exist');
  addRootOption(cmd);
  addVerboseOption(cmd);
  cmd.action((options: VerifyOptions) => {
    runVerify(options);
  });
}

function runVerify(options: VerifyOptions): void {
  printBanner('Use-Case Factory — Verification Merge');

  const config = resolveCommandConfig(options);
  const paths = {
    scaffold: requireInputFile(
      pathOption(options.scaffold, config.paths.scaffold),
      'Mapping scaffold (run "usecase-factory seed" first)',
    ),
    verificationRecords: requireInputFile(
      pathOption(options.records, config.paths.verificationRecords),
      'Verification records',
    ),
  };

  if (options.skipEvidenceCheck) {
    printWarning('Evidence check skipped: sample references are not resolved');
  }
  printInfo(`Records: ${paths.verificationRecords}`);
  console.log('');

  const result = runVerificationMerge(paths, {
    evidenceResolver: options.skipEvidenceCheck ? undefined : createFileEvidenceResolver(config.root),
  });

  printSuccess(
    `${result.records} record(s): ${result.upgraded} cell(s) upgraded, ${result.alreadyVerified} already verified`,
  );
  printInfo(result.changed ? `Wrote ${paths.scaffold}` : `${paths.scaffold} is up to date`);
  console.log('');
}
