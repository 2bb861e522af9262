#!/usr/bin/env node

/**
 * Use-case factory CLI — log-source inventory to ATT&CK telemetry coverage.
 *
 * Usage:
 *   usecase-factory validate --check-samples
 *   usecase-factory techniques --src mappings/raw/enterprise-attack.json
 *   usecase-factory seed --platform-filter
 *   usecase-factory verify
 *   usecase-factory coverage --list-gaps
 *   usecase-factory schemas --templates inventory/templates
 *   usecase-factory run
 */

import 'dotenv/config';

import { CommanderError } from 'commander';
import chalk from 'chalk';

import { createProgram } from './program.js';
import { printFailure } from './options.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync();
  } catch (err) {
    // CommanderError for help/version is expected — don't treat as error
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
      process.exit(err.exitCode);
    }

    printFailure(err);
    console.error(chalk.gray('Run "usecase-factory --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  printFailure(err);
  process.exit(1);
});
