/**
 * Command tree for the use-case factory CLI.
 */

import { Command } from 'commander';

import { registerValidateCommand } from './commands/validate.js';
import { registerTechniquesCommand } from './commands/techniques.js';
import { registerSeedCommand } from './commands/seed.js';
import { registerVerifyCommand } from './commands/verify.js';
import { registerCoverageCommand } from './commands/coverage.js';
import { registerSchemasCommand } from './commands/schemas.js';
import { registerRunCommand } from './commands/run.js';
import { getPackageVersion } from './version.js';

/**
 * Build the command tree. Exported so tests can inspect it without
 * parsing argv.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('usecase-factory')
    .description('Track which ATT&CK techniques your SIEM telemetry can prove it sees')
    .version(getPackageVersion());

  // Subcommands inherit this when created after it
  program.exitOverride();

  // Register all commands
  registerValidateCommand(program);
  registerTechniquesCommand(program);
  registerSeedCommand(program);
  registerVerifyCommand(program);
  registerCoverageCommand(program);
  registerSchemasCommand(program);
  registerRunCommand(program);

  return program;
}
