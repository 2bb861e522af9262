/**
 * Shared CLI option helpers for the use-case factory commands.
 *
 * Provides reusable option registration functions, configuration and path
 * resolution, and the colored message printers used across all commands.
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig } from '../config/index.js';
import type { FactoryConfig } from '../types/config.js';
import { isPipelineError } from '../utils/errors.js';
import { setLogLevel } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

export interface RootOptions {
  root?: string;
  verbose?: boolean;
}

/**
 * Add the -r/--root option to a command.
 */
export function addRootOption(cmd: Command): Command {
  return cmd.option(
    '-r, --root <dir>',
    'Project root holding inventory/ and mappings/ (default: $FACTORY_ROOT or cwd)',
  );
}

/**
 * Add the --verbose flag to a command.
 */
export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Verbose output (debug logging)');
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Load configuration for a command invocation and apply its log level.
 */
export function resolveCommandConfig(options: RootOptions): FactoryConfig {
  const config = loadConfig({ root: options.root });
  setLogLevel(options.verbose ? 'debug' : config.logLevel);
  return config;
}

/**
 * Resolve an optional path option, falling back to the conventional path.
 */
export function pathOption(value: string | undefined, fallback: string): string {
  return value ? resolve(value) : fallback;
}

/**
 * Fail with a clear message when a required input file is absent.
 */
export function requireInputFile(path: string, description: string): string {
  if (!existsSync(path)) {
    throw new Error(`${description} not found: ${path}`);
  }
  return path;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

/**
 * Print a command banner.
 */
export function printBanner(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`  ${title}`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

/**
 * Print any thrown value; pipeline errors also list their issues.
 */
export function printFailure(err: unknown): void {
  if (isPipelineError(err)) {
    console.error(chalk.red(`\nError: [${err.name}] ${err.message}`));
    for (const issue of err.issues) {
      console.error(chalk.gray(`  - ${issue}`));
    }
    console.error('');
    return;
  }
  printError(err instanceof Error ? err.message : String(err));
}

/**
 * Print an informational message.
 */
export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

/**
 * Print a success message.
 */
export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

/**
 * Print a warning message.
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
