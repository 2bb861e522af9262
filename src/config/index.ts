/**
 * Runtime configuration: environment variables (optionally from .env, loaded
 * by the CLI entry) validated with zod, plus the conventional artifact paths
 * derived from the project root.
 */

import { resolve } from 'node:path';
import { z } from 'zod';

import type { FactoryConfig, FactoryPaths } from '../types/config.js';
import { ValidationError } from '../utils/errors.js';

const LOG_LEVELS_TUPLE = ['debug', 'info', 'warn', 'error'] as const;

// Blank variables count as unset.
const blankAsUnset = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z.object({
  FACTORY_ROOT: z.preprocess(blankAsUnset, z.string().trim().optional()),
  LOG_LEVEL: z.preprocess(blankAsUnset, z.enum(LOG_LEVELS_TUPLE).default('info')),
});

export interface ConfigOverrides {
  root?: string;
}

/**
 * Build artifact paths relative to a project root.
 */
export function resolvePaths(root: string): FactoryPaths {
  const at = (...segments: string[]): string => resolve(root, ...segments);

  return {
    inventory: at('inventory', 'devices.csv'),
    schemasDir: at('inventory', 'schemas'),
    attackBundle: at('mappings', 'raw', 'enterprise-attack.json'),
    techniqueMaster: at('mappings', 'generated', 'attack_techniques_master.csv'),
    tacticOrder: at('mappings', 'generated', 'lookups', 'mitre_tactic_order.csv'),
    attackMetadata: at('mappings', 'generated', 'attack_metadata.json'),
    scaffold: at('mappings', 'generated', 'mapping_scaffold.csv'),
    retiredCells: at('mappings', 'generated', 'retired_cells.csv'),
    verificationRecords: at('mappings', 'verification', 'verification_records.csv'),
    coverageMatrix: at('mappings', 'coverage_matrix.csv'),
    coverageReport: at('mappings', 'generated', 'coverage.json'),
    navigatorDir: at('mappings', 'generated', 'navigator'),
  };
}

/**
 * Load configuration from the environment. An explicit `root` override
 * (the CLI's --root) wins over FACTORY_ROOT, which wins over the cwd.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): FactoryConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const root = resolve(overrides.root ?? parsed.data.FACTORY_ROOT ?? process.cwd());

  return {
    root,
    logLevel: parsed.data.LOG_LEVEL,
    paths: resolvePaths(root),
  };
}
