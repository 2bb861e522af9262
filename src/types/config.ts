/**
 * Configuration types for the use-case factory.
 */

import type { LogLevel } from '../utils/logger.js';

export interface FactoryConfig {
  /** Absolute project root holding inventory/ and mappings/. */
  root: string;
  logLevel: LogLevel;
  paths: FactoryPaths;
}

/**
 * Conventional artifact locations, all absolute. Each stage reads and
 * writes only these unless a command overrides one explicitly.
 */
export interface FactoryPaths {
  inventory: string;
  schemasDir: string;
  attackBundle: string;
  techniqueMaster: string;
  tacticOrder: string;
  attackMetadata: string;
  scaffold: string;
  retiredCells: string;
  verificationRecords: string;
  coverageMatrix: string;
  coverageReport: string;
  navigatorDir: string;
}
