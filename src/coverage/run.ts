/**
 * Coverage stage: technique master + tactic order + scaffold →
 * coverage_matrix.csv, coverage.json and the Navigator layers (overall plus
 * one per family platform, which needs the inventory).
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import type { FactoryPaths } from '../types/config.js';
import type { CoverageResult } from '../types/coverage.js';
import { validateInventoryFile } from '../inventory/validator.js';
import { TechniqueCatalog } from '../knowledge/mitre-attack/loader.js';
import { resolveFamilyPlatforms, type FamilyPlatform } from '../mapping/platforms.js';
import { readScaffold } from '../mapping/scaffold-store.js';
import { buildCoverageReport, writeCoverageReport, type CoverageReport } from '../reporting/json-reporter.js';
import { formatCoverageMatrixCsv } from '../reporting/matrix-reporter.js';
import { buildNavigatorLayer, buildPlatformLayers, writeNavigatorLayer } from '../reporting/navigator-layer.js';
import { writeFileAtomic } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import { aggregateCoverage, verifiedPercentage } from './aggregator.js';

const logger = createLogger('coverage');

export const NAVIGATOR_LAYER_FILE = 'coverage_overall.layer.json';

export function platformLayerFile(platform: FamilyPlatform): string {
  return `coverage_${platform}.layer.json`;
}

function readFamilyPlatforms(inventoryPath: string): Map<string, FamilyPlatform> {
  if (!existsSync(inventoryPath)) {
    logger.warn(`No inventory at ${inventoryPath}; every family is placed on platform 'other'`);
    return new Map();
  }
  return resolveFamilyPlatforms(validateInventoryFile(inventoryPath).sources);
}

const AttackMetadataSchema = z.object({ attackVersion: z.string() }).passthrough();

function readAttackVersion(path: string): string {
  if (!existsSync(path)) return 'unknown';

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    logger.warn(`Ignoring unreadable ATT&CK metadata at ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return 'unknown';
  }

  const parsed = AttackMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Ignoring malformed ATT&CK metadata at ${path}`);
    return 'unknown';
  }
  return parsed.data.attackVersion;
}

export interface RunCoverageOptions {
  factoryVersion?: string;
  navigatorLayer?: boolean;
  now?: () => Date;
}

export interface RunCoverageResult {
  result: CoverageResult;
  report: CoverageReport;
  outputs: string[];
}

export function runCoverage(
  paths: Pick<
    FactoryPaths,
    | 'inventory'
    | 'techniqueMaster'
    | 'tacticOrder'
    | 'attackMetadata'
    | 'scaffold'
    | 'coverageMatrix'
    | 'coverageReport'
    | 'navigatorDir'
  >,
  options: RunCoverageOptions = {},
): RunCoverageResult {
  const catalog = TechniqueCatalog.load(paths);
  const cells = readScaffold(paths.scaffold);
  const attackVersion = readAttackVersion(paths.attackMetadata);
  const withLayers = options.navigatorLayer !== false;
  const platforms = withLayers ? readFamilyPlatforms(paths.inventory) : new Map<string, FamilyPlatform>();

  logger.info(`Aggregating ${cells.length} cells over ${catalog.techniques.length} techniques`);

  const result = aggregateCoverage(catalog, cells);
  const report = buildCoverageReport(
    result,
    {
      generatedAt: (options.now ?? (() => new Date()))().toISOString(),
      factoryVersion: options.factoryVersion ?? 'unknown',
      attackVersion,
    },
    verifiedPercentage(result.overall),
  );

  writeFileAtomic(paths.coverageMatrix, formatCoverageMatrixCsv(result));
  writeCoverageReport(report, paths.coverageReport);
  const outputs = [paths.coverageMatrix, paths.coverageReport];

  if (withLayers) {
    const layerPath = join(paths.navigatorDir, NAVIGATOR_LAYER_FILE);
    writeNavigatorLayer(buildNavigatorLayer(catalog, result, attackVersion), layerPath);
    outputs.push(layerPath);

    for (const { platform, layer } of buildPlatformLayers(catalog, cells, platforms, attackVersion)) {
      const platformPath = join(paths.navigatorDir, platformLayerFile(platform));
      writeNavigatorLayer(layer, platformPath);
      outputs.push(platformPath);
    }
  }

  return { result, report, outputs };
}
