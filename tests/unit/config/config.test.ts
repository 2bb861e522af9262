/**
 * Unit tests for configuration loading.
 *
 * Tests: loadConfig, resolvePaths
 */

import { describe, it, expect } from 'vitest';
import { join, resolve } from 'node:path';

import { loadConfig, resolvePaths } from '@/config/index.js';
import { ValidationError } from '@/utils/errors.js';

describe('resolvePaths', () => {
  it('lays artifacts out under inventory/ and mappings/', () => {
    const root = resolve('/srv/factory');
    const paths = resolvePaths(root);

    expect(paths.inventory).toBe(join(root, 'inventory', 'devices.csv'));
    expect(paths.attackBundle).toBe(join(root, 'mappings', 'raw', 'enterprise-attack.json'));
    expect(paths.techniqueMaster).toBe(join(root, 'mappings', 'generated', 'attack_techniques_master.csv'));
    expect(paths.tacticOrder).toBe(join(root, 'mappings', 'generated', 'lookups', 'mitre_tactic_order.csv'));
    expect(paths.scaffold).toBe(join(root, 'mappings', 'generated', 'mapping_scaffold.csv'));
    expect(paths.verificationRecords).toBe(join(root, 'mappings', 'verification', 'verification_records.csv'));
    expect(paths.coverageMatrix).toBe(join(root, 'mappings', 'coverage_matrix.csv'));
  });
});

describe('loadConfig', () => {
  it('prefers an explicit root over FACTORY_ROOT', () => {
    const config = loadConfig({ root: '/srv/override' }, { FACTORY_ROOT: '/srv/env' });
    expect(config.root).toBe(resolve('/srv/override'));
  });

  it('falls back to FACTORY_ROOT, then the working directory', () => {
    expect(loadConfig({}, { FACTORY_ROOT: '/srv/env' }).root).toBe(resolve('/srv/env'));
    expect(loadConfig({}, {}).root).toBe(process.cwd());
    expect(loadConfig({}, { FACTORY_ROOT: '  ' }).root).toBe(process.cwd());
  });

  it('reads LOG_LEVEL, defaulting to info', () => {
    expect(loadConfig({}, {}).logLevel).toBe('info');
    expect(loadConfig({}, { LOG_LEVEL: 'debug' }).logLevel).toBe('debug');
  });

  it('rejects an unknown LOG_LEVEL', () => {
    expect(() => loadConfig({}, { LOG_LEVEL: 'verbose' })).toThrow(ValidationError);
  });
});
