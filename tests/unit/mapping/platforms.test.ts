/**
 * Unit tests for family platform classification.
 *
 * Tests: guessPlatform, resolveFamilyPlatforms, isApplicable
 */

import { describe, it, expect } from 'vitest';

import { guessPlatform, isApplicable, isFamilyPlatform, resolveFamilyPlatforms } from '@/mapping/platforms.js';
import type { LogSource } from '@/types/inventory.js';

function makeSource(overrides: Partial<LogSource> = {}): LogSource {
  return {
    sourceId: 'src-1',
    family: 'windows-security',
    rawSampleRef: '',
    parsedSampleRef: '',
    siemIngestionProven: false,
    vendor: '',
    product: '',
    platform: '',
    sourcetype: '',
    index: '',
    enabled: null,
    owner: '',
    mitreTechniques: [],
    notes: '',
    line: 2,
    ...overrides,
  };
}

describe('guessPlatform', () => {
  it.each([
    ['XmlWinEventLog:Microsoft-Windows-Sysmon/Operational', 'windows'],
    ['WinEventLog:Security', 'windows'],
    ['windows-security', 'windows'],
    ['aws:cloudtrail', 'cloud'],
    ['ms:o365:management', 'saas'],
    ['pan:traffic', 'network'],
    ['proxy', 'network'],
    ['osquery:results', 'edr'],
    ['linux_secure', 'linux'],
    ['auditd', 'linux'],
    ['macos-unified-log', 'macos'],
    ['badge-readers', 'other'],
  ])('%s → %s', (name, expected) => {
    expect(guessPlatform(name)).toBe(expected);
  });
});

describe('resolveFamilyPlatforms', () => {
  it('prefers an explicit platform, then sourcetypes, then the family name', () => {
    const platforms = resolveFamilyPlatforms([
      makeSource({ family: 'dc-logs', platform: 'windows', sourcetype: 'aws:cloudtrail' }),
      makeSource({ sourceId: 'src-2', family: 'trail', sourcetype: 'aws:cloudtrail' }),
      makeSource({ sourceId: 'src-3', family: 'proxy', platform: 'appliance' }),
      makeSource({ sourceId: 'src-4', family: 'badge-readers' }),
    ]);

    expect(Object.fromEntries(platforms)).toEqual({
      'dc-logs': 'windows',
      trail: 'cloud',
      proxy: 'network',
      'badge-readers': 'other',
    });
  });

  it('only accepts recognised explicit platforms', () => {
    expect(isFamilyPlatform('network')).toBe(true);
    expect(isFamilyPlatform('appliance')).toBe(false);
  });
});

describe('isApplicable', () => {
  it('matches ATT&CK platforms observable from the family platform', () => {
    expect(isApplicable('windows', ['Windows'])).toBe(true);
    expect(isApplicable('network', ['Linux', 'Windows', 'macOS'])).toBe(false);
    expect(isApplicable('edr', ['macOS'])).toBe(true);
    expect(isApplicable('saas', ['Office 365'])).toBe(true);
  });

  it('treats other families and platform-less techniques as applicable', () => {
    expect(isApplicable('other', ['Windows'])).toBe(true);
    expect(isApplicable('network', [])).toBe(true);
  });
});
