/**
 * Log-source family platform classification.
 *
 * Each family is bucketed into a coarse platform (windows, linux, ...) so
 * the seeder can tell which ATT&CK techniques a family could plausibly
 * observe, and the schema generator can pick default fields.
 */

import type { LogSource } from '../types/inventory.js';

export const FAMILY_PLATFORMS = [
  'windows',
  'linux',
  'macos',
  'network',
  'cloud',
  'saas',
  'edr',
  'other',
] as const;

export type FamilyPlatform = (typeof FAMILY_PLATFORMS)[number];

/**
 * ATT&CK `x_mitre_platforms` values each family platform can observe.
 * `other` has no entry: it is treated as applicable to everything.
 */
const ATTACK_PLATFORMS: Record<Exclude<FamilyPlatform, 'other'>, readonly string[]> = {
  windows: ['Windows'],
  linux: ['Linux'],
  macos: ['macOS'],
  network: ['Network', 'Network Devices'],
  cloud: ['IaaS', 'Containers', 'Azure AD', 'Identity Provider'],
  saas: ['SaaS', 'Office 365', 'Google Workspace', 'Azure AD', 'Identity Provider', 'Office Suite'],
  edr: ['Windows', 'Linux', 'macOS'],
};

export function isFamilyPlatform(value: string): value is FamilyPlatform {
  return FAMILY_PLATFORMS.some((platform) => platform === value);
}

/**
 * Guess a platform from a sourcetype or family name.
 *
 * @example guessPlatform('XmlWinEventLog:Microsoft-Windows-Sysmon/Operational') => 'windows'
 * @example guessPlatform('aws:cloudtrail') => 'cloud'
 */
export function guessPlatform(name: string): FamilyPlatform {
  const s = name.toLowerCase();

  if (/^(xml)?wineventlog|^perfmon|^script:|^windows|sysmon/.test(s)) return 'windows';
  if (s.startsWith('aws:') || s.startsWith('azure') || s.startsWith('gcp') || s.includes('cloudtrail')) return 'cloud';
  if (s.startsWith('ms:o365') || s.startsWith('ms:aad') || s.includes('o365') || s.includes('saas')) return 'saas';
  if (/^(cisco:|stream:|bro:|zeek:|pan:|network|firewall|proxy|dns)/.test(s)) return 'network';
  if (/^(symantec:ep|osquery|crowdstrike|edr)/.test(s)) return 'edr';
  if (/^(unix:|linux|auditd|syslog)/.test(s)) return 'linux';
  if (s.startsWith('macos') || s.startsWith('osx')) return 'macos';
  return 'other';
}

/**
 * Resolve each family's platform: the first explicit, recognised `platform`
 * value among its sources, otherwise a guess from its sourcetypes and then
 * its own name.
 */
export function resolveFamilyPlatforms(sources: readonly LogSource[]): Map<string, FamilyPlatform> {
  const byFamily = new Map<string, LogSource[]>();
  for (const source of sources) {
    const list = byFamily.get(source.family) ?? [];
    list.push(source);
    byFamily.set(source.family, list);
  }

  const result = new Map<string, FamilyPlatform>();
  for (const [family, members] of byFamily) {
    const explicit = members.map((m) => m.platform).find(isFamilyPlatform);
    if (explicit) {
      result.set(family, explicit);
      continue;
    }

    const guessed = members
      .map((m) => (m.sourcetype ? guessPlatform(m.sourcetype) : 'other'))
      .find((p) => p !== 'other');
    result.set(family, guessed ?? guessPlatform(family));
  }

  return result;
}

/**
 * Whether a family on `platform` can observe a technique targeting
 * `techniquePlatforms`. Techniques without declared platforms, and
 * families on `other`, are always applicable.
 */
export function isApplicable(platform: FamilyPlatform, techniquePlatforms: readonly string[]): boolean {
  if (platform === 'other' || techniquePlatforms.length === 0) return true;
  const observable = ATTACK_PLATFORMS[platform];
  return techniquePlatforms.some((p) => observable.includes(p));
}
