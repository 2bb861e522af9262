import { describe, it, expect } from 'vitest';
import { isCellStatus, isRegression, maxStatus, statusRank } from '@/mapping/status.js';

describe('cell status lattice', () => {
  it('recognises the three statuses', () => {
    expect(isCellStatus('unseeded')).toBe(true);
    expect(isCellStatus('seeded')).toBe(true);
    expect(isCellStatus('verified')).toBe(true);
    expect(isCellStatus('Verified')).toBe(false);
    expect(isCellStatus('')).toBe(false);
  });

  it('ranks unseeded < seeded < verified', () => {
    expect(statusRank('unseeded')).toBeLessThan(statusRank('seeded'));
    expect(statusRank('seeded')).toBeLessThan(statusRank('verified'));
  });

  it('flags only backward moves as regressions', () => {
    expect(isRegression('verified', 'seeded')).toBe(true);
    expect(isRegression('seeded', 'unseeded')).toBe(true);
    expect(isRegression('seeded', 'seeded')).toBe(false);
    expect(isRegression('unseeded', 'verified')).toBe(false);
  });

  it('maxStatus keeps the further-advanced status', () => {
    expect(maxStatus('verified', 'unseeded')).toBe('verified');
    expect(maxStatus('unseeded', 'seeded')).toBe('seeded');
    expect(maxStatus('seeded', 'seeded')).toBe('seeded');
  });
});
