import { describe, it, expect } from 'vitest';
import { compareTechniqueIds, isTechniqueId } from '@/knowledge/mitre-attack/technique-id.js';

describe('isTechniqueId', () => {
  it('accepts techniques and sub-techniques only', () => {
    expect(isTechniqueId('T1059')).toBe(true);
    expect(isTechniqueId('T1059.001')).toBe(true);
    expect(isTechniqueId('TA0002')).toBe(false);
    expect(isTechniqueId('T1059.1')).toBe(false);
    expect(isTechniqueId('t1059')).toBe(false);
  });
});

describe('compareTechniqueIds', () => {
  it('orders parents before their sub-techniques and sub-techniques numerically', () => {
    const ids = ['T1060', 'T1059.010', 'T1059', 'T1059.002', 'T1003'];
    expect([...ids].sort(compareTechniqueIds)).toEqual(['T1003', 'T1059', 'T1059.002', 'T1059.010', 'T1060']);
  });

  it('treats identical ids as equal', () => {
    expect(compareTechniqueIds('T1059.001', 'T1059.001')).toBe(0);
  });
});
