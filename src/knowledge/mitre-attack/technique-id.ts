/**
 * ATT&CK technique identifier helpers.
 */

/** Valid ATT&CK technique ID pattern: T1234 or T1234.001 */
export const TECHNIQUE_ID_RE = /^T\d{4}(\.\d{3})?$/;

export function isTechniqueId(value: string): boolean {
  return TECHNIQUE_ID_RE.test(value);
}

/**
 * Order technique ids by parent technique, then sub-technique number, so
 * T1059 < T1059.001 < T1059.010 < T1060.
 */
export function compareTechniqueIds(a: string, b: string): number {
  const [aParent, aSub = ''] = a.split('.', 2);
  const [bParent, bSub = ''] = b.split('.', 2);

  if (aParent !== bParent) {
    return aParent < bParent ? -1 : 1;
  }
  if (aSub === bSub) return 0;
  if (aSub === '') return -1;
  if (bSub === '') return 1;

  const diff = Number(aSub) - Number(bSub);
  if (Number.isNaN(diff) || diff === 0) {
    return aSub < bSub ? -1 : aSub > bSub ? 1 : 0;
  }
  return diff;
}
