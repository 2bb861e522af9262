/**
 * Mapping cell status lattice. Status only moves forward:
 * unseeded → seeded → verified.
 */

import { CELL_STATUSES, type CellStatus } from '../types/mapping.js';

const STATUS_RANK: Record<CellStatus, number> = {
  unseeded: 0,
  seeded: 1,
  verified: 2,
};

export function isCellStatus(value: string): value is CellStatus {
  return CELL_STATUSES.some((status) => status === value);
}

export function statusRank(status: CellStatus): number {
  return STATUS_RANK[status];
}

/** True when moving from `from` to `to` would go backwards. */
export function isRegression(from: CellStatus, to: CellStatus): boolean {
  return STATUS_RANK[to] < STATUS_RANK[from];
}

/** The further-advanced of two statuses. */
export function maxStatus(a: CellStatus, b: CellStatus): CellStatus {
  return STATUS_RANK[a] >= STATUS_RANK[b] ? a : b;
}
