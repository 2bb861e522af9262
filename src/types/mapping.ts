/**
 * Technique × log-source-family mapping scaffold types.
 */

export const CELL_STATUSES = ['unseeded', 'seeded', 'verified'] as const;

export type CellStatus = (typeof CELL_STATUSES)[number];

export interface MappingCell {
  techniqueId: string;
  family: string;
  status: CellStatus;
  rawEvidenceRef: string;
  parsedEvidenceRef: string;
  /** Timestamp of the verification record that upgraded the cell. */
  verifiedAt: string;
}

/** Proof that a family emits events usable for a technique. */
export interface VerificationRecord {
  techniqueId: string;
  family: string;
  rawSampleRef: string;
  parsedSampleRef: string;
  timestamp: string;
  line: number;
}
