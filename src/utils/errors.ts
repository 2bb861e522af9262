/**
 * Error kinds raised by the coverage pipeline stages.
 *
 * Every stage failure is fatal: the stage writes nothing and the CLI prints
 * the message plus any collected issues before exiting non-zero.
 */

export type PipelineErrorCode =
  | 'VALIDATION'
  | 'TAXONOMY_FORMAT'
  | 'SEED_CONFLICT'
  | 'EVIDENCE_CONFLICT'
  | 'UNMAPPED_EVIDENCE'
  | 'MISSING_EVIDENCE'
  | 'STATUS_REGRESSION';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** Malformed or inconsistent input table (inventory, verification records, scaffold rows). */
export class ValidationError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'VALIDATION', issues);
    this.name = 'ValidationError';
  }
}

/** The ATT&CK bundle cannot be flattened (bad shape, unresolvable tactic). */
export class TaxonomyFormatError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'TAXONOMY_FORMAT', issues);
    this.name = 'TaxonomyFormatError';
  }
}

/** The prior scaffold references a family or technique that no longer exists. */
export class SeedConflictError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'SEED_CONFLICT', issues);
    this.name = 'SeedConflictError';
  }
}

/** A verified cell was offered evidence that differs from what it already holds. */
export class EvidenceConflictError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'EVIDENCE_CONFLICT', issues);
    this.name = 'EvidenceConflictError';
  }
}

/** Evidence names a (technique, family) pair that was never seeded. */
export class UnmappedEvidenceError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'UNMAPPED_EVIDENCE', issues);
    this.name = 'UnmappedEvidenceError';
  }
}

/** A sample reference is empty or does not resolve to a file. */
export class MissingEvidenceError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'MISSING_EVIDENCE', issues);
    this.name = 'MissingEvidenceError';
  }
}

/** A scaffold write would move a cell backwards or drop it. */
export class StatusRegressionError extends PipelineError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'STATUS_REGRESSION', issues);
    this.name = 'StatusRegressionError';
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
