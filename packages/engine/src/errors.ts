/**
 * Fatal errors raised while loading, expanding or deriving a lift plan.
 * Every error names the input it rejects so callers can point at the
 * offending row, section or treadle.
 */

export type StructuralErrorCode =
  | 'malformed-csv'
  | 'missing-column'
  | 'invalid-number'
  | 'duplicate-treadle'
  | 'invalid-shaft'
  | 'invalid-tieup'
  | 'undefined-section'
  | 'invalid-repeat'
  | 'unknown-row-type'
  | 'missing-name'
  | 'invalid-shaft-count'
  | 'shaft-out-of-range';

export interface ErrorDetail {
  file?: string;
  row?: number;
  column?: string;
  section?: string;
  treadle?: number;
  shaft?: number;
}

export class LiftPlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LiftPlanError';
  }
}

export class StructuralInputError extends LiftPlanError {
  constructor(
    message: string,
    public readonly code: StructuralErrorCode,
    public readonly detail: ErrorDetail = {}
  ) {
    super(message);
    this.name = 'StructuralInputError';
  }
}

export class CircularReferenceError extends LiftPlanError {
  constructor(
    public readonly section: string,
    public readonly path: readonly string[]
  ) {
    super(`Circular reference detected: ${section} (${[...path, section].join(' -> ')})`);
    this.name = 'CircularReferenceError';
  }
}

export class NestingDepthError extends LiftPlanError {
  constructor(
    public readonly section: string,
    public readonly depth: number,
    public readonly maxDepth: number
  ) {
    super(`Too many nested section references: '${section}' is at depth ${depth} (limit ${maxDepth})`);
    this.name = 'NestingDepthError';
  }
}

/** Short tag for an error: the structural code when there is one, else the class name. */
export function errorTag(err: Error): string {
  return err instanceof StructuralInputError ? err.code : err.name;
}
