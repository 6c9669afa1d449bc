/**
 * Site Planner Error Types
 *
 * Record-level errors (SchemaError, GeometryError, ValueError,
 * UnresolvedCellError) describe one excluded or flagged record. They are
 * collected as PlanIssue values and reported at the end of a run; the
 * pipeline does not throw them.
 *
 * Run-level errors (LayerReadError, FailureThresholdError) abort the run.
 */

import type { LayerName, PlanIssue, PlanIssueKind } from './types.js';

/**
 * Where a record-level error was raised
 */
export interface RecordContext {
  readonly layer: LayerName;
  readonly recordId: string | null;
  readonly index: number;
}

/**
 * Base class for errors about a single input record
 */
export abstract class PlanningRecordError extends Error {
  abstract readonly kind: PlanIssueKind;

  constructor(
    message: string,
    public readonly context: RecordContext
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toIssue(): PlanIssue {
    return {
      kind: this.kind,
      layer: this.context.layer,
      recordId: this.context.recordId,
      index: this.context.index,
      message: this.message,
    };
  }
}

/**
 * Missing or duplicate identifier, missing required field, broken foreign key
 */
export class SchemaError extends PlanningRecordError {
  public readonly name = 'SchemaError' as const;
  readonly kind = 'schema' as const;
}

/**
 * Cell polygon with fewer than 3 distinct vertices or a self-intersection.
 * The cell is left out of the adjacency index.
 */
export class GeometryError extends PlanningRecordError {
  public readonly name = 'GeometryError' as const;
  readonly kind = 'geometry' as const;
}

/**
 * Flag outside {0, 1} or weight outside [0, 1]. The cell is not classified.
 */
export class ValueError extends PlanningRecordError {
  public readonly name = 'ValueError' as const;
  readonly kind = 'value' as const;
}

/**
 * Site whose home cell cannot be determined. Skipped by coverage.
 */
export class UnresolvedCellError extends PlanningRecordError {
  public readonly name = 'UnresolvedCellError' as const;
  readonly kind = 'unresolved-cell' as const;
}

export function isPlanningRecordError(error: unknown): error is PlanningRecordError {
  return error instanceof PlanningRecordError;
}

// ============================================================================
// Fatal Errors
// ============================================================================

/**
 * A layer that cannot be read as a record collection at all
 */
export class LayerReadError extends Error {
  public readonly name = 'LayerReadError' as const;

  constructor(
    message: string,
    public readonly layer: LayerName,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    Object.setPrototypeOf(this, LayerReadError.prototype);
  }

  toLogString(): string {
    return [`LayerReadError: ${this.message}`, `  Layer: ${this.layer}`, `  Path: ${this.path}`].join('\n');
  }
}

/**
 * Share of rejected records in a layer above `validation.maxFailureRate`
 */
export class FailureThresholdError extends Error {
  public readonly name = 'FailureThresholdError' as const;

  constructor(
    public readonly layer: LayerName,
    public readonly rejected: number,
    public readonly total: number,
    public readonly maxFailureRate: number,
    public readonly issues: readonly PlanIssue[]
  ) {
    super(
      `${rejected}/${total} ${layer} records failed validation ` +
        `(limit ${(maxFailureRate * 100).toFixed(1)}%)`
    );
    Object.setPrototypeOf(this, FailureThresholdError.prototype);
  }

  get failureRate(): number {
    return this.total === 0 ? 0 : this.rejected / this.total;
  }

  toLogString(): string {
    const lines = [`FailureThresholdError: ${this.message}`];
    for (const issue of this.issues.slice(0, 5)) {
      lines.push(`  - [${issue.recordId ?? `#${issue.index}`}] ${issue.message}`);
    }
    if (this.issues.length > 5) {
      lines.push(`  ... and ${this.issues.length - 5} more`);
    }
    return lines.join('\n');
  }
}
