/**
 * Cell Classifier
 *
 * Confidence that a hex cell can host a reliable site, from its four binary
 * availability flags. Pure and total over valid flags; flag validation lives
 * in `parseCellAttributes`.
 *
 * @module scoring/cell-classifier
 */

import { CONFIDENCE_HIGH_MIN, CONFIDENCE_MED_MIN } from '../core/constants.js';
import type { CellFlags, ConfidenceClass } from '../core/types.js';

export interface ConfidenceResult {
  readonly score: number;
  readonly confidenceClass: ConfidenceClass;
}

export function isBinaryFlag(value: unknown): value is 0 | 1 {
  return value === 0 || value === 1;
}

/**
 * elev + tall + los + (1 - clutter), an integer in [0, 4]
 */
export function computeConfidenceScore(flags: CellFlags): number {
  return (
    flags.elev_adv_avail +
    flags.tall_struct_avail +
    flags.backbone_los_likely +
    (1 - flags.clutter_high)
  );
}

export function classifyConfidence(score: number): ConfidenceClass {
  if (score >= CONFIDENCE_HIGH_MIN) return 'HIGH';
  if (score === CONFIDENCE_MED_MIN) return 'MED';
  return 'LOW';
}

export function classifyCell(flags: CellFlags): ConfidenceResult {
  const score = computeConfidenceScore(flags);
  return { score, confidenceClass: classifyConfidence(score) };
}
