/**
 * Planning constants: class thresholds, the Tier B requirement table and the
 * Tier C demand blend.
 */

import type { ConfidenceClass, TierBRequirement } from './types.js';

// ============================================================================
// Confidence
// ============================================================================

/** Scores at or above this are HIGH */
export const CONFIDENCE_HIGH_MIN = 3;

/** Score exactly at this is MED; below is LOW */
export const CONFIDENCE_MED_MIN = 2;

export const CONFIDENCE_SCORE_MAX = 4;

// ============================================================================
// Tier B
// ============================================================================

export const TIER_B_REQUIREMENTS: Readonly<Record<ConfidenceClass, TierBRequirement>> = {
  HIGH: { required: 1, alternate: 0 },
  MED: { required: 1, alternate: 1 },
  LOW: { required: 2, alternate: 1 },
};

/** `notes` value marking a Tier B alternate */
export const ALT_NOTE = 'ALT';

// ============================================================================
// Tier C
// ============================================================================

export const POP_WEIGHT_FACTOR = 0.6;
export const CRITICAL_WEIGHT_FACTOR = 0.4;

/** Added to the demand driver of LOW confidence cells */
export const LOW_CONFIDENCE_BONUS = 0.25;

export const DEMAND_HIGH_MIN = 0.7;
export const DEMAND_MED_MIN = 0.4;

/** Decimal places kept on priority_score */
export const PRIORITY_SCORE_DECIMALS = 4;

// ============================================================================
// Reports
// ============================================================================

export const ZONE_ROLLUP_COLUMNS = [
  'zone_id',
  'tierB_required_before',
  'tierB_required_after',
  'tierB_alt_total',
  'tierA_sites',
] as const;

export const REQUIREMENT_ROLLUP_COLUMNS = [
  'zone_id',
  'tierB_sites_required',
  'tierB_alternate_required',
  'total',
] as const;

/** Sites coverage skipped, listed after the zone rollup */
export const FLAGGED_SITE_COLUMNS = ['zone_id', 'site_id', 'reason'] as const;
