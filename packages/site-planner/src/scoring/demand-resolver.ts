/**
 * Demand Resolver
 *
 * Tier B site targets by confidence class, and the Tier C priority blend of
 * population and critical-facility weights.
 *
 * The Tier B counts are planning targets for candidate generation. Coverage
 * works on materialized sites, not on these counts.
 *
 * @module scoring/demand-resolver
 */

import {
  CRITICAL_WEIGHT_FACTOR,
  DEMAND_HIGH_MIN,
  DEMAND_MED_MIN,
  LOW_CONFIDENCE_BONUS,
  POP_WEIGHT_FACTOR,
  PRIORITY_SCORE_DECIMALS,
  TIER_B_REQUIREMENTS,
} from '../core/constants.js';
import type {
  CellWeights,
  ConfidenceClass,
  DemandClass,
  TierBRequirement,
} from '../core/types.js';

export interface DemandResult {
  readonly requirement: TierBRequirement;
  readonly priorityScore: number;
  readonly demandClass: DemandClass;
}

export function isUnitWeight(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

export function tierBRequirements(confidenceClass: ConfidenceClass): TierBRequirement {
  return TIER_B_REQUIREMENTS[confidenceClass];
}

export function computeDemandDriver(weights: CellWeights): number {
  return POP_WEIGHT_FACTOR * weights.pop_weight + CRITICAL_WEIGHT_FACTOR * weights.critical_weight;
}

/**
 * Demand driver, plus the LOW-confidence bonus, rounded to
 * PRIORITY_SCORE_DECIMALS places so class thresholds compare on stable values
 */
export function computePriorityScore(
  weights: CellWeights,
  confidenceClass: ConfidenceClass
): number {
  const driver = computeDemandDriver(weights);
  const raw = confidenceClass === 'LOW' ? driver + LOW_CONFIDENCE_BONUS : driver;
  const scale = 10 ** PRIORITY_SCORE_DECIMALS;
  return Math.round(raw * scale) / scale;
}

export function classifyDemand(priorityScore: number): DemandClass {
  if (priorityScore >= DEMAND_HIGH_MIN) return 'HIGH';
  if (priorityScore >= DEMAND_MED_MIN) return 'MED';
  return 'LOW';
}

export function resolveDemand(
  confidenceClass: ConfidenceClass,
  weights: CellWeights
): DemandResult {
  const priorityScore = computePriorityScore(weights, confidenceClass);
  return {
    requirement: tierBRequirements(confidenceClass),
    priorityScore,
    demandClass: classifyDemand(priorityScore),
  };
}
