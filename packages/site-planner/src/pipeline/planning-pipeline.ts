/**
 * Planning Pipeline
 *
 * Synchronous batch run over complete layer snapshots:
 *
 *   validate layers -> score cells -> requirement rollup
 *                   -> screen geometry -> adjacency index
 *                   -> coverage -> zone rollup
 *
 * Each stage returns new values; inputs are never mutated. Record problems are
 * gathered into `issues`. Only an unreadable layer (raised before this module
 * is reached) or a layer over the failure-rate limit stops a run.
 *
 * Running the pipeline on its own output changes nothing: scoring is a pure
 * function of the inputs and coverage never revisits SATISFIED sites.
 *
 * @module pipeline/planning-pipeline
 */

import { AdjacencyIndex } from '../adjacency/adjacency-index.js';
import type {
  CellRecord,
  CorridorRecord,
  LayerName,
  LayerValidation,
  PlanIssue,
  RawRecord,
  SiteRecord,
  ZoneRecord,
} from '../core/types.js';
import { createLogger, type PlanningLogger } from '../core/utils/logger.js';
import { satisfyCoverage, type CoverageResult } from '../coverage/coverage-satisfier.js';
import { HomeCellResolver } from '../coverage/home-cell.js';
import {
  buildRequirementRollup,
  buildZoneRollup,
  type RequirementRollupRow,
  type ZoneRollup,
} from '../reporting/rollup-reporter.js';
import type { ScaffoldOptions } from '../scoring/attributes.js';
import { NO_SCAFFOLDING, scoreCells, type CellScoringResult } from '../scoring/score-cells.js';
import { screenCellGeometry } from '../validation/geometry-validator.js';
import {
  assertFailureRate,
  idSet,
  validateCells,
  validateCorridors,
  validateSites,
  validateZones,
} from '../validation/record-validator.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw records per layer. Omitted reference layers (zones, corridors) switch
 * off the foreign key checks that point at them.
 */
export interface PlanningInput {
  readonly zones?: readonly RawRecord[] | null;
  readonly corridors?: readonly RawRecord[] | null;
  readonly cells: readonly RawRecord[];
  readonly sites?: readonly RawRecord[] | null;
}

export interface PlanningOptions {
  /** Largest tolerated share of schema-rejected records per layer */
  readonly maxFailureRate: number;
  /** Adjacency vertex snapping; null = exact matching */
  readonly snapDecimals: number | null;
  readonly scaffold: ScaffoldOptions;
  readonly logger?: PlanningLogger;
}

export const DEFAULT_PLANNING_OPTIONS: PlanningOptions = {
  maxFailureRate: 0.2,
  snapDecimals: null,
  scaffold: NO_SCAFFOLDING,
};

export interface PreparedLayers {
  readonly zones: LayerValidation<ZoneRecord> | null;
  readonly corridors: LayerValidation<CorridorRecord> | null;
  readonly cells: LayerValidation<CellRecord>;
}

export interface ScoringRun {
  readonly scoring: CellScoringResult;
  readonly requirements: readonly RequirementRollupRow[];
}

export interface CoverageRun {
  readonly sites: LayerValidation<SiteRecord>;
  readonly adjacency: AdjacencyIndex;
  readonly coverage: CoverageResult;
  readonly rollup: ZoneRollup;
  readonly geometryIssues: readonly PlanIssue[];
}

export interface PlanningResult {
  readonly layers: PreparedLayers;
  readonly scoring: ScoringRun;
  readonly coverage: CoverageRun | null;
  /** Every excluded or flagged record, by layer then input position */
  readonly issues: readonly PlanIssue[];
}

// ============================================================================
// Stages
// ============================================================================

/**
 * Validate zones, corridors and cells, applying the failure-rate gate to each
 */
export function prepareLayers(
  input: PlanningInput,
  options: PlanningOptions = DEFAULT_PLANNING_OPTIONS
): PreparedLayers {
  const log = options.logger ?? createLogger({ module: 'pipeline' });

  const zones = input.zones ? validateZones(input.zones) : null;
  if (zones) gate('zones', zones, options, log);

  const corridors = input.corridors ? validateCorridors(input.corridors) : null;
  if (corridors) gate('corridors', corridors, options, log);

  const cells = validateCells(
    input.cells,
    idSet(zones, (zone) => zone.zone_id)
  );
  gate('cells', cells, options, log);

  return { zones, corridors, cells };
}

export function runScoring(
  layers: PreparedLayers,
  options: PlanningOptions = DEFAULT_PLANNING_OPTIONS
): ScoringRun {
  const scoring = scoreCells(layers.cells.records, { ...options.scaffold, logger: options.logger });
  return { scoring, requirements: buildRequirementRollup(scoring.scored) };
}

export function runCoverage(
  layers: PreparedLayers,
  siteRecords: readonly RawRecord[],
  options: PlanningOptions = DEFAULT_PLANNING_OPTIONS
): CoverageRun {
  const log = options.logger ?? createLogger({ module: 'pipeline' });

  const sites = validateSites(siteRecords, {
    zoneIds: idSet(layers.zones, (zone) => zone.zone_id),
    corridorIds: idSet(layers.corridors, (corridor) => corridor.corridor_id),
  });
  gate('sites', sites, options, log);

  const cells = layers.cells.records;
  const screened = screenCellGeometry(cells, options.logger);
  const adjacency = AdjacencyIndex.build(screened.usable, { snapDecimals: options.snapDecimals });
  log.debug('Adjacency index built', { cells: adjacency.size, excluded: screened.issues.length });

  const resolver = new HomeCellResolver(
    cells.map((cell) => cell.cell_id),
    screened.usable
  );
  const coverage = satisfyCoverage(sites.records, adjacency, resolver, { logger: options.logger });

  const rollup = buildZoneRollup(coverage.sites, {
    zoneIds: layers.zones?.records.map((zone) => zone.zone_id),
    issues: coverage.issues,
  });

  return { sites, adjacency, coverage, rollup, geometryIssues: screened.issues };
}

/**
 * Full run: scoring always, coverage when a site layer is supplied
 */
export function runPlanning(
  input: PlanningInput,
  options: PlanningOptions = DEFAULT_PLANNING_OPTIONS
): PlanningResult {
  const layers = prepareLayers(input, options);
  const scoring = runScoring(layers, options);
  const coverage = input.sites ? runCoverage(layers, input.sites, options) : null;

  return {
    layers,
    scoring,
    coverage,
    issues: collectIssues(layers, scoring, coverage),
  };
}

// ============================================================================
// Helpers
// ============================================================================

function gate<T>(
  layer: LayerName,
  validation: LayerValidation<T>,
  options: PlanningOptions,
  log: PlanningLogger
): void {
  if (validation.issues.length > 0) {
    log.warn(`Rejected ${layer} records`, {
      rejected: validation.issues.length,
      total: validation.total,
    });
  }
  assertFailureRate(layer, validation, options.maxFailureRate);
}

const LAYER_ORDER: Record<LayerName, number> = { zones: 0, corridors: 1, cells: 2, sites: 3 };

export function sortIssues(issues: readonly PlanIssue[]): PlanIssue[] {
  return [...issues].sort(
    (a, b) => LAYER_ORDER[a.layer] - LAYER_ORDER[b.layer] || a.index - b.index
  );
}

export function collectIssues(
  layers: PreparedLayers,
  scoring: ScoringRun | null,
  coverage: CoverageRun | null
): PlanIssue[] {
  return sortIssues([
    ...(layers.zones?.issues ?? []),
    ...(layers.corridors?.issues ?? []),
    ...layers.cells.issues,
    ...(scoring?.scoring.issues ?? []),
    ...(coverage?.geometryIssues ?? []),
    ...(coverage?.sites.issues ?? []),
    ...(coverage?.coverage.issues ?? []),
  ]);
}
