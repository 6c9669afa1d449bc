/**
 * Site Planner
 *
 * Hex-grid planning for a two-tier site network: cell confidence and
 * demand scoring, Tier A coverage crediting and per-zone rollups.
 *
 * @packageDocumentation
 */

// Types and constants
export * from './core/types.js';
export * from './core/constants.js';
export {
  PlanningRecordError,
  SchemaError,
  GeometryError,
  ValueError,
  UnresolvedCellError,
  LayerReadError,
  FailureThresholdError,
  isPlanningRecordError,
} from './core/errors.js';
export { Logger, logger, createLogger } from './core/utils/logger.js';
export type { LogLevel, LogMetadata, PlanningLogger } from './core/utils/logger.js';

// Scoring
export { classifyCell, classifyConfidence, computeConfidenceScore } from './scoring/cell-classifier.js';
export {
  classifyDemand,
  computePriorityScore,
  resolveDemand,
  tierBRequirements,
} from './scoring/demand-resolver.js';
export { parseCellAttributes, scaffoldAttributes } from './scoring/attributes.js';
export type { ScaffoldOptions, ZoneDefaults } from './scoring/attributes.js';
export { NO_SCAFFOLDING, scoreCells } from './scoring/score-cells.js';
export type { CellScoringResult } from './scoring/score-cells.js';

// Adjacency and coverage
export { AdjacencyIndex } from './adjacency/adjacency-index.js';
export { summarizeAdjacency } from './adjacency/diagnostics.js';
export type { AdjacencyStats } from './adjacency/diagnostics.js';
export { HomeCellResolver } from './coverage/home-cell.js';
export { applySatisfaction, satisfyCoverage } from './coverage/coverage-satisfier.js';
export type { CoverageResult, CoverageSummary, SatisfactionPatch } from './coverage/coverage-satisfier.js';

// Reporting
export { buildRequirementRollup, buildZoneRollup } from './reporting/rollup-reporter.js';
export type { RequirementRollupRow, ZoneRollup, ZoneRollupRow } from './reporting/rollup-reporter.js';

// Validation
export {
  validateCells,
  validateCorridors,
  validateSites,
  validateZones,
  assertFailureRate,
} from './validation/record-validator.js';
export { checkCellGeometry, screenCellGeometry } from './validation/geometry-validator.js';

// I/O and pipeline
export {
  applyCellScores,
  applySitePatches,
  layerRecords,
  parseLayer,
  readLayer,
  writeLayerIfChanged,
} from './io/geojson-layers.js';
export type { LayerDocument } from './io/geojson-layers.js';
export {
  DEFAULT_PLANNING_OPTIONS,
  prepareLayers,
  runCoverage,
  runPlanning,
  runScoring,
} from './pipeline/planning-pipeline.js';
export type { PlanningInput, PlanningOptions, PlanningResult } from './pipeline/planning-pipeline.js';
