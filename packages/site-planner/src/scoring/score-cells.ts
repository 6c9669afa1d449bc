/**
 * Cell scoring stage: scaffold blank inputs, check them, classify confidence,
 * resolve Tier B targets and Tier C demand.
 *
 * Output depends only on the input attributes, so re-scoring a scored layer
 * reproduces the same derived fields.
 *
 * @module scoring/score-cells
 */

import { ValueError } from '../core/errors.js';
import type { CellRecord, PlanIssue, ScoredCell } from '../core/types.js';
import { createLogger, type PlanningLogger } from '../core/utils/logger.js';
import { parseCellAttributes, scaffoldAttributes, type ScaffoldOptions } from './attributes.js';
import { classifyCell } from './cell-classifier.js';
import { resolveDemand } from './demand-resolver.js';

export interface ScoreCellsOptions extends ScaffoldOptions {
  readonly logger?: PlanningLogger;
}

export interface CellScoringResult {
  /** Scored cells, input order */
  readonly scored: readonly ScoredCell[];
  /** ValueErrors for cells left unscored */
  readonly issues: readonly PlanIssue[];
  /** Attribute values filled from zone defaults, over all cells */
  readonly scaffoldedFields: number;
}

export const NO_SCAFFOLDING: ScaffoldOptions = { zoneDefaults: {}, fallbackDefaults: null };

export function scoreCells(
  cells: readonly CellRecord[],
  options: ScoreCellsOptions = NO_SCAFFOLDING
): CellScoringResult {
  const log = options.logger ?? createLogger({ module: 'scoring' });
  const scored: ScoredCell[] = [];
  const issues: PlanIssue[] = [];
  let scaffoldedFields = 0;

  for (const cell of cells) {
    const { values, filled } = scaffoldAttributes(cell.zone_id, cell.attributes, options);
    scaffoldedFields += filled.length;

    const parsed = parseCellAttributes(values);
    if (!parsed.success) {
      const error = new ValueError(parsed.errors.join('; '), {
        layer: 'cells',
        recordId: cell.cell_id,
        index: cell.index,
      });
      log.warn('Cell excluded from classification', { cell_id: cell.cell_id, reason: error.message });
      issues.push(error.toIssue());
      continue;
    }

    const attributes = parsed.data;
    const confidence = classifyCell(attributes);
    const demand = resolveDemand(confidence.confidenceClass, attributes);

    scored.push({
      index: cell.index,
      cell_id: cell.cell_id,
      zone_id: cell.zone_id,
      attributes,
      scaffolded: filled,
      score: {
        confidence_score: confidence.score,
        confidence_class: confidence.confidenceClass,
        tierB_sites_required: demand.requirement.required,
        tierB_alternate_required: demand.requirement.alternate,
        priority_score: demand.priorityScore,
        tierC_demand_class: demand.demandClass,
      },
    });
  }

  log.info('Cells scored', {
    scored: scored.length,
    excluded: issues.length,
    scaffoldedFields,
  });

  return { scored, issues, scaffoldedFields };
}
