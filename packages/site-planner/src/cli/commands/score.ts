/**
 * Score Command
 *
 * Classifies every cell, writes the derived fields back into the cell layer
 * and the per-zone Tier B targets to the requirements CSV.
 *
 * Usage:
 *   site-planner score [--dry-run] [--data-dir <dir>]
 *
 * @module cli/commands/score
 */

import { REQUIREMENT_ROLLUP_COLUMNS } from '../../core/constants.js';
import { applyCellScores, writeLayerIfChanged, type LayerDocument } from '../../io/geojson-layers.js';
import {
  collectIssues,
  prepareLayers,
  runScoring,
  type PlanningOptions,
  type ScoringRun,
} from '../../pipeline/planning-pipeline.js';
import { resolveLayerPath, toPlanningOptions } from '../lib/config.js';
import {
  loadLayers,
  planningInput,
  reportRejections,
  writeReportIfChanged,
  type CommandContext,
  type PlanningCommandResult,
} from '../lib/layers.js';
import { columnsFor, formatCsv } from '../lib/output.js';

export interface ScoreCommandResult extends PlanningCommandResult {
  readonly scoring: ScoringRun;
}

export async function scoreCommand(context: CommandContext): Promise<ScoreCommandResult> {
  const { config, logger } = context;
  logger.commandStart('score', { data: config.paths.data, dryRun: config.dryRun });

  const documents = await loadLayers(config, logger, { sites: false, cwd: context.cwd });
  const options: PlanningOptions = { ...toPlanningOptions(config), logger };

  const layers = prepareLayers(planningInput(documents), options);
  const scoring = runScoring(layers, options);
  const issues = collectIssues(layers, scoring, null);
  reportRejections(logger, issues);

  const written = config.dryRun ? [] : await writeScoring(context, documents.cells, scoring);

  logger.table(scoring.requirements, REQUIREMENT_ROLLUP_COLUMNS);
  logger.commandEnd(true, {
    scored: scoring.scoring.scored.length,
    scaffolded: scoring.scoring.scaffoldedFields,
    issues: issues.length,
    written: written.length,
  });

  return { scoring, issues, written };
}

/**
 * Write the scored cell layer and the requirements CSV where they changed
 */
export async function writeScoring(
  context: CommandContext,
  cells: LayerDocument,
  scoring: ScoringRun
): Promise<string[]> {
  const written: string[] = [];

  if (await writeLayerIfChanged(cells, applyCellScores(cells.collection, scoring.scoring.scored))) {
    written.push(cells.path);
  }

  const reportPath = resolveLayerPath(context.config, 'requirements', context.cwd);
  const csv = formatCsv(scoring.requirements, columnsFor(REQUIREMENT_ROLLUP_COLUMNS));
  if (await writeReportIfChanged(reportPath, csv)) {
    written.push(reportPath);
  }

  for (const path of written) {
    context.logger.info('Wrote file', { path });
  }
  return written;
}
