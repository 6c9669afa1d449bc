/**
 * Run Command
 *
 * Scoring followed by coverage over one read of the layers. Writes the cell
 * layer, the site layer and both rollup CSVs.
 *
 * Usage:
 *   site-planner run [--dry-run] [--data-dir <dir>]
 *
 * @module cli/commands/run
 */

import { runPlanning, type PlanningOptions, type PlanningResult } from '../../pipeline/planning-pipeline.js';
import { toPlanningOptions } from '../lib/config.js';
import {
  loadLayers,
  planningInput,
  printZoneRollup,
  reportRejections,
  type CommandContext,
  type PlanningCommandResult,
} from '../lib/layers.js';
import { writeCoverage } from './satisfy.js';
import { writeScoring } from './score.js';

export interface RunCommandResult extends PlanningCommandResult {
  readonly result: PlanningResult;
}

export async function runCommand(context: CommandContext): Promise<RunCommandResult> {
  const { config, logger } = context;
  logger.commandStart('run', { data: config.paths.data, dryRun: config.dryRun });

  const documents = await loadLayers(config, logger, { sites: true, cwd: context.cwd });
  const options: PlanningOptions = { ...toPlanningOptions(config), logger };

  const result = runPlanning(planningInput(documents), options);
  reportRejections(logger, result.issues);

  const written: string[] = [];
  if (!config.dryRun) {
    written.push(...(await writeScoring(context, documents.cells, result.scoring)));
    if (documents.sites && result.coverage) {
      written.push(...(await writeCoverage(context, documents.sites, result.coverage)));
    }
  }

  if (result.coverage) {
    printZoneRollup(logger, result.coverage.rollup);
  }
  logger.commandEnd(true, {
    scored: result.scoring.scoring.scored.length,
    ...result.coverage?.coverage.summary,
    issues: result.issues.length,
    written: written.length,
  });

  return { result, issues: result.issues, written };
}
