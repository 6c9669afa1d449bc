/**
 * Satisfy Command
 *
 * Builds the adjacency index, credits Tier A coverage against Tier B
 * required sites, writes the updated site layer and the zone rollup CSV.
 * Cells are read for their ids and polygons only; the cell layer is not
 * written.
 *
 * Usage:
 *   site-planner satisfy [--dry-run] [--data-dir <dir>]
 *
 * @module cli/commands/satisfy
 */

import { ZONE_ROLLUP_COLUMNS } from '../../core/constants.js';
import { applySitePatches, writeLayerIfChanged, type LayerDocument } from '../../io/geojson-layers.js';
import {
  collectIssues,
  prepareLayers,
  runCoverage,
  type CoverageRun,
  type PlanningOptions,
} from '../../pipeline/planning-pipeline.js';
import { resolveLayerPath, toPlanningOptions } from '../lib/config.js';
import {
  loadLayers,
  planningInput,
  printZoneRollup,
  reportRejections,
  writeReportIfChanged,
  type CommandContext,
  type PlanningCommandResult,
} from '../lib/layers.js';
import { columnsFor, formatCsv } from '../lib/output.js';

export interface SatisfyCommandResult extends PlanningCommandResult {
  readonly coverage: CoverageRun;
}

export async function satisfyCommand(context: CommandContext): Promise<SatisfyCommandResult> {
  const { config, logger } = context;
  logger.commandStart('satisfy', { data: config.paths.data, dryRun: config.dryRun });

  const documents = await loadLayers(config, logger, { sites: true, cwd: context.cwd });
  const options: PlanningOptions = { ...toPlanningOptions(config), logger };
  const input = planningInput(documents);

  const layers = prepareLayers(input, options);
  const coverage = runCoverage(layers, input.sites ?? [], options);
  const issues = collectIssues(layers, null, coverage);
  reportRejections(logger, issues);

  const written =
    config.dryRun || documents.sites === null
      ? []
      : await writeCoverage(context, documents.sites, coverage);

  printZoneRollup(logger, coverage.rollup);
  logger.commandEnd(true, {
    ...coverage.coverage.summary,
    issues: issues.length,
    written: written.length,
  });

  return { coverage, issues, written };
}

/**
 * Write the updated site layer and the zone rollup CSV where they changed
 */
export async function writeCoverage(
  context: CommandContext,
  sites: LayerDocument,
  coverage: CoverageRun
): Promise<string[]> {
  const written: string[] = [];

  const patched = applySitePatches(sites.collection, coverage.coverage.patches);
  if (await writeLayerIfChanged(sites, patched)) {
    written.push(sites.path);
  }

  const reportPath = resolveLayerPath(context.config, 'rollup', context.cwd);
  const csv = formatCsv(coverage.rollup.rows, columnsFor(ZONE_ROLLUP_COLUMNS));
  if (await writeReportIfChanged(reportPath, csv)) {
    written.push(reportPath);
  }

  for (const path of written) {
    context.logger.info('Wrote file', { path });
  }
  return written;
}
