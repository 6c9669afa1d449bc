/**
 * Adjacency Command
 *
 * Neighbour-count diagnostics for the cell layer. Isolated cells in an
 * otherwise regular grid usually mean coordinate drift; rerun with
 * `adjacency.snap_decimals` set to compare.
 *
 * Usage:
 *   site-planner adjacency [--data-dir <dir>] [--json]
 *
 * @module cli/commands/adjacency
 */

import { AdjacencyIndex } from '../../adjacency/adjacency-index.js';
import { summarizeAdjacency, type AdjacencyStats } from '../../adjacency/diagnostics.js';
import { collectIssues, prepareLayers, sortIssues } from '../../pipeline/planning-pipeline.js';
import { screenCellGeometry } from '../../validation/geometry-validator.js';
import { toPlanningOptions } from '../lib/config.js';
import {
  loadLayers,
  planningInput,
  reportRejections,
  type CommandContext,
  type PlanningCommandResult,
} from '../lib/layers.js';

export interface AdjacencyCommandResult extends PlanningCommandResult {
  readonly stats: AdjacencyStats;
}

export async function adjacencyCommand(context: CommandContext): Promise<AdjacencyCommandResult> {
  const { config, logger } = context;
  logger.commandStart('adjacency', { snapDecimals: config.adjacency.snapDecimals });

  const documents = await loadLayers(config, logger, { sites: false, cwd: context.cwd });
  const options = { ...toPlanningOptions(config), logger };

  const layers = prepareLayers(planningInput(documents), options);
  const screened = screenCellGeometry(layers.cells.records, logger);
  const index = AdjacencyIndex.build(screened.usable, { snapDecimals: options.snapDecimals });
  const stats = summarizeAdjacency(index);

  const issues = sortIssues([...collectIssues(layers, null, null), ...screened.issues]);
  reportRejections(logger, issues);

  const histogram = [...stats.histogram.entries()].map(([neighbors, cells]) => ({ neighbors, cells }));
  logger.table(histogram, ['neighbors', 'cells']);
  if (stats.isolated.length > 0) {
    logger.warn('Cells with no neighbours', { count: stats.isolated.length, cells: stats.isolated });
  }

  logger.commandEnd(true, {
    cells: stats.cells,
    min: stats.minNeighbors,
    max: stats.maxNeighbors,
    mean: Number(stats.meanNeighbors.toFixed(2)),
    excluded: screened.issues.length,
  });

  return { stats, issues, written: [] };
}
