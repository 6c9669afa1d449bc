/**
 * Layer loading and report writing shared by the planning commands
 *
 * @module cli/lib/layers
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { FLAGGED_SITE_COLUMNS, ZONE_ROLLUP_COLUMNS } from '../../core/constants.js';
import type { PlanIssue, RawRecord } from '../../core/types.js';
import { atomicWriteFile } from '../../core/utils/atomic-write.js';
import { layerRecords, readLayer, type LayerDocument } from '../../io/geojson-layers.js';
import type { PlanningInput } from '../../pipeline/planning-pipeline.js';
import type { ZoneRollup } from '../../reporting/rollup-reporter.js';
import { resolveLayerPath, type CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';

export interface LoadedLayers {
  readonly zones: LayerDocument | null;
  readonly corridors: LayerDocument | null;
  readonly cells: LayerDocument;
  readonly sites: LayerDocument | null;
}

export interface LoadLayersOptions {
  /** Whether the site layer must be present */
  readonly sites: boolean;
  readonly cwd?: string;
}

/**
 * Read the layer files. Cells (and sites when asked for) are required;
 * zones and corridors are read only when their files exist.
 *
 * @throws LayerReadError for a required layer that cannot be read
 */
export async function loadLayers(
  config: CLIConfig,
  logger: CLILogger,
  options: LoadLayersOptions
): Promise<LoadedLayers> {
  const pathOf = (key: 'cells' | 'sites' | 'zones' | 'corridors'): string =>
    resolveLayerPath(config, key, options.cwd);

  const optional = async (key: 'zones' | 'corridors'): Promise<LayerDocument | null> => {
    const path = pathOf(key);
    if (!existsSync(path)) {
      logger.debug(`No ${key} layer; ${key} references are not checked`, { path });
      return null;
    }
    return readLayer(key, path);
  };

  const zones = await optional('zones');
  const corridors = await optional('corridors');
  const cells = await readLayer('cells', pathOf('cells'));
  const sites = options.sites ? await readLayer('sites', pathOf('sites')) : null;

  logger.debug('Layers loaded', {
    zones: zones?.collection.features.length ?? null,
    corridors: corridors?.collection.features.length ?? null,
    cells: cells.collection.features.length,
    sites: sites?.collection.features.length ?? null,
  });

  return { zones, corridors, cells, sites };
}

export function planningInput(layers: LoadedLayers): PlanningInput {
  const records = (document: LayerDocument | null): RawRecord[] | null =>
    document ? layerRecords(document) : null;

  return {
    zones: records(layers.zones),
    corridors: records(layers.corridors),
    cells: layerRecords(layers.cells),
    sites: records(layers.sites),
  };
}

/**
 * Write a text report unless the file already holds exactly this text.
 *
 * @returns whether the file was written
 */
export async function writeReportIfChanged(path: string, content: string): Promise<boolean> {
  let current: string | null = null;
  try {
    current = await readFile(path, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }
  if (current === content) return false;

  await atomicWriteFile(path, content);
  return true;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One warn line per schema-rejected record. Later stages log their own
 * exclusions as they make them.
 */
export function reportRejections(logger: CLILogger, issues: readonly PlanIssue[]): void {
  for (const issue of issues) {
    if (issue.kind !== 'schema') continue;
    logger.warn(`Rejected ${issue.layer} record`, {
      id: issue.recordId,
      index: issue.index,
      reason: issue.message,
    });
  }
}

/**
 * Zone rollup table, then the flagged sites when there are any
 */
export function printZoneRollup(logger: CLILogger, rollup: ZoneRollup): void {
  logger.table(rollup.rows, ZONE_ROLLUP_COLUMNS);
  if (rollup.flagged.length > 0) {
    logger.table(rollup.flagged, FLAGGED_SITE_COLUMNS);
  }
}

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  /** Base for relative paths when no config file was found */
  readonly cwd?: string;
}

export interface PlanningCommandResult {
  /** Excluded or flagged records, by layer then input position */
  readonly issues: readonly PlanIssue[];
  /** Files written (empty on --dry-run or when nothing changed) */
  readonly written: readonly string[];
}
