/**
 * Layer Record Validation
 *
 * Turns raw layer records into typed records. Per record:
 * - schema check (identifier present, enums, geometry shape)
 * - duplicate identifier check (the first record carrying an id claims it,
 *   later ones are rejected even if the first fails another check)
 * - foreign key checks against the layers that were supplied
 *
 * Rejected records become SchemaError issues; the run continues. A layer
 * whose rejected share exceeds the configured failure rate aborts the run
 * with FailureThresholdError (see assertFailureRate).
 *
 * @module validation/record-validator
 */

import type { z } from 'zod';
import { ALT_NOTE } from '../core/constants.js';
import { FailureThresholdError, SchemaError } from '../core/errors.js';
import type {
  CellAttributeName,
  CellRecord,
  CorridorRecord,
  LayerName,
  LayerValidation,
  PlanIssue,
  RawRecord,
  SiteRecord,
  ZoneRecord,
} from '../core/types.js';
import {
  CellSchema,
  CorridorSchema,
  SiteSchema,
  ZoneSchema,
  describeZodError,
} from './record-schemas.js';

/**
 * Identifier sets of the reference layers. `null` means the layer was not
 * supplied and the foreign key is not checked.
 */
export interface ReferenceSets {
  readonly zoneIds: ReadonlySet<string> | null;
  readonly corridorIds: ReadonlySet<string> | null;
}

type RecordCheck<T> = (record: T) => string[];

/**
 * Shared loop: schema parse, duplicate check, extra checks, conversion
 */
function validateLayer<S extends z.ZodTypeAny, T>(
  layer: LayerName,
  raw: readonly RawRecord[],
  schema: S,
  idOf: (parsed: z.output<S>) => string,
  check: RecordCheck<z.output<S>>,
  build: (parsed: z.output<S>, record: RawRecord, index: number) => T
): LayerValidation<T> {
  const records: T[] = [];
  const issues: PlanIssue[] = [];
  const seen = new Set<string>();

  raw.forEach((record, index) => {
    const reject = (recordId: string | null, messages: readonly string[]): void => {
      issues.push(new SchemaError(messages.join('; '), { layer, recordId, index }).toIssue());
    };

    const result = schema.safeParse(record);
    if (!result.success) {
      reject(rawId(record, layer), describeZodError(result.error));
      return;
    }

    const parsed: z.output<S> = result.data;
    const id = idOf(parsed);
    if (seen.has(id)) {
      reject(id, [`duplicate identifier ${id}`]);
      return;
    }
    seen.add(id);

    const problems = check(parsed);
    if (problems.length > 0) {
      reject(id, problems);
      return;
    }

    records.push(build(parsed, record, index));
  });

  return { records, issues, total: raw.length };
}

const ID_FIELDS: Record<LayerName, string> = {
  zones: 'zone_id',
  corridors: 'corridor_id',
  cells: 'cell_id',
  sites: 'site_id',
};

function rawId(record: RawRecord, layer: LayerName): string | null {
  const value = record[ID_FIELDS[layer]];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function checkForeignKey(
  field: string,
  value: string | null,
  ids: ReadonlySet<string> | null
): string[] {
  if (value === null || ids === null || ids.has(value)) return [];
  return [`${field}: unknown reference ${value}`];
}

// ============================================================================
// Layer Validators
// ============================================================================

export function validateZones(raw: readonly RawRecord[]): LayerValidation<ZoneRecord> {
  return validateLayer<typeof ZoneSchema, ZoneRecord>(
    'zones',
    raw,
    ZoneSchema,
    (zone) => zone.zone_id,
    () => [],
    (zone) => ({ zone_id: zone.zone_id, geometry: zone.geometry })
  );
}

export function validateCorridors(raw: readonly RawRecord[]): LayerValidation<CorridorRecord> {
  return validateLayer<typeof CorridorSchema, CorridorRecord>(
    'corridors',
    raw,
    CorridorSchema,
    (corridor) => corridor.corridor_id,
    () => [],
    (corridor) => ({ corridor_id: corridor.corridor_id, geometry: corridor.geometry })
  );
}

export function validateCells(
  raw: readonly RawRecord[],
  zoneIds: ReadonlySet<string> | null
): LayerValidation<CellRecord> {
  return validateLayer<typeof CellSchema, CellRecord>(
    'cells',
    raw,
    CellSchema,
    (cell) => cell.cell_id,
    (cell) => checkForeignKey('zone_id', cell.zone_id, zoneIds),
    (cell, record, index) => ({
      index,
      cell_id: cell.cell_id,
      zone_id: cell.zone_id,
      geometry: cell.geometry,
      attributes: pickAttributes(record),
    })
  );
}

/**
 * Site `cell_id` is deliberately not checked here: a site whose cell cannot be
 * resolved is kept and flagged by the coverage stage instead.
 *
 * `satisfied_by` must name a Tier A site of the same layer; the Tier A ids are
 * collected from every schema-valid record before the main pass.
 */
export function validateSites(
  raw: readonly RawRecord[],
  refs: ReferenceSets
): LayerValidation<SiteRecord> {
  const tierAIds = new Set<string>();
  for (const record of raw) {
    const result = SiteSchema.safeParse(record);
    if (result.success && result.data.tier === 'A') {
      tierAIds.add(result.data.site_id);
    }
  }

  return validateLayer<typeof SiteSchema, SiteRecord>(
    'sites',
    raw,
    SiteSchema,
    (site) => site.site_id,
    (site) => [
      ...checkForeignKey('zone_id', site.zone_id, refs.zoneIds),
      ...checkForeignKey('corridor_id', site.corridor_id, refs.corridorIds),
      ...(site.satisfied_by === null || tierAIds.has(site.satisfied_by)
        ? []
        : [`satisfied_by: ${site.satisfied_by} is not a Tier A site`]),
      ...checkForeignKey('satisfied_corridor_id', site.satisfied_corridor_id, refs.corridorIds),
    ],
    (site, _record, index) => ({
      index,
      site_id: site.site_id,
      tier: site.tier,
      zone_id: site.zone_id,
      geometry: site.geometry,
      cell_id: site.cell_id,
      corridor_id: site.corridor_id,
      role: site.notes === ALT_NOTE ? 'ALT' : 'REQUIRED',
      status: site.status,
      satisfied_by: site.satisfied_by,
      satisfied_corridor_id: site.satisfied_corridor_id,
    })
  );
}

function pickAttributes(record: RawRecord): Record<CellAttributeName, unknown> {
  return {
    elev_adv_avail: record['elev_adv_avail'],
    tall_struct_avail: record['tall_struct_avail'],
    backbone_los_likely: record['backbone_los_likely'],
    clutter_high: record['clutter_high'],
    pop_weight: record['pop_weight'],
    critical_weight: record['critical_weight'],
  };
}

export function idSet<T>(validation: LayerValidation<T> | null, idOf: (record: T) => string): Set<string> | null {
  if (validation === null) return null;
  return new Set(validation.records.map(idOf));
}

// ============================================================================
// Failure Rate Gate
// ============================================================================

/**
 * Throw when the rejected share of a layer exceeds `maxFailureRate`.
 * Empty layers pass. A rate of 1 disables the gate.
 */
export function assertFailureRate<T>(
  layer: LayerName,
  validation: LayerValidation<T>,
  maxFailureRate: number
): void {
  if (validation.total === 0) return;

  const rejected = validation.total - validation.records.length;
  if (rejected / validation.total > maxFailureRate) {
    throw new FailureThresholdError(
      layer,
      rejected,
      validation.total,
      maxFailureRate,
      validation.issues
    );
  }
}
