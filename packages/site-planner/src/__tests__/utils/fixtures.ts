/**
 * Test Fixture Factories
 *
 * Flat-top hexes on an integer lattice so shared vertices compare exactly:
 * a hex centred at (cx, cy) has vertices (cx±2, cy), (cx±1, cy±2).
 * Neighbour centres sit at (cx, cy±4) and (cx±3, cy±2).
 */

import type { Feature, FeatureCollection, Geometry, Point, Polygon } from 'geojson';
import type { CellAttributes, CellRecord, RawRecord, SiteRecord } from '../../core/types.js';
import type { LogMetadata, PlanningLogger } from '../../core/utils/logger.js';

// ============================================================================
// Geometry Fixtures
// ============================================================================

export function hexPolygon(cx: number, cy: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [cx + 2, cy],
        [cx + 1, cy + 2],
        [cx - 1, cy + 2],
        [cx - 2, cy],
        [cx - 1, cy - 2],
        [cx + 1, cy - 2],
        [cx + 2, cy],
      ],
    ],
  };
}

export function point(x: number, y: number): Point {
  return { type: 'Point', coordinates: [x, y] };
}

/**
 * Self-intersecting quadrilateral
 */
export function bowtiePolygon(cx: number, cy: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [cx - 1, cy - 1],
        [cx + 1, cy + 1],
        [cx + 1, cy - 1],
        [cx - 1, cy + 1],
        [cx - 1, cy - 1],
      ],
    ],
  };
}

// ============================================================================
// Record Fixtures
// ============================================================================

export const BASE_ATTRIBUTES: CellAttributes = {
  elev_adv_avail: 1,
  tall_struct_avail: 1,
  backbone_los_likely: 1,
  clutter_high: 0,
  pop_weight: 0.5,
  critical_weight: 0.5,
};

export function rawCell(
  cellId: string,
  center: readonly [number, number],
  overrides: Readonly<Record<string, unknown>> = {}
): RawRecord {
  return {
    cell_id: cellId,
    zone_id: 'Z1',
    geometry: hexPolygon(center[0], center[1]),
    ...BASE_ATTRIBUTES,
    ...overrides,
  };
}

export function cellRecord(
  cellId: string,
  center: readonly [number, number],
  overrides: Partial<CellRecord> = {}
): CellRecord {
  return {
    index: 0,
    cell_id: cellId,
    zone_id: 'Z1',
    geometry: hexPolygon(center[0], center[1]),
    attributes: { ...BASE_ATTRIBUTES },
    ...overrides,
  };
}

export function rawSite(
  siteId: string,
  tier: 'A' | 'B',
  overrides: Readonly<Record<string, unknown>> = {}
): RawRecord {
  return {
    site_id: siteId,
    tier,
    zone_id: 'Z1',
    geometry: null,
    cell_id: null,
    corridor_id: null,
    notes: null,
    status: 'PENDING',
    ...overrides,
  };
}

export function siteRecord(
  siteId: string,
  tier: 'A' | 'B',
  overrides: Partial<SiteRecord> = {}
): SiteRecord {
  return {
    index: 0,
    site_id: siteId,
    tier,
    zone_id: 'Z1',
    geometry: null,
    cell_id: null,
    corridor_id: null,
    role: 'REQUIRED',
    status: 'PENDING',
    satisfied_by: null,
    satisfied_corridor_id: null,
    ...overrides,
  };
}

/**
 * Give each record its position, as the validator does
 */
export function indexed<T extends { index: number }>(records: readonly T[]): T[] {
  return records.map((record, index) => ({ ...record, index }));
}

// ============================================================================
// GeoJSON Fixtures
// ============================================================================

/**
 * Records back into a FeatureCollection: `geometry` becomes the feature
 * geometry, every other field a property
 */
export function featureCollection(records: readonly RawRecord[]): FeatureCollection<Geometry | null> {
  return {
    type: 'FeatureCollection',
    features: records.map((record): Feature<Geometry | null> => {
      const { geometry, ...properties } = record;
      return {
        type: 'Feature',
        properties,
        geometry: isGeometry(geometry) ? geometry : null,
      };
    }),
  };
}

function isGeometry(value: unknown): value is Geometry {
  return typeof value === 'object' && value !== null && 'type' in value;
}

// ============================================================================
// Logger Fixtures
// ============================================================================

export interface RecordedLog {
  readonly level: 'debug' | 'info' | 'warn' | 'error';
  readonly message: string;
  readonly metadata?: LogMetadata;
}

/**
 * Logger that keeps entries in memory
 */
export function recordingLogger(): PlanningLogger & { readonly entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  return {
    entries,
    debug: (message, metadata) => entries.push({ level: 'debug', message, metadata }),
    info: (message, metadata) => entries.push({ level: 'info', message, metadata }),
    warn: (message, metadata) => entries.push({ level: 'warn', message, metadata }),
    error: (message, metadata) => entries.push({ level: 'error', message, metadata }),
  };
}
