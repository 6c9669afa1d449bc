/**
 * Site Planner Record Types
 *
 * Typed records for the four planning layers (zones, corridors, cells, sites)
 * and the derived values the pipeline stages produce. Field names follow the
 * GeoJSON property names the layers are stored with, so a record converts to
 * and from a feature without renaming.
 *
 * @module core/types
 */

import type {
  LineString,
  MultiLineString,
  MultiPolygon,
  Point,
  Polygon,
} from 'geojson';

// ============================================================================
// Classes and States
// ============================================================================

export type ConfidenceClass = 'HIGH' | 'MED' | 'LOW';

export type DemandClass = 'HIGH' | 'MED' | 'LOW';

export type SiteTier = 'A' | 'B';

/**
 * PENDING -> SATISFIED is the only transition. Nothing moves a site back.
 */
export type SiteStatus = 'PENDING' | 'SATISFIED';

/**
 * Tier B role. Read from the site's `notes` field: "ALT" marks an alternate,
 * anything else (absent included) is a required site.
 */
export type SiteRole = 'REQUIRED' | 'ALT';

export type CellGeometry = Polygon | MultiPolygon;

export type LayerName = 'zones' | 'corridors' | 'cells' | 'sites';

/**
 * A record as read from a layer, before validation
 */
export type RawRecord = Readonly<Record<string, unknown>>;

// ============================================================================
// Layer Records
// ============================================================================

export interface ZoneRecord {
  readonly zone_id: string;
  readonly geometry: CellGeometry | null;
}

export interface CorridorRecord {
  readonly corridor_id: string;
  readonly geometry: LineString | MultiLineString | null;
}

/**
 * Binary availability inputs. Each is 0 or 1.
 */
export interface CellFlags {
  readonly elev_adv_avail: number;
  readonly tall_struct_avail: number;
  readonly backbone_los_likely: number;
  readonly clutter_high: number;
}

/**
 * Demand weights, each in [0, 1]
 */
export interface CellWeights {
  readonly pop_weight: number;
  readonly critical_weight: number;
}

export type CellAttributes = CellFlags & CellWeights;

export type CellAttributeName = keyof CellAttributes;

export const FLAG_ATTRIBUTES: readonly (keyof CellFlags)[] = [
  'elev_adv_avail',
  'tall_struct_avail',
  'backbone_los_likely',
  'clutter_high',
];

export const WEIGHT_ATTRIBUTES: readonly (keyof CellWeights)[] = [
  'pop_weight',
  'critical_weight',
];

/**
 * A hex cell after schema validation. Attribute values are still unchecked
 * (`unknown`) because out-of-range values are a per-cell classification
 * problem, not a schema problem.
 */
export interface CellRecord {
  /** Position in the input layer */
  readonly index: number;
  readonly cell_id: string;
  readonly zone_id: string;
  readonly geometry: CellGeometry;
  readonly attributes: Readonly<Record<CellAttributeName, unknown>>;
}

export interface TierBRequirement {
  readonly required: number;
  readonly alternate: number;
}

/**
 * Derived fields written back onto a scored cell
 */
export interface CellScore {
  readonly confidence_score: number;
  readonly confidence_class: ConfidenceClass;
  readonly tierB_sites_required: number;
  readonly tierB_alternate_required: number;
  readonly priority_score: number;
  readonly tierC_demand_class: DemandClass;
}

export interface ScoredCell {
  readonly index: number;
  readonly cell_id: string;
  readonly zone_id: string;
  readonly attributes: CellAttributes;
  readonly score: CellScore;
  /** Attribute names filled from zone defaults */
  readonly scaffolded: readonly CellAttributeName[];
}

export interface SiteRecord {
  /** Position in the input layer */
  readonly index: number;
  readonly site_id: string;
  readonly tier: SiteTier;
  readonly zone_id: string;
  readonly geometry: Point | null;
  readonly cell_id: string | null;
  readonly corridor_id: string | null;
  readonly role: SiteRole;
  readonly status: SiteStatus;
  readonly satisfied_by: string | null;
  readonly satisfied_corridor_id: string | null;
}

// ============================================================================
// Issues
// ============================================================================

export type PlanIssueKind = 'schema' | 'geometry' | 'value' | 'unresolved-cell';

/**
 * A record the run excluded or flagged. Collected, never thrown.
 */
export interface PlanIssue {
  readonly kind: PlanIssueKind;
  readonly layer: LayerName;
  /** Record identifier, when the record carried one */
  readonly recordId: string | null;
  /** Position of the record in its input layer */
  readonly index: number;
  readonly message: string;
}

/**
 * Accepted records of one layer plus the issues raised while reading it
 */
export interface LayerValidation<T> {
  readonly records: readonly T[];
  readonly issues: readonly PlanIssue[];
  /** Input record count, accepted and rejected */
  readonly total: number;
}
