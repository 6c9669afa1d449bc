/**
 * Rollup Reporter
 *
 * Per-zone site counts after coverage, and per-zone Tier B targets from
 * scored cells. Pure aggregation; rows come out in ascending zone_id.
 *
 * @module reporting/rollup-reporter
 */

import { compareIds } from '../adjacency/adjacency-index.js';
import type { PlanIssue, ScoredCell, SiteRecord } from '../core/types.js';

export interface ZoneRollupRow {
  readonly zone_id: string;
  /** Tier B required sites, any status */
  readonly tierB_required_before: number;
  /** Tier B required sites still PENDING */
  readonly tierB_required_after: number;
  readonly tierB_alt_total: number;
  readonly tierA_sites: number;
}

export interface FlaggedSite {
  readonly zone_id: string;
  readonly site_id: string;
  readonly reason: string;
}

export interface ZoneRollup {
  readonly rows: readonly ZoneRollupRow[];
  /** Sites coverage skipped, ascending zone_id then site_id */
  readonly flagged: readonly FlaggedSite[];
}

export interface ZoneRollupOptions {
  /** Zones to report even when they hold no sites */
  readonly zoneIds?: Iterable<string>;
  /** Coverage issues to attach to their zones */
  readonly issues?: readonly PlanIssue[];
}

interface MutableRow {
  tierB_required_before: number;
  tierB_required_after: number;
  tierB_alt_total: number;
  tierA_sites: number;
}

export function buildZoneRollup(
  sites: readonly SiteRecord[],
  options: ZoneRollupOptions = {}
): ZoneRollup {
  const stats = new Map<string, MutableRow>();
  const rowFor = (zoneId: string): MutableRow => {
    let row = stats.get(zoneId);
    if (!row) {
      row = { tierB_required_before: 0, tierB_required_after: 0, tierB_alt_total: 0, tierA_sites: 0 };
      stats.set(zoneId, row);
    }
    return row;
  };

  for (const zoneId of options.zoneIds ?? []) {
    rowFor(zoneId);
  }

  for (const site of sites) {
    const row = rowFor(site.zone_id);
    if (site.tier === 'A') {
      row.tierA_sites += 1;
    } else if (site.role === 'ALT') {
      row.tierB_alt_total += 1;
    } else {
      row.tierB_required_before += 1;
      if (site.status === 'PENDING') row.tierB_required_after += 1;
    }
  }

  const rows = [...stats.entries()]
    .sort(([a], [b]) => compareIds(a, b))
    .map(([zone_id, row]) => ({ zone_id, ...row }));

  const sitesByIndex = new Map(sites.map((site): [number, SiteRecord] => [site.index, site]));
  const flagged: FlaggedSite[] = [];
  for (const issue of options.issues ?? []) {
    if (issue.layer !== 'sites' || issue.kind !== 'unresolved-cell') continue;
    const site = sitesByIndex.get(issue.index);
    if (!site) continue;
    flagged.push({ zone_id: site.zone_id, site_id: site.site_id, reason: issue.message });
  }
  flagged.sort((a, b) => compareIds(a.zone_id, b.zone_id) || compareIds(a.site_id, b.site_id));

  return { rows, flagged };
}

// ============================================================================
// Tier B Targets
// ============================================================================

export interface RequirementRollupRow {
  readonly zone_id: string;
  readonly tierB_sites_required: number;
  readonly tierB_alternate_required: number;
  readonly total: number;
}

/**
 * Sum of the per-cell Tier B targets, by zone
 */
export function buildRequirementRollup(cells: readonly ScoredCell[]): RequirementRollupRow[] {
  const totals = new Map<string, { required: number; alternate: number }>();

  for (const cell of cells) {
    const entry = totals.get(cell.zone_id) ?? { required: 0, alternate: 0 };
    entry.required += cell.score.tierB_sites_required;
    entry.alternate += cell.score.tierB_alternate_required;
    totals.set(cell.zone_id, entry);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => compareIds(a, b))
    .map(([zone_id, { required, alternate }]) => ({
      zone_id,
      tierB_sites_required: required,
      tierB_alternate_required: alternate,
      total: required + alternate,
    }));
}
