/**
 * Coverage Satisfier
 *
 * Credits Tier A coverage against Tier B required sites. Each Tier A site
 * covers its home cell and that cell's ring-1 neighbours; every PENDING,
 * required Tier B site in a covered cell becomes SATISFIED, recording the
 * Tier A site and its corridor.
 *
 * RULES:
 * - Alternates ("ALT") are never touched.
 * - SATISFIED sites are never touched, so a rerun changes nothing.
 * - Tier A sites are processed in ascending site_id; when several cover the
 *   same cell, the lowest id claims the sites there.
 * - Sites whose home cell cannot be resolved are skipped and flagged.
 *
 * The input is not mutated. The result carries the patch set and a new site
 * list with the patches applied.
 *
 * @module coverage/coverage-satisfier
 */

import { compareIds, type AdjacencyIndex } from '../adjacency/adjacency-index.js';
import { UnresolvedCellError } from '../core/errors.js';
import type { PlanIssue, SiteRecord } from '../core/types.js';
import { createLogger, type PlanningLogger } from '../core/utils/logger.js';
import type { HomeCellResolver } from './home-cell.js';

export interface SatisfactionPatch {
  readonly site_id: string;
  /** Position of the site in the input layer */
  readonly index: number;
  readonly status: 'SATISFIED';
  readonly satisfied_by: string;
  readonly satisfied_corridor_id: string | null;
}

export interface CoverageSummary {
  /** Tier B required sites satisfied by this run */
  readonly satisfiedRequired: number;
  /** Tier B required sites still PENDING afterwards */
  readonly remainingRequired: number;
  /** Tier A sites that satisfied at least one site in this run */
  readonly tierAUsed: number;
  readonly tierASites: number;
  /** Sites skipped because their home cell could not be resolved */
  readonly unresolved: number;
}

export interface CoverageResult {
  /** Input order, patches applied */
  readonly sites: readonly SiteRecord[];
  /** Ascending site_id */
  readonly patches: readonly SatisfactionPatch[];
  readonly summary: CoverageSummary;
  readonly issues: readonly PlanIssue[];
}

export interface SatisfyOptions {
  readonly logger?: PlanningLogger;
}

export function isPendingRequired(site: SiteRecord): boolean {
  return site.tier === 'B' && site.role === 'REQUIRED' && site.status === 'PENDING';
}

export function satisfyCoverage(
  sites: readonly SiteRecord[],
  index: AdjacencyIndex,
  resolver: HomeCellResolver,
  options: SatisfyOptions = {}
): CoverageResult {
  const log = options.logger ?? createLogger({ module: 'coverage' });
  const issues: PlanIssue[] = [];

  const flagUnresolved = (site: SiteRecord): void => {
    const reason =
      site.cell_id === null
        ? 'no cell_id and no containing cell for its location'
        : `cell_id ${site.cell_id} is not a known cell and its location resolves to none`;
    const error = new UnresolvedCellError(reason, {
      layer: 'sites',
      recordId: site.site_id,
      index: site.index,
    });
    log.warn('Site skipped: home cell unresolved', { site_id: site.site_id, tier: site.tier });
    issues.push(error.toIssue());
  };

  // Tier B required sites still open, by home cell
  const pendingByCell = new Map<string, SiteRecord[]>();
  const tierA: { site: SiteRecord; home: string }[] = [];

  for (const site of sites) {
    if (site.tier === 'A') {
      const home = resolver.resolve(site);
      if (home === null) {
        flagUnresolved(site);
      } else {
        tierA.push({ site, home });
      }
      continue;
    }

    if (!isPendingRequired(site)) continue;

    const home = resolver.resolve(site);
    if (home === null) {
      flagUnresolved(site);
      continue;
    }
    const bucket = pendingByCell.get(home);
    if (bucket) {
      bucket.push(site);
    } else {
      pendingByCell.set(home, [site]);
    }
  }

  tierA.sort((a, b) => compareIds(a.site.site_id, b.site.site_id));

  const patches: SatisfactionPatch[] = [];
  const used = new Set<string>();

  for (const { site: covering, home } of tierA) {
    const covered = [...index.coverageSet(home)].sort(compareIds);
    for (const cellId of covered) {
      const waiting = pendingByCell.get(cellId);
      if (!waiting) continue;

      for (const target of waiting) {
        patches.push({
          site_id: target.site_id,
          index: target.index,
          status: 'SATISFIED',
          satisfied_by: covering.site_id,
          satisfied_corridor_id: covering.corridor_id,
        });
      }
      // Claimed: later Tier A sites must not overwrite
      pendingByCell.delete(cellId);
      used.add(covering.site_id);
    }
  }

  patches.sort((a, b) => compareIds(a.site_id, b.site_id));
  const updated = applySatisfaction(sites, patches);

  const summary: CoverageSummary = {
    satisfiedRequired: patches.length,
    remainingRequired: updated.filter(isPendingRequired).length,
    tierAUsed: used.size,
    tierASites: sites.filter((site) => site.tier === 'A').length,
    unresolved: issues.length,
  };

  log.info('Coverage applied', { ...summary });

  return { sites: updated, patches, summary, issues };
}

/**
 * New site list with patches applied. Patches for sites that are not PENDING
 * are ignored, keeping the transition one-way.
 */
export function applySatisfaction(
  sites: readonly SiteRecord[],
  patches: readonly SatisfactionPatch[]
): SiteRecord[] {
  const bySiteId = new Map(
    patches.map((patch): [string, SatisfactionPatch] => [patch.site_id, patch])
  );

  return sites.map((site) => {
    const patch = bySiteId.get(site.site_id);
    if (!patch || site.status !== 'PENDING') return site;
    return {
      ...site,
      status: patch.status,
      satisfied_by: patch.satisfied_by,
      satisfied_corridor_id: patch.satisfied_corridor_id,
    };
  });
}
