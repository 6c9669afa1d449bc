/**
 * Cell Geometry Validation
 *
 * A cell polygon is usable for adjacency when every exterior ring has at
 * least three distinct vertices and no part self-intersects (turf `kinks`).
 * Repeated consecutive positions are dropped (turf `cleanCoords`) before the
 * intersection test; they are not crossings. Failing cells stay in the
 * dataset for scoring but are left out of the adjacency index.
 *
 * @module validation/geometry-validator
 */

import { cleanCoords, kinks } from '@turf/turf';
import { GeometryError } from '../core/errors.js';
import { exteriorRings, vertexKey } from '../core/geo-utils.js';
import type { CellGeometry, CellRecord, PlanIssue } from '../core/types.js';
import { createLogger, type PlanningLogger } from '../core/utils/logger.js';

export const MIN_DISTINCT_VERTICES = 3;

/**
 * Problem description, or null for a usable polygon
 */
export function checkCellGeometry(geometry: CellGeometry): string | null {
  const rings = exteriorRings(geometry);
  if (rings.length === 0) {
    return 'polygon has no exterior ring';
  }

  for (const ring of rings) {
    const distinct = new Set(ring.map((position) => vertexKey(position))).size;
    if (distinct < MIN_DISTINCT_VERTICES) {
      return `exterior ring has ${distinct} distinct vertices, need at least ${MIN_DISTINCT_VERTICES}`;
    }
  }

  try {
    const intersections = kinks(cleanCoords(geometry));
    if (intersections.features.length > 0) {
      const [lon, lat] = intersections.features[0].geometry.coordinates;
      return `self-intersecting polygon (${intersections.features.length} intersection point(s), first at ${lon},${lat})`;
    }
  } catch (error) {
    return `topology check failed: ${error instanceof Error ? error.message : String(error)}`;
  }

  return null;
}

export interface GeometryScreenResult {
  /** Cells usable for adjacency, input order */
  readonly usable: readonly CellRecord[];
  readonly issues: readonly PlanIssue[];
}

export function screenCellGeometry(
  cells: readonly CellRecord[],
  logger?: PlanningLogger
): GeometryScreenResult {
  const log = logger ?? createLogger({ module: 'geometry' });
  const usable: CellRecord[] = [];
  const issues: PlanIssue[] = [];

  for (const cell of cells) {
    const problem = checkCellGeometry(cell.geometry);
    if (problem === null) {
      usable.push(cell);
      continue;
    }
    const error = new GeometryError(problem, {
      layer: 'cells',
      recordId: cell.cell_id,
      index: cell.index,
    });
    log.warn('Cell excluded from adjacency index', { cell_id: cell.cell_id, reason: problem });
    issues.push(error.toIssue());
  }

  return { usable, issues };
}
