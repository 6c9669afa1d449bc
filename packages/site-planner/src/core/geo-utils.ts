/**
 * Geographic Utilities - Polygon Vertex Helpers
 *
 * Vertex extraction and vertex keys used by the adjacency index and the
 * geometry validator.
 */

import type { Position } from 'geojson';
import type { CellGeometry } from './types.js';

// ============================================================================
// Vertex Extraction
// ============================================================================

/**
 * All ring positions of a Polygon or MultiPolygon, holes included, in ring
 * order. Closing positions are kept.
 */
export function extractVertices(geometry: CellGeometry): Position[] {
  const coords: Position[] = [];

  switch (geometry.type) {
    case 'Polygon':
      for (const ring of geometry.coordinates) {
        coords.push(...ring);
      }
      break;
    case 'MultiPolygon':
      for (const polygon of geometry.coordinates) {
        for (const ring of polygon) {
          coords.push(...ring);
        }
      }
      break;
  }

  return coords;
}

/**
 * Exterior rings only, one per polygon part
 */
export function exteriorRings(geometry: CellGeometry): Position[][] {
  if (geometry.type === 'Polygon') {
    return geometry.coordinates.length > 0 ? [geometry.coordinates[0]] : [];
  }
  return geometry.coordinates
    .filter((polygon) => polygon.length > 0)
    .map((polygon) => polygon[0]);
}

// ============================================================================
// Vertex Keys
// ============================================================================

/**
 * Key for a vertex. Only x and y participate.
 *
 * With `snapDecimals` unset the key is the exact coordinate value
 * (Number#toString round-trips every double, so equal keys mean equal
 * coordinates). With `snapDecimals` set, coordinates are rounded to that many
 * decimal places first.
 */
export function vertexKey(position: Position, snapDecimals: number | null = null): string {
  const [x, y] = position;
  if (snapDecimals === null) {
    return `${x},${y}`;
  }
  return `${snapCoordinate(x, snapDecimals)},${snapCoordinate(y, snapDecimals)}`;
}

function snapCoordinate(value: number, decimals: number): string {
  // toFixed yields "-0.000" for tiny negatives; normalise so it matches "0.000"
  const fixed = value.toFixed(decimals);
  return Number(fixed) === 0 ? (0).toFixed(decimals) : fixed;
}

/**
 * Distinct vertex keys of a cell polygon
 */
export function vertexKeySet(geometry: CellGeometry, snapDecimals: number | null = null): Set<string> {
  const keys = new Set<string>();
  for (const position of extractVertices(geometry)) {
    keys.add(vertexKey(position, snapDecimals));
  }
  return keys;
}
