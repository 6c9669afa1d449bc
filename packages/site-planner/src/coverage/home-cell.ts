/**
 * Home-cell lookup for sites.
 *
 * A site's declared `cell_id` wins when it names a known cell. Otherwise the
 * site's point is matched against cell polygons (boundary counts as inside);
 * when several cells contain it, the lowest cell_id is taken.
 *
 * @module coverage/home-cell
 */

import { bbox, booleanPointInPolygon } from '@turf/turf';
import type { BBox, Position } from 'geojson';
import { compareIds } from '../adjacency/adjacency-index.js';
import type { CellGeometry, SiteRecord } from '../core/types.js';

interface LocatableCell {
  readonly cell_id: string;
  readonly geometry: CellGeometry;
}

interface IndexedPolygon {
  readonly cellId: string;
  readonly geometry: CellGeometry;
  readonly box: BBox;
}

export class HomeCellResolver {
  private readonly known: ReadonlySet<string>;
  private readonly polygons: readonly IndexedPolygon[];

  /**
   * @param knownCellIds - every accepted cell id
   * @param locatable - cells whose polygons are safe for point lookup
   */
  constructor(knownCellIds: Iterable<string>, locatable: readonly LocatableCell[]) {
    this.known = new Set(knownCellIds);
    this.polygons = [...locatable]
      .sort((a, b) => compareIds(a.cell_id, b.cell_id))
      .map((cell) => ({ cellId: cell.cell_id, geometry: cell.geometry, box: bbox(cell.geometry) }));
  }

  resolve(site: Pick<SiteRecord, 'cell_id' | 'geometry'>): string | null {
    if (site.cell_id !== null && this.known.has(site.cell_id)) {
      return site.cell_id;
    }
    if (site.geometry === null) {
      return null;
    }
    return this.locate(site.geometry.coordinates);
  }

  /**
   * Lowest cell_id whose polygon contains the point
   */
  locate(point: Position): string | null {
    const [x, y] = point;
    for (const polygon of this.polygons) {
      const [minX, minY, maxX, maxY] = polygon.box;
      if (x < minX || x > maxX || y < minY || y > maxY) continue;
      if (booleanPointInPolygon(point, polygon.geometry)) {
        return polygon.cellId;
      }
    }
    return null;
  }
}
