/**
 * Adjacency Index
 *
 * Ring-1 neighbours of every hex cell: two cells are neighbours when their
 * boundaries share at least one vertex. Edge-sharing cells share two.
 *
 * VERTEX MATCHING: exact coordinate values by default. Layers generated with
 * different precision, or with floating-point drift, will miss adjacencies
 * under exact matching; set `snapDecimals` to compare coordinates rounded to
 * a fixed number of decimal places instead. The choice changes coverage
 * results, so it is surfaced in config (`adjacency.snap_decimals`).
 *
 * Construction goes through a vertex -> cells multimap, so cost grows with
 * the total vertex count rather than with the square of the cell count.
 *
 * @module adjacency/adjacency-index
 */

import { vertexKeySet } from '../core/geo-utils.js';
import type { CellGeometry } from '../core/types.js';

export interface AdjacencyInput {
  readonly cell_id: string;
  readonly geometry: CellGeometry;
}

export interface AdjacencyOptions {
  /** Round coordinates to this many decimals before matching; null = exact */
  readonly snapDecimals?: number | null;
}

export class AdjacencyIndex {
  private constructor(private readonly neighbors: ReadonlyMap<string, ReadonlySet<string>>) {}

  /**
   * Build from cells with valid geometry. Duplicate cell ids merge into one
   * entry.
   */
  static build(cells: Iterable<AdjacencyInput>, options: AdjacencyOptions = {}): AdjacencyIndex {
    const snapDecimals = options.snapDecimals ?? null;
    const cellsByVertex = new Map<string, Set<string>>();
    const verticesByCell = new Map<string, Set<string>>();

    for (const cell of cells) {
      const keys = vertexKeySet(cell.geometry, snapDecimals);
      const existing = verticesByCell.get(cell.cell_id);
      if (existing) {
        keys.forEach((key) => existing.add(key));
      } else {
        verticesByCell.set(cell.cell_id, keys);
      }

      for (const key of keys) {
        let owners = cellsByVertex.get(key);
        if (!owners) {
          owners = new Set();
          cellsByVertex.set(key, owners);
        }
        owners.add(cell.cell_id);
      }
    }

    const neighbors = new Map<string, Set<string>>();
    for (const [cellId, keys] of verticesByCell) {
      const found = new Set<string>();
      for (const key of keys) {
        for (const other of cellsByVertex.get(key) ?? []) {
          if (other !== cellId) found.add(other);
        }
      }
      neighbors.set(cellId, found);
    }

    return new AdjacencyIndex(neighbors);
  }

  has(cellId: string): boolean {
    return this.neighbors.has(cellId);
  }

  /**
   * Neighbours of a cell, never including the cell itself. Empty for cells
   * not in the index.
   */
  neighborsOf(cellId: string): ReadonlySet<string> {
    return this.neighbors.get(cellId) ?? EMPTY;
  }

  areNeighbors(a: string, b: string): boolean {
    return this.neighborsOf(a).has(b);
  }

  /**
   * The cell plus its ring-1 neighbours
   */
  coverageSet(cellId: string): Set<string> {
    return new Set([cellId, ...this.neighborsOf(cellId)]);
  }

  get size(): number {
    return this.neighbors.size;
  }

  cellIds(): string[] {
    return [...this.neighbors.keys()];
  }

  /**
   * Plain mapping, neighbour lists sorted, for reports and tests
   */
  toRecord(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const cellId of [...this.neighbors.keys()].sort(compareIds)) {
      out[cellId] = [...this.neighborsOf(cellId)].sort(compareIds);
    }
    return out;
  }
}

const EMPTY: ReadonlySet<string> = new Set();

/**
 * Code-unit order. Locale-independent, so the same input sorts the same
 * everywhere.
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
