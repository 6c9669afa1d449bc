/**
 * Neighbour-count diagnostics for an adjacency index. Interior cells of a
 * regular hex grid have 6 neighbours; 0 usually points at coordinate drift
 * between the cell and its surroundings.
 */

import { compareIds, type AdjacencyIndex } from './adjacency-index.js';

export interface AdjacencyStats {
  readonly cells: number;
  readonly minNeighbors: number;
  readonly maxNeighbors: number;
  readonly meanNeighbors: number;
  /** Cells with no neighbours, ascending id */
  readonly isolated: readonly string[];
  /** neighbour count -> number of cells */
  readonly histogram: ReadonlyMap<number, number>;
}

export function summarizeAdjacency(index: AdjacencyIndex): AdjacencyStats {
  const histogram = new Map<number, number>();
  const isolated: string[] = [];
  let min = Infinity;
  let max = 0;
  let total = 0;

  for (const cellId of index.cellIds()) {
    const count = index.neighborsOf(cellId).size;
    histogram.set(count, (histogram.get(count) ?? 0) + 1);
    if (count === 0) isolated.push(cellId);
    min = Math.min(min, count);
    max = Math.max(max, count);
    total += count;
  }

  const cells = index.size;
  return {
    cells,
    minNeighbors: cells === 0 ? 0 : min,
    maxNeighbors: max,
    meanNeighbors: cells === 0 ? 0 : total / cells,
    isolated: isolated.sort(compareIds),
    histogram: new Map([...histogram.entries()].sort(([a], [b]) => a - b)),
  };
}
