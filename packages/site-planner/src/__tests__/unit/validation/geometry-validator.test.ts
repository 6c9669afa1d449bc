import { describe, it, expect } from 'vitest';
import type { MultiPolygon, Polygon } from 'geojson';
import { checkCellGeometry, screenCellGeometry } from '../../../validation/geometry-validator.js';
import { bowtiePolygon, cellRecord, hexPolygon, recordingLogger } from '../../utils/fixtures.js';

const SLIVER: Polygon = {
  type: 'Polygon',
  coordinates: [
    [
      [0, 0],
      [1, 1],
      [0, 0],
    ],
  ],
};

describe('Cell Geometry Validation', () => {
  describe('checkCellGeometry', () => {
    it('accepts a regular hex', () => {
      expect(checkCellGeometry(hexPolygon(0, 0))).toBeNull();
    });

    it('accepts a hex with a repeated consecutive vertex', () => {
      const [ring] = hexPolygon(0, 0).coordinates;
      const repeated: Polygon = { type: 'Polygon', coordinates: [[ring[0], ring[1], ring[1], ...ring.slice(2)]] };

      expect(checkCellGeometry(repeated)).toBeNull();
    });

    it('rejects a ring with fewer than 3 distinct vertices', () => {
      expect(checkCellGeometry(SLIVER)).toBe(
        'exterior ring has 2 distinct vertices, need at least 3'
      );
    });

    it('rejects a self-intersecting ring', () => {
      expect(checkCellGeometry(bowtiePolygon(0, 0))).toMatch(/^self-intersecting polygon/);
    });

    it('rejects a polygon with no rings', () => {
      expect(checkCellGeometry({ type: 'Polygon', coordinates: [] })).toBe(
        'polygon has no exterior ring'
      );
    });

    it('checks every part of a MultiPolygon', () => {
      const multi: MultiPolygon = {
        type: 'MultiPolygon',
        coordinates: [hexPolygon(0, 0).coordinates, SLIVER.coordinates],
      };
      expect(checkCellGeometry(multi)).toBe('exterior ring has 2 distinct vertices, need at least 3');
    });
  });

  describe('screenCellGeometry', () => {
    it('separates usable cells from GeometryErrors and logs each exclusion', () => {
      const logger = recordingLogger();
      const cells = [
        cellRecord('H1', [0, 0], { index: 0 }),
        cellRecord('H2', [3, 2], { index: 1, geometry: bowtiePolygon(3, 2) }),
        cellRecord('H3', [0, 4], { index: 2, geometry: SLIVER }),
      ];

      const result = screenCellGeometry(cells, logger);

      expect(result.usable.map((cell) => cell.cell_id)).toEqual(['H1']);
      expect(result.issues.map((issue) => [issue.kind, issue.recordId, issue.index])).toEqual([
        ['geometry', 'H2', 1],
        ['geometry', 'H3', 2],
      ]);
      expect(logger.entries.map((entry) => entry.level)).toEqual(['warn', 'warn']);
    });
  });
});
