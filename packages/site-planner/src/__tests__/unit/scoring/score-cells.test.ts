import { describe, it, expect } from 'vitest';
import {
  isBlank,
  parseCellAttributes,
  scaffoldAttributes,
  type ScaffoldOptions,
} from '../../../scoring/attributes.js';
import { NO_SCAFFOLDING, scoreCells } from '../../../scoring/score-cells.js';
import { BASE_ATTRIBUTES, cellRecord, recordingLogger } from '../../utils/fixtures.js';

const BLANK_ATTRIBUTES = {
  elev_adv_avail: null,
  tall_struct_avail: '',
  backbone_los_likely: undefined,
  clutter_high: null,
  pop_weight: null,
  critical_weight: undefined,
};

const WEST_DEFAULTS: ScaffoldOptions = {
  zoneDefaults: {
    Z_WEST: {
      elev_adv_avail: 1,
      tall_struct_avail: 0,
      backbone_los_likely: 1,
      clutter_high: 0,
      pop_weight: 0.2,
      critical_weight: 0.2,
    },
  },
  fallbackDefaults: null,
};

describe('Cell attributes', () => {
  describe('isBlank', () => {
    it('treats undefined, null and empty string as blank', () => {
      expect(isBlank(undefined)).toBe(true);
      expect(isBlank(null)).toBe(true);
      expect(isBlank('')).toBe(true);
    });

    it('does not treat 0 as blank', () => {
      expect(isBlank(0)).toBe(false);
    });
  });

  describe('scaffoldAttributes', () => {
    it('fills every blank attribute from the zone defaults', () => {
      const result = scaffoldAttributes('Z_WEST', BLANK_ATTRIBUTES, WEST_DEFAULTS);
      expect(result.values).toEqual({
        elev_adv_avail: 1,
        tall_struct_avail: 0,
        backbone_los_likely: 1,
        clutter_high: 0,
        pop_weight: 0.2,
        critical_weight: 0.2,
      });
      expect(result.filled).toHaveLength(6);
    });

    it('keeps explicit values, including 0', () => {
      const values = { ...BLANK_ATTRIBUTES, elev_adv_avail: 0, pop_weight: 0 };
      const result = scaffoldAttributes('Z_WEST', values, WEST_DEFAULTS);
      expect(result.values.elev_adv_avail).toBe(0);
      expect(result.values.pop_weight).toBe(0);
      expect(result.filled).not.toContain('elev_adv_avail');
      expect(result.filled).not.toContain('pop_weight');
      expect(result.filled).toHaveLength(4);
    });

    it('never coerces an out-of-range value', () => {
      const values = { ...BLANK_ATTRIBUTES, clutter_high: 3 };
      const result = scaffoldAttributes('Z_WEST', values, WEST_DEFAULTS);
      expect(result.values.clutter_high).toBe(3);
    });

    it('uses the fallback defaults for zones without an entry', () => {
      const options: ScaffoldOptions = {
        zoneDefaults: WEST_DEFAULTS.zoneDefaults,
        fallbackDefaults: { pop_weight: 0 },
      };
      const result = scaffoldAttributes('Z_OTHER', BLANK_ATTRIBUTES, options);
      expect(result.filled).toEqual(['pop_weight']);
      expect(result.values.pop_weight).toBe(0);
      expect(result.values.elev_adv_avail).toBeNull();
    });

    it('leaves values alone when no defaults apply', () => {
      const result = scaffoldAttributes('Z_OTHER', BLANK_ATTRIBUTES, NO_SCAFFOLDING);
      expect(result.values).toBe(BLANK_ATTRIBUTES);
      expect(result.filled).toEqual([]);
    });
  });

  describe('parseCellAttributes', () => {
    it('accepts a complete, in-range attribute set', () => {
      expect(parseCellAttributes(BASE_ATTRIBUTES)).toEqual({ success: true, data: BASE_ATTRIBUTES });
    });

    it('reports every problem at once', () => {
      const result = parseCellAttributes({
        ...BASE_ATTRIBUTES,
        elev_adv_avail: 2,
        clutter_high: null,
        critical_weight: 1.5,
      });
      expect(result).toEqual({
        success: false,
        errors: [
          'elev_adv_avail must be 0 or 1, got 2',
          'clutter_high is missing',
          'critical_weight must be a number in [0, 1], got 1.5',
        ],
      });
    });

    it('rejects numeric strings rather than coercing them', () => {
      const result = parseCellAttributes({ ...BASE_ATTRIBUTES, tall_struct_avail: '1' });
      expect(result.success).toBe(false);
    });
  });
});

describe('scoreCells', () => {
  it('writes the derived fields for each valid cell', () => {
    const { scored, issues } = scoreCells([cellRecord('H1', [0, 0])]);

    expect(issues).toEqual([]);
    expect(scored).toHaveLength(1);
    expect(scored[0].score).toEqual({
      confidence_score: 4,
      confidence_class: 'HIGH',
      tierB_sites_required: 1,
      tierB_alternate_required: 0,
      priority_score: 0.5,
      tierC_demand_class: 'MED',
    });
  });

  it('excludes cells with invalid attributes as ValueErrors, keeping their input index', () => {
    const logger = recordingLogger();
    const cells = [
      cellRecord('H1', [0, 0], { index: 0 }),
      cellRecord('H2', [3, 2], {
        index: 1,
        attributes: { ...BASE_ATTRIBUTES, pop_weight: -1 },
      }),
    ];

    const { scored, issues } = scoreCells(cells, { ...NO_SCAFFOLDING, logger });

    expect(scored.map((cell) => cell.cell_id)).toEqual(['H1']);
    expect(issues).toEqual([
      {
        kind: 'value',
        layer: 'cells',
        recordId: 'H2',
        index: 1,
        message: 'pop_weight must be a number in [0, 1], got -1',
      },
    ]);
    expect(logger.entries.filter((entry) => entry.level === 'warn')).toHaveLength(1);
  });

  it('scores a blank cell from its zone defaults and reports the filled fields', () => {
    const cell = cellRecord('H1', [0, 0], { zone_id: 'Z_WEST', attributes: BLANK_ATTRIBUTES });

    const { scored, scaffoldedFields } = scoreCells([cell], WEST_DEFAULTS);

    expect(scaffoldedFields).toBe(6);
    // 1 + 0 + 1 + (1 - 0) = 3 -> HIGH; 0.6 * 0.2 + 0.4 * 0.2 = 0.2 -> LOW
    expect(scored[0].score.confidence_class).toBe('HIGH');
    expect(scored[0].score.priority_score).toBe(0.2);
    expect(scored[0].score.tierC_demand_class).toBe('LOW');
    expect(scored[0].scaffolded).toHaveLength(6);
  });

  it('reproduces the same scores on a second pass', () => {
    const cells = [cellRecord('H1', [0, 0]), cellRecord('H2', [3, 2])];
    const first = scoreCells(cells);
    const second = scoreCells(cells);
    expect(second.scored).toEqual(first.scored);
  });
});
