/**
 * Cell attribute checks and zone-default scaffolding.
 *
 * Blank inputs (absent, null or "") may be filled from zone defaults. Present
 * values, an explicit 0 included, are kept as they are and range-checked;
 * nothing out of range is coerced.
 *
 * @module scoring/attributes
 */

import {
  FLAG_ATTRIBUTES,
  WEIGHT_ATTRIBUTES,
  type CellAttributeName,
  type CellAttributes,
} from '../core/types.js';
import { isBinaryFlag } from './cell-classifier.js';
import { isUnitWeight } from './demand-resolver.js';

export type AttributeValues = Readonly<Record<CellAttributeName, unknown>>;

export type ZoneDefaults = Partial<CellAttributes>;

export interface ScaffoldOptions {
  /** Defaults keyed by zone_id */
  readonly zoneDefaults: Readonly<Record<string, ZoneDefaults>>;
  /** Used for zones with no entry in zoneDefaults */
  readonly fallbackDefaults: ZoneDefaults | null;
}

export interface ScaffoldResult {
  readonly values: AttributeValues;
  readonly filled: readonly CellAttributeName[];
}

export type AttributeParseResult =
  | { readonly success: true; readonly data: CellAttributes }
  | { readonly success: false; readonly errors: readonly string[] };

const ALL_ATTRIBUTES: readonly CellAttributeName[] = [...FLAG_ATTRIBUTES, ...WEIGHT_ATTRIBUTES];

export function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Fill blank attributes from the zone's defaults, else the fallback defaults
 */
export function scaffoldAttributes(
  zoneId: string,
  values: AttributeValues,
  options: ScaffoldOptions
): ScaffoldResult {
  const defaults = options.zoneDefaults[zoneId] ?? options.fallbackDefaults;
  if (!defaults) {
    return { values, filled: [] };
  }

  const next: Record<CellAttributeName, unknown> = { ...values };
  const filled: CellAttributeName[] = [];

  for (const name of ALL_ATTRIBUTES) {
    const fallback = defaults[name];
    if (isBlank(values[name]) && fallback !== undefined) {
      next[name] = fallback;
      filled.push(name);
    }
  }

  return { values: next, filled };
}

/**
 * Check all six attributes. Every problem is reported, not just the first.
 */
export function parseCellAttributes(values: AttributeValues): AttributeParseResult {
  const errors: string[] = [];

  for (const name of FLAG_ATTRIBUTES) {
    const value = values[name];
    if (isBlank(value)) {
      errors.push(`${name} is missing`);
    } else if (!isBinaryFlag(value)) {
      errors.push(`${name} must be 0 or 1, got ${JSON.stringify(value)}`);
    }
  }

  for (const name of WEIGHT_ATTRIBUTES) {
    const value = values[name];
    if (isBlank(value)) {
      errors.push(`${name} is missing`);
    } else if (!isUnitWeight(value)) {
      errors.push(`${name} must be a number in [0, 1], got ${JSON.stringify(value)}`);
    }
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }

  const flag = (name: (typeof FLAG_ATTRIBUTES)[number]): 0 | 1 => {
    const value = values[name];
    return isBinaryFlag(value) ? value : 0;
  };
  const weight = (name: (typeof WEIGHT_ATTRIBUTES)[number]): number => {
    const value = values[name];
    return isUnitWeight(value) ? value : 0;
  };

  return {
    success: true,
    data: {
      elev_adv_avail: flag('elev_adv_avail'),
      tall_struct_avail: flag('tall_struct_avail'),
      backbone_los_likely: flag('backbone_los_likely'),
      clutter_high: flag('clutter_high'),
      pop_weight: weight('pop_weight'),
      critical_weight: weight('critical_weight'),
    },
  };
}
