/**
 * GeoJSON Layer I/O
 *
 * Reads a layer file (a GeoJSON FeatureCollection) into raw records and writes
 * results back as the same document with only the changed properties
 * overlaid. Unknown top-level and feature members are carried through.
 *
 * A file that cannot be read, is not JSON, or is not a FeatureCollection is
 * the one fatal input condition: LayerReadError.
 *
 * @module io/geojson-layers
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { LayerReadError } from '../core/errors.js';
import type { LayerName, RawRecord, ScoredCell } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import type { SatisfactionPatch } from '../coverage/coverage-satisfier.js';
import { describeZodError } from '../validation/record-schemas.js';

const FeatureSchema = z
  .object({
    type: z.literal('Feature'),
    properties: z.record(z.unknown()).nullable().default(null),
    geometry: z.unknown(),
  })
  .passthrough();

const FeatureCollectionSchema = z
  .object({
    type: z.literal('FeatureCollection'),
    features: z.array(FeatureSchema),
  })
  .passthrough();

export type LayerFeature = z.infer<typeof FeatureSchema>;
export type LayerCollection = z.infer<typeof FeatureCollectionSchema>;

export interface LayerDocument {
  readonly layer: LayerName;
  readonly path: string;
  readonly collection: LayerCollection;
  /** Serialized form as it would be written back unchanged */
  readonly serialized: string;
}

export function serializeCollection(collection: LayerCollection): string {
  return `${JSON.stringify(collection, null, 2)}\n`;
}

/**
 * Parse layer text. Exported separately so callers holding text in memory
 * skip the file system.
 */
export function parseLayer(layer: LayerName, path: string, text: string): LayerDocument {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new LayerReadError(`${path} is not valid JSON`, layer, path, { cause: error });
  }

  const result = FeatureCollectionSchema.safeParse(json);
  if (!result.success) {
    throw new LayerReadError(
      `${path} is not a GeoJSON FeatureCollection: ${describeZodError(result.error).slice(0, 3).join('; ')}`,
      layer,
      path
    );
  }

  return {
    layer,
    path,
    collection: result.data,
    serialized: serializeCollection(result.data),
  };
}

export async function readLayer(layer: LayerName, path: string): Promise<LayerDocument> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LayerReadError(`cannot read ${path}: ${reason}`, layer, path, { cause: error });
  }
  return parseLayer(layer, path, text);
}

/**
 * Feature properties flattened into a record, with the geometry alongside
 */
export function featureToRecord(feature: LayerFeature): RawRecord {
  return { ...(feature.properties ?? {}), geometry: feature.geometry };
}

export function layerRecords(document: LayerDocument): RawRecord[] {
  return document.collection.features.map(featureToRecord);
}

// ============================================================================
// Write-back
// ============================================================================

function overlayProperties(
  collection: LayerCollection,
  overlays: ReadonlyMap<number, Readonly<Record<string, unknown>>>
): LayerCollection {
  return {
    ...collection,
    features: collection.features.map((feature, index) => {
      const overlay = overlays.get(index);
      if (!overlay) return feature;
      return { ...feature, properties: { ...(feature.properties ?? {}), ...overlay } };
    }),
  };
}

/**
 * Cells with their scaffolded inputs and derived fields written in
 */
export function applyCellScores(
  collection: LayerCollection,
  scored: readonly ScoredCell[]
): LayerCollection {
  const overlays = new Map<number, Record<string, unknown>>();
  for (const cell of scored) {
    const filled: Record<string, unknown> = {};
    for (const name of cell.scaffolded) {
      filled[name] = cell.attributes[name];
    }
    overlays.set(cell.index, { ...filled, ...cell.score });
  }
  return overlayProperties(collection, overlays);
}

/**
 * Sites with satisfaction fields written in. Untouched sites are carried
 * through as read.
 */
export function applySitePatches(
  collection: LayerCollection,
  patches: readonly SatisfactionPatch[]
): LayerCollection {
  const overlays = new Map<number, Record<string, unknown>>();
  for (const patch of patches) {
    overlays.set(patch.index, {
      status: patch.status,
      satisfied_by: patch.satisfied_by,
      satisfied_corridor_id: patch.satisfied_corridor_id,
    });
  }
  return overlayProperties(collection, overlays);
}

/**
 * Write the collection if it differs from what was read.
 *
 * @returns whether the file was written
 */
export async function writeLayerIfChanged(
  document: LayerDocument,
  collection: LayerCollection
): Promise<boolean> {
  const serialized = serializeCollection(collection);
  if (serialized === document.serialized) {
    return false;
  }
  await atomicWriteFile(document.path, serialized);
  return true;
}
