/**
 * Record Schemas
 *
 * Zod schemas for the structural checks on layer records: identifiers,
 * enumerations and geometry shape. Attribute ranges are checked later, per
 * cell, by the scoring stage; polygon validity by the geometry validator.
 *
 * Empty strings in optional id fields read as absent, which is how blank
 * attribute-table cells arrive from desktop GIS exports.
 */

import { z } from 'zod';

// ============================================================================
// Primitives
// ============================================================================

export const IdSchema = z.string({ required_error: 'is required' }).min(1, 'must not be empty');

const blankToNull = (value: unknown): unknown =>
  value === undefined || value === '' ? null : value;

export const OptionalIdSchema = z.preprocess(blankToNull, z.string().nullable());

const PositionSchema = z
  .array(z.number().finite())
  .min(2, 'position needs at least x and y');

const RingSchema = z.array(PositionSchema);

// ============================================================================
// Geometry
// ============================================================================

export const PolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(RingSchema),
});

export const MultiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(RingSchema)),
});

export const CellGeometrySchema = z.discriminatedUnion('type', [PolygonSchema, MultiPolygonSchema]);

export const PointSchema = z.object({
  type: z.literal('Point'),
  coordinates: PositionSchema,
});

export const CorridorGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('LineString'), coordinates: z.array(PositionSchema) }),
  z.object({ type: z.literal('MultiLineString'), coordinates: z.array(z.array(PositionSchema)) }),
]);

// ============================================================================
// Layer Records
// ============================================================================

export const ZoneSchema = z.object({
  zone_id: IdSchema,
  geometry: CellGeometrySchema.nullable().default(null),
});

export const CorridorSchema = z.object({
  corridor_id: IdSchema,
  geometry: CorridorGeometrySchema.nullable().default(null),
});

export const CellSchema = z.object({
  cell_id: IdSchema,
  zone_id: IdSchema,
  geometry: CellGeometrySchema,
});

/**
 * "CANDIDATE" is the status seeded candidate sites carry; it reads as PENDING.
 * A missing status reads as PENDING too.
 */
export const SiteStatusSchema = z.preprocess(
  blankToNull,
  z
    .enum(['PENDING', 'SATISFIED', 'CANDIDATE'])
    .nullable()
    .transform((status) => (status === 'SATISFIED' ? 'SATISFIED' : 'PENDING'))
);

export const SiteSchema = z.object({
  site_id: IdSchema,
  tier: z.enum(['A', 'B']),
  zone_id: IdSchema,
  geometry: PointSchema.nullable().default(null),
  cell_id: OptionalIdSchema,
  corridor_id: OptionalIdSchema,
  notes: z.preprocess(blankToNull, z.string().nullable()),
  status: SiteStatusSchema,
  satisfied_by: OptionalIdSchema,
  satisfied_corridor_id: OptionalIdSchema,
});

export type ParsedSite = z.infer<typeof SiteSchema>;

/**
 * Flatten a zod error into "field: message" strings
 */
export function describeZodError(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'record';
    return `${path}: ${issue.message}`;
  });
}
