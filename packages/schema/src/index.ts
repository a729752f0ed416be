import { z } from 'zod';

// [lon, lat] in degrees; extra dimensions (elevation etc.) ride along untouched.
export const Position = z.tuple([z.number(), z.number()]).rest(z.number());
export type Position = z.infer<typeof Position>;

export const PointGeometry = z.object({ type: z.literal('Point'), coordinates: Position });
export const MultiPointGeometry = z.object({ type: z.literal('MultiPoint'), coordinates: z.array(Position) });
export const LineStringGeometry = z.object({ type: z.literal('LineString'), coordinates: z.array(Position) });
export const MultiLineStringGeometry = z.object({ type: z.literal('MultiLineString'), coordinates: z.array(z.array(Position)) });
export const PolygonGeometry = z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(Position)) });
export const MultiPolygonGeometry = z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(z.array(Position))) });

export const FireGeometry = z.discriminatedUnion('type', [
  PointGeometry,
  MultiPointGeometry,
  LineStringGeometry,
  MultiLineStringGeometry,
  PolygonGeometry,
  MultiPolygonGeometry
]);
export type FireGeometry = z.infer<typeof FireGeometry>;

const entityId = z.union([z.string(), z.number()]).transform(v => String(v));

const text = z.unknown().transform((v): string | undefined => (typeof v === 'string' && v !== '' ? v : undefined));

// undefined = absent, null = present but not a number
const measurement = z.unknown().transform((v): number | null | undefined => {
  if (v === undefined || v === null || v === '') return undefined;
  const n = typeof v === 'number' ? v : typeof v === 'string' ? Number(v) : NaN;
  return Number.isFinite(n) ? n : null;
});

const epochSeconds = z.number().finite().optional().catch(undefined);

export const FireProperties = z.object({
  id_fire_event: entityId.optional().catch(undefined),
  frp: measurement,
  fros: measurement,
  duration: z.union([z.number(), z.string()]).optional().catch(undefined),
  time_floor: text,
  time: text,
  timestamp: text,
  time_min: text,
  time_max: text,
  time_min_ts: epochSeconds,
  time_max_ts: epochSeconds
});
export type FireProperties = z.infer<typeof FireProperties>;

export const SourceFeature = z.object({
  type: z.string().optional(),
  properties: FireProperties.catch({}),
  geometry: FireGeometry.nullable().catch(null)
});
export type SourceFeature = z.infer<typeof SourceFeature>;

export const SourceCollection = z.object({
  type: z.string().optional(),
  crs: z.unknown().optional(),
  features: z.array(z.unknown()).default([])
});
export type SourceCollection = z.infer<typeof SourceCollection>;

export const StatsRow = z.object({
  properties: z.object({
    fire_event_id: entityId.optional().catch(undefined),
    id_fire_event: entityId.optional().catch(undefined),
    time_start: text,
    time_end: text
  }).catch({})
});
export type StatsRow = z.infer<typeof StatsRow>;

export const TippecanoeHint = z.object({
  minzoom: z.number().int(),
  maxzoom: z.number().int().optional()
});
export type TippecanoeHint = z.infer<typeof TippecanoeHint>;

export const RawProperties = z.object({
  id_fire_event: z.string(),
  frp: z.number().optional(),
  fros: z.number().optional(),
  duration: z.union([z.number(), z.string()]).optional(),
  time: z.string().optional(),
  timestamp: z.string().optional(),
  time_ts: z.number().optional(),
  day_start_ts: z.number().optional(),
  day_end_ts: z.number().optional(),
  time_min: z.string().optional(),
  time_max: z.string().optional(),
  time_min_ts: z.number().optional(),
  time_max_ts: z.number().optional(),
  tippecanoe: TippecanoeHint.optional()
});
export type RawProperties = z.infer<typeof RawProperties>;

export const HexProperties = z.object({
  cell: z.string(),
  res: z.number().int(),
  count: z.number().int(),
  frp_sum: z.number(),
  frp_max: z.number(),
  frp_avg: z.number(),
  fre_sum_mj: z.number(),
  fre_mean_mj: z.number(),
  last_time: z.string().nullable(),
  time_min: z.string(),
  time_max: z.string(),
  time_min_ts: z.number(),
  time_max_ts: z.number(),
  day_start_ts: z.number(),
  day_end_ts: z.number(),
  day_label: z.string(),
  fros_sum: z.number(),
  fros_max: z.number().nullable(),
  fros_avg: z.number().nullable(),
  fros_count: z.number().int(),
  tippecanoe: TippecanoeHint
});
export type HexProperties = z.infer<typeof HexProperties>;

export const HexRecord = z.object({
  type: z.literal('Feature'),
  properties: HexProperties,
  geometry: PolygonGeometry
});
export type HexRecord = z.infer<typeof HexRecord>;
