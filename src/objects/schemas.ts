import { z } from 'zod';
import type { Classification, Color, Geometry } from './types';

const position = z.array(z.number());

export const geometrySchema: z.ZodType<Geometry> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('Point'), coordinates: position }),
    z.object({ type: z.literal('MultiPoint'), coordinates: z.array(position) }),
    z.object({ type: z.literal('LineString'), coordinates: z.array(position) }),
    z.object({ type: z.literal('MultiLineString'), coordinates: z.array(z.array(position)) }),
    z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(position)) }),
    z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(z.array(position))) }),
    z.object({ type: z.literal('GeometryCollection'), geometries: z.array(geometrySchema) }),
  ]),
);

export const featureSchema = z
  .object({
    type: z.literal('Feature'),
    id: z.union([z.string(), z.number()]).optional(),
    geometry: geometrySchema.nullable(),
    properties: z.record(z.string(), z.unknown()).nullable(),
  })
  .passthrough();

export type Feature = z.infer<typeof featureSchema>;

export const featureCollectionSchema = z
  .object({
    type: z.literal('FeatureCollection'),
    features: z.array(featureSchema),
  })
  .passthrough();

export type FeatureCollection = z.infer<typeof featureCollectionSchema>;

/** A collection, a bare list, or a single feature, flattened to a list. */
export const featureListSchema = z.union([
  featureCollectionSchema.transform((collection): Feature[] => collection.features),
  z.array(featureSchema),
  featureSchema.transform((feature): Feature[] => [feature]),
]);

export const colorSchema: z.ZodType<Color, z.ZodTypeDef, unknown> = z.union([
  z.tuple([z.number(), z.number(), z.number()]),
  z.number().int().transform((packed): Color => [(packed >> 16) & 255, (packed >> 8) & 255, packed & 255]),
]);

export const classificationSchema: z.ZodType<Classification, z.ZodTypeDef, unknown> = z.union([
  z.string().transform((name): Classification => ({ name })),
  z.object({ name: z.string(), color: colorSchema.optional() }),
  z
    .object({ names: z.array(z.string()).min(1), color: colorSchema.optional() })
    .transform(({ names, color }): Classification => ({ name: names.join(': '), color })),
]);

const measurementValue = z.union([z.number(), z.nan(), z.null().transform(() => NaN)]);

export const measurementsSchema: z.ZodType<Record<string, number>, z.ZodTypeDef, unknown> = z.union([
  z.record(z.string(), measurementValue),
  z
    .array(z.object({ name: z.string(), value: measurementValue }))
    .transform((entries) => Object.fromEntries(entries.map(({ name, value }) => [name, value]))),
]);

export const planeSchema = z
  .object({
    z: z.number().int().optional(),
    t: z.number().int().optional(),
  })
  .passthrough();

export const objectIdSchema = z.union([z.string(), z.number().transform(String)]);
