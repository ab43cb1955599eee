import {
  classificationSchema,
  colorSchema,
  geometrySchema,
  measurementsSchema,
  objectIdSchema,
  planeSchema,
  type Feature,
} from './schemas';
import type { Classification, Color, Geometry, ImagePlane, PlaneGeometry } from './types';

/** Feature keys read into dedicated fields rather than extra properties. */
const CONSUMED_KEYS = new Set([
  'geometry',
  'id',
  'classification',
  'name',
  'color',
  'measurements',
  'object_type',
  'objectType',
  'plane',
  'nucleusGeometry',
]);

export interface ImageObjectInit {
  geometry: PlaneGeometry | null;
  id?: string;
  classification?: Classification;
  name?: string;
  color?: Color;
  measurements?: Record<string, number>;
  objectType?: string;
  extraGeometries?: Record<string, PlaneGeometry>;
  extraProperties?: Record<string, unknown>;
}

/** Attaches a z/t plane to a geometry; missing indices default to 0. */
export const toGeometry = (geometry: Geometry, plane?: Partial<ImagePlane>): PlaneGeometry =>
  plane ? { ...geometry, plane: { z: plane.z ?? 0, t: plane.t ?? 0 } } : geometry;

const withoutPlane = (geometry: PlaneGeometry): Geometry => {
  const copy = { ...geometry };
  delete copy.plane;
  return copy;
};

/**
 * Looks a property up on the feature itself first, then inside its
 * `properties`.
 */
export function findProperty(feature: Feature, name: string): unknown {
  if (name in feature) {
    return feature[name];
  }
  return feature.properties?.[name];
}

const present = (value: unknown) => value !== undefined && value !== null;

/** Annotation, detection or other QuPath object held as a local value. */
export class ImageObject {
  readonly geometry: PlaneGeometry | null;
  readonly id?: string;
  readonly classification?: Classification;
  readonly name?: string;
  readonly color?: Color;
  readonly measurements: Record<string, number>;
  readonly objectType?: string;
  readonly extraGeometries: Record<string, PlaneGeometry>;
  readonly extraProperties: Record<string, unknown>;

  constructor(init: ImageObjectInit) {
    this.geometry = init.geometry;
    this.id = init.id;
    this.classification = init.classification;
    this.name = init.name;
    this.color = init.color;
    this.measurements = init.measurements ?? {};
    this.objectType = init.objectType;
    this.extraGeometries = init.extraGeometries ?? {};
    this.extraProperties = init.extraProperties ?? {};
  }

  static fromFeature(feature: Feature): ImageObject {
    const rawPlane = findProperty(feature, 'plane');
    const plane = present(rawPlane) ? planeSchema.parse(rawPlane) : undefined;

    const rawGeometry = findProperty(feature, 'geometry');
    const geometry = present(rawGeometry) ? toGeometry(geometrySchema.parse(rawGeometry), plane) : null;

    const extraGeometries: Record<string, PlaneGeometry> = {};
    const nucleus = findProperty(feature, 'nucleusGeometry');
    if (present(nucleus)) {
      extraGeometries.nucleus = toGeometry(geometrySchema.parse(nucleus), plane);
    }

    const read = <T>(name: string, parse: (value: unknown) => T): T | undefined => {
      const value = findProperty(feature, name);
      return present(value) ? parse(value) : undefined;
    };
    const objectType = read('object_type', String) ?? read('objectType', String);

    const extraProperties: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(feature.properties ?? {})) {
      if (!CONSUMED_KEYS.has(key) && present(value)) {
        extraProperties[key] = value;
      }
    }

    return new ImageObject({
      geometry,
      id: read('id', (value) => objectIdSchema.parse(value)),
      classification: read('classification', (value) => classificationSchema.parse(value)),
      name: read('name', String),
      color: read('color', (value) => colorSchema.parse(value)),
      measurements: read('measurements', (value) => measurementsSchema.parse(value)),
      objectType,
      extraGeometries,
      extraProperties,
    });
  }

  /** Feature in the shape QuPath reads back through `toPathObjects`. */
  toFeature(): Feature {
    const properties: Record<string, unknown> = { ...this.extraProperties };
    if (this.objectType !== undefined) properties.objectType = this.objectType;
    if (this.classification !== undefined) properties.classification = this.classification;
    if (this.name !== undefined) properties.name = this.name;
    if (this.color !== undefined) properties.color = this.color;
    properties.measurements = this.measurements;

    const plane = this.geometry?.plane;
    if (plane) properties.plane = plane;
    const nucleus = this.extraGeometries.nucleus;
    if (nucleus) properties.nucleusGeometry = withoutPlane(nucleus);

    const feature: Feature = {
      type: 'Feature',
      geometry: this.geometry ? withoutPlane(this.geometry) : null,
      properties,
    };
    if (this.id !== undefined) feature.id = this.id;
    return feature;
  }
}
