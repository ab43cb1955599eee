export const ObjectType = {
  Annotation: 'annotation',
  Detection: 'detection',
  Tile: 'tile',
  Cell: 'cell',
  TmaCore: 'tma_core',
} as const;

export type ObjectType = (typeof ObjectType)[keyof typeof ObjectType];

export type Position = number[];

export interface Point {
  type: 'Point';
  coordinates: Position;
}

export interface MultiPoint {
  type: 'MultiPoint';
  coordinates: Position[];
}

export interface LineString {
  type: 'LineString';
  coordinates: Position[];
}

export interface MultiLineString {
  type: 'MultiLineString';
  coordinates: Position[][];
}

export interface Polygon {
  type: 'Polygon';
  coordinates: Position[][];
}

export interface MultiPolygon {
  type: 'MultiPolygon';
  coordinates: Position[][][];
}

export interface GeometryCollection {
  type: 'GeometryCollection';
  geometries: Geometry[];
}

export type Geometry =
  | Point
  | MultiPoint
  | LineString
  | MultiLineString
  | Polygon
  | MultiPolygon
  | GeometryCollection;

/** Z-slice and timepoint a geometry lies on. */
export interface ImagePlane {
  z: number;
  t: number;
}

export type PlaneGeometry = Geometry & { plane?: ImagePlane };

/** RGB components in 0..255. */
export type Color = [number, number, number];

export interface Classification {
  name: string;
  color?: Color;
}
