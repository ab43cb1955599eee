import type { ResizeMethod } from '../config';

export const PIXEL_TYPES = ['uint8', 'int8', 'uint16', 'int16', 'uint32', 'int32', 'float32', 'float64'] as const;
export type PixelType = (typeof PIXEL_TYPES)[number];

export type TypedArray =
  | Uint8Array
  | Int8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | Float32Array
  | Float64Array;

export const PIXEL_UNIT = 'pixels';
export const MICROMETER_UNIT = 'micrometer';

export interface PixelLength {
  length: number;
  unit: string;
}

export interface PixelCalibration {
  lengthX: PixelLength;
  lengthY: PixelLength;
  lengthZ: PixelLength;
}

/** Dimensions of one resolution level. */
export interface ImageShape {
  x: number;
  y: number;
  c: number;
  z: number;
  t: number;
}

export type RGB = [number, number, number];

export interface ImageChannel {
  name: string;
  /** Components in the range 0..1. */
  color: RGB;
}

export interface ImageServerMetadata {
  path: string;
  name: string;
  pixelCalibration: PixelCalibration;
  shapes: ImageShape[];
  dtype: PixelType;
  isRgb: boolean;
  channels: ImageChannel[];
}

/** Requested block in level coordinates. */
export interface BlockRequest {
  x: number;
  y: number;
  width: number;
  height: number;
  z?: number;
  t?: number;
}

export type Block = Required<BlockRequest>;

/** Pixels stored channels-last: index = (y * width + x) * channels + c. */
export interface PixelBlock {
  data: TypedArray;
  width: number;
  height: number;
  channels: number;
  dtype: PixelType;
}

export interface ImageServerOptions {
  resizeMethod?: ResizeMethod;
}

export const pixelLength = (): PixelLength => ({ length: 1, unit: PIXEL_UNIT });

export const micronLength = (length: number): PixelLength => ({ length, unit: MICROMETER_UNIT });

export const uncalibrated = (): PixelCalibration => ({
  lengthX: pixelLength(),
  lengthY: pixelLength(),
  lengthZ: pixelLength(),
});

export const isPixelType = (value: string): value is PixelType =>
  PIXEL_TYPES.some((type) => type === value);

export function pixelTypeOf(data: TypedArray): PixelType {
  if (data instanceof Uint8Array) return 'uint8';
  if (data instanceof Int8Array) return 'int8';
  if (data instanceof Uint16Array) return 'uint16';
  if (data instanceof Int16Array) return 'int16';
  if (data instanceof Uint32Array) return 'uint32';
  if (data instanceof Int32Array) return 'int32';
  if (data instanceof Float32Array) return 'float32';
  return 'float64';
}

export function allocatePixels(dtype: PixelType, length: number): TypedArray {
  switch (dtype) {
    case 'uint8':
      return new Uint8Array(length);
    case 'int8':
      return new Int8Array(length);
    case 'uint16':
      return new Uint16Array(length);
    case 'int16':
      return new Int16Array(length);
    case 'uint32':
      return new Uint32Array(length);
    case 'int32':
      return new Int32Array(length);
    case 'float32':
      return new Float32Array(length);
    case 'float64':
      return new Float64Array(length);
  }
}
