import { fromArrayBuffer, type GeoTIFFImage } from 'geotiff';
import { GatewayProtocolError } from '../errors';
import { allocatePixels, pixelTypeOf, type PixelBlock, type TypedArray } from './types';

type Raster = TypedArray | Uint8ClampedArray;

const toArrayBuffer = (bytes: Uint8Array) => {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};

const normalizeRaster = (raster: Raster): TypedArray =>
  raster instanceof Uint8ClampedArray ? new Uint8Array(raster) : raster;

async function readInterleaved(image: GeoTIFFImage): Promise<TypedArray> {
  const raster = await image.readRasters({ interleave: true });
  if (Array.isArray(raster)) {
    throw new GatewayProtocolError('Expected an interleaved raster from the TIFF decoder');
  }
  return normalizeRaster(raster);
}

/**
 * Decodes a single-plane image (grayscale or RGB) into a channels-last block.
 */
export async function decodeImage(bytes: Uint8Array): Promise<PixelBlock> {
  const tiff = await fromArrayBuffer(toArrayBuffer(bytes));
  const image = await tiff.getImage(0);
  const data = await readInterleaved(image);
  return {
    data,
    width: image.getWidth(),
    height: image.getHeight(),
    channels: image.getSamplesPerPixel(),
    dtype: pixelTypeOf(data),
  };
}

/**
 * Decodes a multi-plane ImageJ TIFF, one plane per channel, moving the plane
 * axis last.
 */
export async function decodeVolume(bytes: Uint8Array): Promise<PixelBlock> {
  const tiff = await fromArrayBuffer(toArrayBuffer(bytes));
  const count = await tiff.getImageCount();
  const planes: TypedArray[] = [];
  let width = 0;
  let height = 0;
  for (let i = 0; i < count; i++) {
    const image = await tiff.getImage(i);
    if (i === 0) {
      width = image.getWidth();
      height = image.getHeight();
    } else if (image.getWidth() !== width || image.getHeight() !== height) {
      throw new GatewayProtocolError(`TIFF plane ${i} is ${image.getWidth()}x${image.getHeight()}, expected ${width}x${height}`);
    }
    planes.push(await readInterleaved(image));
  }
  if (planes.length === 0) {
    throw new GatewayProtocolError('TIFF contains no image planes');
  }

  const dtype = pixelTypeOf(planes[0]);
  const pixels = width * height;
  const channels = planes.length;
  const data = allocatePixels(dtype, pixels * channels);
  planes.forEach((plane, c) => {
    for (let i = 0; i < pixels; i++) {
      data[i * channels + c] = plane[i];
    }
  });
  return { data, width, height, channels, dtype };
}
