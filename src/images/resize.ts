import type { ResizeMethod } from '../config';
import { allocatePixels, type PixelBlock } from './types';

const isIntegral = (block: PixelBlock) => block.dtype !== 'float32' && block.dtype !== 'float64';

/**
 * Nearest-neighbour resize of a channels-last block. Each target pixel takes
 * the source pixel whose area contains the target pixel's top-left corner.
 */
export function resizeNearest(block: PixelBlock, width: number, height: number): PixelBlock {
  const { data: source, width: srcW, height: srcH, channels } = block;
  const result = allocatePixels(block.dtype, width * height * channels);
  const scaleX = srcW / width;
  const scaleY = srcH / height;

  for (let ty = 0; ty < height; ty++) {
    const sy = Math.min(Math.floor(ty * scaleY), srcH - 1);
    for (let tx = 0; tx < width; tx++) {
      const sx = Math.min(Math.floor(tx * scaleX), srcW - 1);
      const srcIdx = (sy * srcW + sx) * channels;
      const tgtIdx = (ty * width + tx) * channels;
      for (let c = 0; c < channels; c++) {
        result[tgtIdx + c] = source[srcIdx + c];
      }
    }
  }

  return { ...block, data: result, width, height };
}

/**
 * Bilinear resize using pixel-centre alignment, with edges clamped.
 * Integer pixel types are rounded to the nearest value.
 */
export function resizeBilinear(block: PixelBlock, width: number, height: number): PixelBlock {
  const { data: source, width: srcW, height: srcH, channels } = block;
  const result = allocatePixels(block.dtype, width * height * channels);
  const round = isIntegral(block);
  const scaleX = srcW / width;
  const scaleY = srcH / height;

  for (let ty = 0; ty < height; ty++) {
    const srcYf = Math.min(Math.max((ty + 0.5) * scaleY - 0.5, 0), srcH - 1);
    const sy0 = Math.floor(srcYf);
    const sy1 = Math.min(sy0 + 1, srcH - 1);
    const yFrac = srcYf - sy0;

    for (let tx = 0; tx < width; tx++) {
      const srcXf = Math.min(Math.max((tx + 0.5) * scaleX - 0.5, 0), srcW - 1);
      const sx0 = Math.floor(srcXf);
      const sx1 = Math.min(sx0 + 1, srcW - 1);
      const xFrac = srcXf - sx0;
      const tgtIdx = (ty * width + tx) * channels;

      for (let c = 0; c < channels; c++) {
        const c00 = source[(sy0 * srcW + sx0) * channels + c];
        const c01 = source[(sy0 * srcW + sx1) * channels + c];
        const c10 = source[(sy1 * srcW + sx0) * channels + c];
        const c11 = source[(sy1 * srcW + sx1) * channels + c];
        const top = c00 + (c01 - c00) * xFrac;
        const bottom = c10 + (c11 - c10) * xFrac;
        const value = top + (bottom - top) * yFrac;
        result[tgtIdx + c] = round ? Math.round(value) : value;
      }
    }
  }

  return { ...block, data: result, width, height };
}

export function resizeBlock(block: PixelBlock, width: number, height: number, method: ResizeMethod): PixelBlock {
  return method === 'nearest'
    ? resizeNearest(block, width, height)
    : resizeBilinear(block, width, height);
}
