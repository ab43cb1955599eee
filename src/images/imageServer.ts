import type { ResizeMethod } from '../config';
import { InvalidBlockError } from '../errors';
import type {
  Block,
  BlockRequest,
  ImageServerMetadata,
  ImageServerOptions,
  PixelBlock,
} from './types';

const isNonNegativeInteger = (value: number) => Number.isInteger(value) && value >= 0;

/**
 * Checks a block request and fills in the plane defaults. Width and height
 * must be at least one pixel.
 */
export function validateBlock(request: BlockRequest): Block {
  const block: Block = { ...request, z: request.z ?? 0, t: request.t ?? 0 };
  for (const key of ['x', 'y', 'z', 't'] as const) {
    if (!isNonNegativeInteger(block[key])) {
      throw new InvalidBlockError(`Block ${key} must be a non-negative integer, got ${block[key]}`);
    }
  }
  for (const key of ['width', 'height'] as const) {
    if (!Number.isInteger(block[key]) || block[key] < 1) {
      throw new InvalidBlockError(`Block ${key} must be a positive integer, got ${block[key]}`);
    }
  }
  return block;
}

/** Maps a possibly negative level index onto `[0, nLevels)`. */
export function resolveLevel(level: number, nLevels: number): number {
  if (!Number.isInteger(level) || level < -nLevels || level >= nLevels) {
    throw new InvalidBlockError(`Level ${level} is out of range for an image with ${nLevels} levels`);
  }
  return level < 0 ? nLevels + level : level;
}

/**
 * Multi-resolution image read block by block. Subclasses describe the image
 * once through `buildMetadata` and serve pixels through `readBlock`.
 */
export abstract class ImageServer {
  readonly resizeMethod: ResizeMethod;
  /** Set by subclasses that know their downsamples better than the level shapes do. */
  protected preferredDownsamples?: number[];
  private metadataPromise?: Promise<ImageServerMetadata>;

  protected constructor(options: ImageServerOptions = {}) {
    this.resizeMethod = options.resizeMethod ?? 'bilinear';
  }

  protected abstract buildMetadata(): Promise<ImageServerMetadata>;

  /** Reads `block` from `level`; negative levels count from the lowest resolution. */
  abstract readBlock(level: number, block: BlockRequest): Promise<PixelBlock>;

  getMetadata(): Promise<ImageServerMetadata> {
    if (!this.metadataPromise) {
      this.metadataPromise = this.buildMetadata().catch((error: unknown) => {
        this.metadataPromise = undefined;
        throw error;
      });
    }
    return this.metadataPromise;
  }

  async getDownsamples(): Promise<number[]> {
    const { shapes } = await this.getMetadata();
    if (this.preferredDownsamples?.length) {
      return [...this.preferredDownsamples];
    }
    const fullWidth = shapes[0].x;
    const fullHeight = shapes[0].y;
    return shapes.map((shape) => (fullWidth / shape.x + fullHeight / shape.y) / 2);
  }

  async getLevelCount() {
    return (await this.getMetadata()).shapes.length;
  }

  async getChannelCount() {
    return (await this.getMetadata()).shapes[0].c;
  }
}
