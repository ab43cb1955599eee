import { loadConfig, type PixelAccess } from '../config';
import { GatewayConfigurationError, GatewayProtocolError } from '../errors';
import { resolveServer, type RemoteInput } from '../gateway/resolve';
import {
  asDouble,
  callBoolean,
  callElements,
  callNumber,
  callObject,
  callString,
  expectNumber,
  expectObject,
  isRemoteObject,
  optionalNumber,
  optionalString,
  releaseHandles,
  type Gateway,
  type RemoteObject,
} from '../gateway/remote';
import { gatewayOrDefault } from '../gateway/session';
import { logger } from '../utils/logger';
import { decodeImage, decodeVolume } from './decode';
import { ImageServer, resolveLevel, validateBlock } from './imageServer';
import { createPixelAccess, type PixelAccessAdapter } from './pixelAccess';
import { resizeBlock } from './resize';
import {
  isPixelType,
  micronLength,
  pixelLength,
  uncalibrated,
  type BlockRequest,
  type ImageChannel,
  type ImageServerMetadata,
  type ImageServerOptions,
  type ImageShape,
  type PixelBlock,
  type PixelCalibration,
  type RGB,
} from './types';

const REGION_REQUEST_CLASS = 'qupath.lib.regions.RegionRequest';
const WHITE = 0xffffff;

export interface QuPathServerOptions extends ImageServerOptions {
  gateway?: Gateway;
  /** Remote `ImageServer`; the server of the image open in QuPath when omitted. */
  serverObject?: RemoteObject;
  /**
   * How pixels travel from QuPath. `base64` tends to be faster than `bytes`;
   * `tempfile` is usually fastest but writes to disk.
   */
  pixelAccess?: PixelAccess;
  tempDir?: string;
}

/** Unpacks a packed 0xRRGGBB integer into components in 0..1. */
export const unpackColor = (rgb: number): RGB => [
  ((rgb >> 16) & 255) / 255,
  ((rgb >> 8) & 255) / 255,
  (rgb & 255) / 255,
];

/** Rounds to the nearest integer, ties to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function filePathFromUri(uri: string): string | null {
  if (!URL.canParse(uri)) return null;
  const url = new URL(uri);
  return url.protocol === 'file:' ? decodeURIComponent(url.pathname) : null;
}

const describeShape = (block: PixelBlock) => `(${block.height}, ${block.width}, ${block.channels})`;

async function findServerFilePath(server: RemoteObject): Promise<string | null> {
  const handles = await callElements(server, 'getURIs');
  const uris: string[] = [];
  try {
    for (const uri of handles) {
      uris.push(isRemoteObject(uri) ? await callString(uri, 'toString') : String(uri));
    }
  } finally {
    await releaseHandles(...handles);
  }
  return uris.length === 1 ? filePathFromUri(uris[0]) : null;
}

async function readCalibration(calibration: RemoteObject): Promise<PixelCalibration> {
  if (!(await callBoolean(calibration, 'hasPixelSizeMicrons'))) {
    return uncalibrated();
  }
  const zSpacing = optionalNumber(await calibration.call('getZSpacingMicrons'), 'getZSpacingMicrons()');
  return {
    lengthX: micronLength(await callNumber(calibration, 'getPixelWidthMicrons')),
    lengthY: micronLength(await callNumber(calibration, 'getPixelHeightMicrons')),
    lengthZ: zSpacing !== null && Number.isFinite(zSpacing) && zSpacing > 0 ? micronLength(zSpacing) : pixelLength(),
  };
}

async function readChannels(metadata: RemoteObject): Promise<ImageChannel[]> {
  const channels: ImageChannel[] = [];
  const items = await callElements(metadata, 'getChannels');
  try {
    for (const item of items) {
      const channel = expectObject(item, 'getChannels()');
      const color = optionalNumber(await channel.call('getColor'), 'getColor()');
      channels.push({
        name: await callString(channel, 'getName'),
        color: unpackColor(color ?? WHITE),
      });
    }
  } finally {
    await releaseHandles(...items);
  }
  return channels;
}

/**
 * Image server backed by an `ImageServer` living in QuPath. Every block read
 * builds a `RegionRequest` remotely and pulls the encoded pixels across the
 * gateway.
 */
export class QuPathServer extends ImageServer {
  private constructor(
    readonly gateway: Gateway,
    readonly serverObject: RemoteObject,
    private readonly pixelAccess: PixelAccessAdapter,
    options: ImageServerOptions,
  ) {
    super(options);
  }

  static async create(options: QuPathServerOptions = {}): Promise<QuPathServer> {
    const config = loadConfig();
    const gateway = await gatewayOrDefault(options.gateway);
    const serverObject = options.serverObject ?? (await resolveServer(undefined, gateway));
    if (!serverObject) {
      throw new GatewayConfigurationError('No image server is available; open an image in QuPath first');
    }
    const pixelAccess = createPixelAccess(options.pixelAccess ?? config.pixelAccess, {
      tempDir: options.tempDir ?? config.tempDir,
    });
    return new QuPathServer(gateway, serverObject, pixelAccess, {
      resizeMethod: options.resizeMethod ?? config.resizeMethod,
    });
  }

  get pixelAccessMode(): PixelAccess {
    return this.pixelAccess.mode;
  }

  protected async buildMetadata(): Promise<ImageServerMetadata> {
    const server = this.serverObject;
    this.preferredDownsamples = (await callElements(server, 'getPreferredDownsamples'))
      .map((value) => expectNumber(value, 'getPreferredDownsamples()'));

    const nChannels = await callNumber(server, 'nChannels');
    const nZSlices = await callNumber(server, 'nZSlices');
    const nTimepoints = await callNumber(server, 'nTimepoints');
    const metadata = await callObject(server, 'getMetadata');
    try {
      const shapes: ImageShape[] = [];
      const levels = await callElements(metadata, 'getLevels');
      try {
        for (const item of levels) {
          const level = expectObject(item, 'getLevels()');
          shapes.push({
            x: await callNumber(level, 'getWidth'),
            y: await callNumber(level, 'getHeight'),
            c: nChannels,
            z: nZSlices,
            t: nTimepoints,
          });
        }
      } finally {
        await releaseHandles(...levels);
      }

      const pixelType = await callObject(server, 'getPixelType');
      const dtype = (await callString(pixelType, 'toString').finally(() => releaseHandles(pixelType))).toLowerCase();
      if (!isPixelType(dtype)) {
        throw new GatewayProtocolError(`Unsupported pixel type '${dtype}'`);
      }
      const isRgb = await callBoolean(server, 'isRGB');
      const name = optionalString(await metadata.call('getName'), 'getName()');
      const calibration = await callObject(server, 'getPixelCalibration');
      const pixelCalibration = await readCalibration(calibration).finally(() => releaseHandles(calibration));
      const channels = await readChannels(metadata);
      const path = (await findServerFilePath(server)) ?? (await callString(server, 'getPath'));

      return {
        path,
        name: name ?? path,
        pixelCalibration,
        shapes,
        dtype,
        isRgb,
        channels,
      };
    } finally {
      await releaseHandles(metadata);
    }
  }

  async readBlock(level: number, request: BlockRequest): Promise<PixelBlock> {
    const { x, y, width, height, z, t } = validateBlock(request);
    const metadata = await this.getMetadata();
    const resolvedLevel = resolveLevel(level, (await this.getDownsamples()).length);
    const server = this.serverObject;

    // Scale first, then round, so regions line up with QuPath's own tiling.
    const downsample = await callNumber(server, 'getDownsampleForResolution', resolvedLevel);
    const scale = (value: number) => roundHalfEven(value * downsample);
    const regionRequest = expectObject(
      await this.gateway.callStatic(
        REGION_REQUEST_CLASS,
        'createInstance',
        await callString(server, 'getPath'),
        asDouble(downsample),
        scale(x),
        scale(y),
        scale(width),
        scale(height),
        z,
        t,
      ),
      'RegionRequest.createInstance()',
    );

    const started = Date.now();
    const singlePlane = metadata.isRgb || metadata.shapes[0].c === 1;
    let block: PixelBlock;
    try {
      block = await this.pixelAccess.readRegion(
        { gateway: this.gateway, server, request: regionRequest },
        singlePlane ? decodeImage : decodeVolume,
      );
    } finally {
      await releaseHandles(regionRequest);
    }
    logger.debug({ level: resolvedLevel, x, y, width, height, mode: this.pixelAccess.mode, ms: Date.now() - started }, 'block read');

    if (block.height !== height || block.width !== width) {
      const before = describeShape(block);
      block = resizeBlock(block, width, height, this.resizeMethod);
      logger.warn(`Block needs to be reshaped from ${before} to ${describeShape(block)}`);
    }
    return block;
  }
}

/**
 * Returns `input` when it already is an image server, otherwise wraps the
 * remote server found from `input` (or the current image).
 */
export async function getServer(
  input?: ImageServer | RemoteInput,
  options: Omit<QuPathServerOptions, 'serverObject'> = {},
): Promise<ImageServer | null> {
  if (input instanceof ImageServer) {
    return input;
  }
  const gateway = await gatewayOrDefault(input, options.gateway);
  const serverObject = await resolveServer(input, gateway);
  return serverObject ? QuPathServer.create({ ...options, gateway, serverObject }) : null;
}
