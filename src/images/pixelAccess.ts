import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { PixelAccess } from '../config';
import { expectBytes, expectString, type Gateway, type RemoteObject } from '../gateway/remote';
import { logger } from '../utils/logger';

/** Encoding requested from QuPath for every transport. */
export const IMAGE_FORMAT = 'imagej tiff';

export interface RegionTarget {
  gateway: Gateway;
  server: RemoteObject;
  request: RemoteObject;
}

/**
 * Moves one encoded region from QuPath to this process and hands the bytes
 * to `decode`.
 */
export interface PixelAccessAdapter {
  readonly mode: PixelAccess;
  readRegion: <T>(target: RegionTarget, decode: (bytes: Uint8Array) => Promise<T>) => Promise<T>;
}

export interface PixelAccessOptions {
  tempDir?: string;
}

const createTempFileAccess = ({ tempDir }: PixelAccessOptions): PixelAccessAdapter => ({
  mode: 'tempfile',
  async readRegion({ gateway, server, request }, decode) {
    const dir = await fs.mkdtemp(path.join(tempDir ?? os.tmpdir(), 'qupath-bridge-'));
    const filePath = path.join(dir, 'region.tif');
    try {
      await gateway.entryPoint.call('writeImageRegion', server, request, filePath);
      const bytes = await fs.readFile(filePath);
      return await decode(bytes);
    } finally {
      await fs.rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
        logger.warn({ err: error, dir }, 'Failed to remove temporary directory');
      });
    }
  },
});

const createBytesAccess = (): PixelAccessAdapter => ({
  mode: 'bytes',
  async readRegion({ gateway, server, request }, decode) {
    const value = await gateway.entryPoint.call('getImageBytes', server, request, IMAGE_FORMAT);
    return decode(expectBytes(value, 'getImageBytes()'));
  },
});

const createBase64Access = (): PixelAccessAdapter => ({
  mode: 'base64',
  async readRegion({ gateway, server, request }, decode) {
    const value = await gateway.entryPoint.call('getImageBase64', server, request, IMAGE_FORMAT);
    return decode(Buffer.from(expectString(value, 'getImageBase64()'), 'base64'));
  },
});

export const createPixelAccess = (mode: PixelAccess, options: PixelAccessOptions = {}): PixelAccessAdapter => {
  switch (mode) {
    case 'tempfile':
      return createTempFileAccess(options);
    case 'bytes':
      return createBytesAccess();
    case 'base64':
      return createBase64Access();
  }
};
