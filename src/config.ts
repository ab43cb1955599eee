import 'dotenv/config';
import { z } from 'zod';
import { GatewayConfigurationError } from './errors';

export const PIXEL_ACCESS_MODES = ['base64', 'bytes', 'tempfile'] as const;
export type PixelAccess = (typeof PIXEL_ACCESS_MODES)[number];

export const RESIZE_METHODS = ['nearest', 'bilinear'] as const;
export type ResizeMethod = (typeof RESIZE_METHODS)[number];

export const DEFAULT_GATEWAY_PORT = 25333;

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  QUPATH_GATEWAY_HOST: z.string().min(1).default('127.0.0.1'),
  QUPATH_GATEWAY_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_GATEWAY_PORT),
  QUPATH_GATEWAY_TOKEN: optionalText,
  QUPATH_PIXEL_ACCESS: z.enum(PIXEL_ACCESS_MODES).default('base64'),
  QUPATH_RESIZE_METHOD: z.enum(RESIZE_METHODS).default('bilinear'),
  QUPATH_TEMP_DIR: optionalText,
});

export interface BridgeConfig {
  gateway: {
    host: string;
    port: number;
    authToken?: string;
  };
  pixelAccess: PixelAccess;
  resizeMethod: ResizeMethod;
  tempDir?: string;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): BridgeConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new GatewayConfigurationError(`Invalid configuration (${issues.join('; ')})`);
  }
  const values = parsed.data;
  return {
    gateway: {
      host: values.QUPATH_GATEWAY_HOST,
      port: values.QUPATH_GATEWAY_PORT,
      authToken: values.QUPATH_GATEWAY_TOKEN,
    },
    pixelAccess: values.QUPATH_PIXEL_ACCESS,
    resizeMethod: values.QUPATH_RESIZE_METHOD,
    tempDir: values.QUPATH_TEMP_DIR,
  };
};
