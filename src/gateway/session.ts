import { loadConfig } from '../config';
import { GatewayConfigurationError } from '../errors';
import { logger } from '../utils/logger';
import { GatewayClient } from './client';
import { isGateway, type Gateway } from './remote';

/**
 * Gateway used when a call does not name one. This is plain module state
 * owned by whoever sets it; code that talks to several QuPath instances, or
 * from concurrent tasks, should pass a gateway explicitly instead.
 */
let defaultGateway: Gateway | undefined;

export interface CreateGatewayOptions {
  host?: string;
  port?: number;
  authToken?: string;
  setAsDefault?: boolean;
}

/**
 * Connects to QuPath. The Py4J gateway must already be running from
 * inside QuPath.
 */
export async function createGateway(options: CreateGatewayOptions = {}): Promise<Gateway> {
  const { gateway: defaults } = loadConfig();
  const gateway = await GatewayClient.connect({
    host: options.host ?? defaults.host,
    port: options.port ?? defaults.port,
    authToken: options.authToken ?? defaults.authToken,
  });
  if (options.setAsDefault ?? true) {
    setDefaultGateway(gateway);
  }
  return gateway;
}

export function setDefaultGateway(gateway?: Gateway) {
  defaultGateway = gateway;
}

export function getDefaultGateway(): Gateway | undefined {
  return defaultGateway;
}

/**
 * Returns the first candidate that is a gateway, then the default gateway,
 * and creates a new one as a last resort.
 */
export async function gatewayOrDefault(...candidates: unknown[]): Promise<Gateway> {
  for (const candidate of candidates) {
    if (isGateway(candidate)) {
      return candidate;
    }
  }
  if (defaultGateway) {
    return defaultGateway;
  }
  logger.warn('Attempting to create new gateway');
  try {
    return await createGateway();
  } catch (error) {
    throw new GatewayConfigurationError('A gateway is needed! See createGateway() for details.', { cause: error });
  }
}
