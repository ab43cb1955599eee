import { afterEach, describe, expect, it, vi } from 'vitest';
import { GatewayConfigurationError, GatewayConnectionError } from '../src/errors';
import { GatewayClient } from '../src/gateway/client';
import {
  createGateway,
  gatewayOrDefault,
  getDefaultGateway,
  setDefaultGateway,
} from '../src/gateway/session';
import { logger } from '../src/utils/logger';
import { FakeGateway, FakeJvm } from './helpers/fakeQupath';
import { ScriptedStream } from './helpers/scriptedStream';

describe('gateway session', () => {
  afterEach(() => {
    setDefaultGateway(undefined);
  });

  it('prefers the first gateway among the candidates', async () => {
    const explicit = new FakeGateway(new FakeJvm());
    setDefaultGateway(new FakeGateway(new FakeJvm()));

    await expect(gatewayOrDefault(null, 'not a gateway', explicit)).resolves.toBe(explicit);
  });

  it('falls back to the default gateway', async () => {
    const fallback = new FakeGateway(new FakeJvm());
    setDefaultGateway(fallback);

    await expect(gatewayOrDefault(undefined)).resolves.toBe(fallback);
    expect(getDefaultGateway()).toBe(fallback);
  });

  it('creates a gateway with configured defaults and stores it', async () => {
    const client = new GatewayClient(new ScriptedStream());
    const connect = vi.spyOn(GatewayClient, 'connect').mockResolvedValue(client);
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);

    await expect(gatewayOrDefault()).resolves.toBe(client);
    expect(warn).toHaveBeenCalledWith('Attempting to create new gateway');
    expect(connect).toHaveBeenCalledTimes(1);
    expect(getDefaultGateway()).toBe(client);
  });

  it('passes explicit connection options through', async () => {
    const client = new GatewayClient(new ScriptedStream());
    const connect = vi.spyOn(GatewayClient, 'connect').mockResolvedValue(client);

    await createGateway({ host: 'qupath.local', port: 25444, authToken: 'test-secret', setAsDefault: false });
    expect(connect).toHaveBeenCalledWith({ host: 'qupath.local', port: 25444, authToken: 'test-secret' });
    expect(getDefaultGateway()).toBeUndefined();
  });

  it('explains that a gateway is needed when creation fails', async () => {
    vi.spyOn(GatewayClient, 'connect').mockRejectedValue(new GatewayConnectionError('connection refused'));
    vi.spyOn(logger, 'warn').mockImplementation(() => undefined);

    const error = await gatewayOrDefault().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(GatewayConfigurationError);
    if (error instanceof GatewayConfigurationError) {
      expect(error.message).toBe('A gateway is needed! See createGateway() for details.');
      expect(error.cause).toBeInstanceOf(GatewayConnectionError);
    }
  });
});
