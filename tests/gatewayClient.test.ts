import { describe, expect, it } from 'vitest';
import { GatewayCallError, GatewayConnectionError, GatewayProtocolError } from '../src/errors';
import { GatewayClient } from '../src/gateway/client';
import { asDouble, callElements, expectObject } from '../src/gateway/remote';
import { ScriptedStream } from './helpers/scriptedStream';

describe('GatewayClient', () => {
  it('calls methods on the entry point and decodes the result', async () => {
    const stream = new ScriptedStream(['!ys4.0.3']);
    const client = new GatewayClient(stream);

    await expect(client.entryPoint.call('getVersion')).resolves.toBe('4.0.3');
    expect(stream.written).toEqual(['c\nt\ngetVersion\ne\n']);
  });

  it('wraps returned references in remote objects bound to the client', async () => {
    const stream = new ScriptedStream(['!yro4', '!yi7']);
    const client = new GatewayClient(stream);

    const qupath = expectObject(await client.entryPoint.call('getQuPath'), 'getQuPath()');
    expect(qupath.id).toBe('o4');
    expect(qupath.kind).toBe('object');
    await expect(qupath.call('nChannels', asDouble(2), 'x')).resolves.toBe(7);
    expect(stream.written[1]).toBe('c\no4\nnChannels\nd2\nsx\ne\n');
  });

  it('matches responses to commands in the order they were sent', async () => {
    const stream = new ScriptedStream(['!yi1', '!yi2', '!yi3']);
    const client = new GatewayClient(stream);

    const results = await Promise.all([
      client.entryPoint.call('a'),
      client.entryPoint.call('b'),
      client.entryPoint.call('c'),
    ]);
    expect(results).toEqual([1, 2, 3]);
  });

  it('reads list elements through size and get, then releases the list', async () => {
    const stream = new ScriptedStream(['!ylo1', '!yi2', '!ysfirst', '!ysecond', '!yv']);
    const client = new GatewayClient(stream);

    await expect(callElements(client.entryPoint, 'getNames')).resolves.toEqual(['first', 'second']);
    expect(stream.written.slice(1)).toEqual([
      'c\no1\nsize\ne\n',
      'c\no1\nget\ni0\ne\n',
      'c\no1\nget\ni1\ne\n',
      'm\nd\no1\ne\n',
    ]);
  });

  it('reads array elements through the array commands', async () => {
    const stream = new ScriptedStream(['!yto2', '!yi2', '!yd1.0', '!yd4.0', '!yv']);
    const client = new GatewayClient(stream);

    await expect(callElements(client.entryPoint, 'getPreferredDownsamples')).resolves.toEqual([1, 4]);
    expect(stream.written.slice(1)).toEqual([
      'a\ne\no2\ne\n',
      'a\ng\no2\ni0\ne\n',
      'a\ng\no2\ni1\ne\n',
      'm\nd\no2\ne\n',
    ]);
  });

  it('drains iterators through hasNext and next', async () => {
    const stream = new ScriptedStream(['!ygo5', '!ybtrue', '!ysx', '!ybfalse', '!yv']);
    const client = new GatewayClient(stream);

    await expect(callElements(client.entryPoint, 'iterator')).resolves.toEqual(['x']);
    expect(stream.written.slice(1)).toEqual([
      'c\no5\nhasNext\ne\n',
      'c\no5\nnext\ne\n',
      'c\no5\nhasNext\ne\n',
      'm\nd\no5\ne\n',
    ]);
  });

  it('reads other collections through toArray and releases both handles', async () => {
    const stream = new ScriptedStream(['!yho3', '!yto4', '!yi1', '!ysfile:///a.tif', '!yv', '!yv']);
    const client = new GatewayClient(stream);

    await expect(callElements(client.entryPoint, 'getURIs')).resolves.toEqual(['file:///a.tif']);
    expect(stream.written[1]).toBe('c\no3\ntoArray\ne\n');
    expect(stream.written.slice(-2)).toEqual(['m\nd\no4\ne\n', 'm\nd\no3\ne\n']);
  });

  it('releases a returned object once', async () => {
    const stream = new ScriptedStream(['!yro9', '!yv']);
    const client = new GatewayClient(stream);

    const request = expectObject(await client.callStatic('qupath.lib.regions.RegionRequest', 'createInstance'), 'createInstance()');
    await request.release();
    await request.release();
    expect(stream.written.slice(1)).toEqual(['m\nd\no9\ne\n']);
  });

  it('never releases the entry point', async () => {
    const stream = new ScriptedStream();
    const client = new GatewayClient(stream);

    await client.entryPoint.release();
    expect(stream.written).toEqual([]);
  });

  it('skips releases once the connection is closed', async () => {
    const stream = new ScriptedStream(['!yro9']);
    const client = new GatewayClient(stream);

    const handle = expectObject(await client.entryPoint.call('getQuPath'), 'getQuPath()');
    await client.close();
    await handle.release();
    expect(stream.written).toEqual(['c\nt\ngetQuPath\ne\n']);
  });

  it('sends static calls to the class target', async () => {
    const stream = new ScriptedStream(['!yro9']);
    const client = new GatewayClient(stream);

    await client.callStatic('qupath.lib.regions.RegionRequest', 'createInstance', 'path', asDouble(1), 0);
    expect(stream.written[0]).toBe('c\nz:qupath.lib.regions.RegionRequest\ncreateInstance\nspath\nd1\ni0\ne\n');
  });

  it('raises a call error holding the Java exception', async () => {
    const stream = new ScriptedStream(['!xro20']);
    const client = new GatewayClient(stream);

    const error = await client.entryPoint.call('explode').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(GatewayCallError);
    if (error instanceof GatewayCallError) {
      expect(error.exception?.id).toBe('o20');
    }
  });

  it('raises a call error on a fatal response', async () => {
    const client = new GatewayClient(new ScriptedStream(['!zgateway shutting down']));

    await expect(client.entryPoint.call('anything')).rejects.toThrow('Fatal gateway error: gateway shutting down');
  });

  it('rejects a command whose response cannot be decoded', async () => {
    const client = new GatewayClient(new ScriptedStream(['garbage']));

    await expect(client.entryPoint.call('anything')).rejects.toBeInstanceOf(GatewayProtocolError);
  });

  it('authenticates with the token', async () => {
    const stream = new ScriptedStream(['!yv']);
    const client = new GatewayClient(stream);

    await client.authenticate('test-secret');
    expect(stream.written).toEqual(['A\ntest-secret\n']);
  });

  it('closes the connection when the token is rejected', async () => {
    const stream = new ScriptedStream(['!xsbad token']);
    const client = new GatewayClient(stream);

    await expect(client.authenticate('test-secret')).rejects.toBeInstanceOf(GatewayConnectionError);
    expect(stream.destroyed).toBe(true);
    await expect(client.entryPoint.call('getQuPath')).rejects.toThrow('Gateway connection is closed');
  });

  it('rejects pending commands when the connection closes', async () => {
    const stream = new ScriptedStream();
    const client = new GatewayClient(stream);

    const pending = expect(client.entryPoint.call('getQuPath')).rejects.toThrow('Gateway connection closed');
    stream.destroy();
    await pending;
  });

  it('rejects pending commands when the socket fails', async () => {
    const stream = new ScriptedStream();
    const client = new GatewayClient(stream);

    const pending = expect(client.entryPoint.call('getQuPath')).rejects.toThrow('Gateway connection failed: read ECONNRESET');
    stream.destroy(new Error('read ECONNRESET'));
    await pending;
    await expect(client.entryPoint.call('getQuPath')).rejects.toBeInstanceOf(GatewayConnectionError);
  });

  it('rejects pending commands on close()', async () => {
    const stream = new ScriptedStream();
    const client = new GatewayClient(stream);

    const pending = expect(client.entryPoint.call('getQuPath')).rejects.toBeInstanceOf(GatewayConnectionError);
    await client.close();
    await pending;
    expect(stream.destroyed).toBe(true);
  });
});
