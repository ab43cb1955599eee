import net from 'net';
import readline from 'readline';
import { once } from 'events';
import type { Duplex } from 'stream';
import { GatewayCallError, GatewayConnectionError, GatewayProtocolError } from '../errors';
import { logger } from '../utils/logger';
import {
  arrayGetCommand,
  arrayLengthCommand,
  authCommand,
  callCommand,
  decodeResponse,
  ENTRY_POINT_ID,
  memoryDeleteCommand,
  staticCallCommand,
  type WireResponse,
  type WireValue,
} from './protocol';
import {
  expectBoolean,
  expectNumber,
  expectObject,
  isRemoteObject,
  releaseHandles,
  type Gateway,
  type RemoteArgument,
  type RemoteKind,
  type RemoteObject,
  type RemoteValue,
} from './remote';

export interface GatewayConnectionOptions {
  host: string;
  port: number;
  authToken?: string;
}

interface PendingCommand {
  resolve: (response: WireResponse) => void;
  reject: (error: Error) => void;
}

class GatewayObject implements RemoteObject {
  private released = false;

  constructor(
    private readonly client: GatewayClient,
    readonly id: string,
    readonly kind: RemoteKind,
  ) {}

  call(method: string, ...args: RemoteArgument[]) {
    return this.client.execute(callCommand(this.id, method, args));
  }

  async elements(): Promise<RemoteValue[]> {
    const items: RemoteValue[] = [];
    switch (this.kind) {
      case 'array': {
        const length = expectNumber(await this.client.execute(arrayLengthCommand(this.id)), 'array length');
        for (let i = 0; i < length; i++) {
          items.push(await this.client.execute(arrayGetCommand(this.id, i)));
        }
        return items;
      }
      case 'list': {
        const size = expectNumber(await this.call('size'), 'size()');
        for (let i = 0; i < size; i++) {
          items.push(await this.call('get', i));
        }
        return items;
      }
      case 'iterator':
        while (expectBoolean(await this.call('hasNext'), 'hasNext()')) {
          items.push(await this.call('next'));
        }
        return items;
      default: {
        const array = expectObject(await this.call('toArray'), 'toArray()');
        try {
          return await array.elements();
        } finally {
          await releaseHandles(array);
        }
      }
    }
  }

  async release() {
    if (this.released || this.id === ENTRY_POINT_ID || this.client.isClosed) return;
    this.released = true;
    await this.client.execute(memoryDeleteCommand(this.id));
  }
}

/**
 * One Py4J connection. Commands are written as they are issued and the
 * server answers them in order, so responses resolve the oldest pending
 * command.
 */
export class GatewayClient implements Gateway {
  readonly entryPoint: RemoteObject;
  private readonly pending: PendingCommand[] = [];
  private closed = false;

  constructor(private readonly stream: Duplex) {
    this.entryPoint = new GatewayObject(this, ENTRY_POINT_ID, 'object');
    const fail = (error: Error) => {
      this.shutdown(new GatewayConnectionError(`Gateway connection failed: ${error.message}`, { cause: error }));
    };
    stream.on('error', fail);
    stream.on('close', () => this.shutdown(new GatewayConnectionError('Gateway connection closed')));
    // readline re-emits input errors on the interface, which throws without a listener.
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    lines.on('error', fail);
    lines.on('line', (line) => this.handleLine(line));
  }

  get isClosed() {
    return this.closed;
  }

  static async connect({ host, port, authToken }: GatewayConnectionOptions): Promise<GatewayClient> {
    const socket = net.createConnection({ host, port });
    try {
      await once(socket, 'connect');
    } catch (error) {
      socket.destroy();
      throw new GatewayConnectionError(`Cannot connect to the QuPath gateway at ${host}:${port}`, { cause: error });
    }
    logger.debug({ host, port }, 'gateway connected');
    const client = new GatewayClient(socket);
    if (authToken !== undefined) {
      await client.authenticate(authToken);
    }
    return client;
  }

  async authenticate(token: string) {
    const response = await this.send(authCommand(token));
    if (response.status !== 'success') {
      await this.close();
      throw new GatewayConnectionError('The gateway rejected the authentication token');
    }
  }

  callStatic(className: string, method: string, ...args: RemoteArgument[]) {
    return this.execute(staticCallCommand(className, method, args));
  }

  async execute(command: string): Promise<RemoteValue> {
    const response = await this.send(command);
    if (response.status === 'fatal') {
      throw new GatewayCallError(`Fatal gateway error: ${response.message}`);
    }
    if (response.status === 'error') {
      const exception = this.toRemoteValue(response.value);
      if (isRemoteObject(exception)) {
        throw new GatewayCallError(`Remote call raised a Java exception (${exception.id})`, exception);
      }
      throw new GatewayCallError(
        typeof exception === 'string' ? `Remote call failed: ${exception}` : 'Remote call failed',
      );
    }
    return this.toRemoteValue(response.value);
  }

  async close() {
    if (this.closed) return;
    this.shutdown(new GatewayConnectionError('Gateway connection closed'));
    this.stream.destroy();
  }

  private send(command: string): Promise<WireResponse> {
    if (this.closed) {
      return Promise.reject(new GatewayConnectionError('Gateway connection is closed'));
    }
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
      this.stream.write(command);
    });
  }

  private handleLine(line: string) {
    const command = this.pending.shift();
    if (!command) {
      logger.warn({ line }, 'unexpected gateway response');
      return;
    }
    try {
      command.resolve(decodeResponse(line));
    } catch (error) {
      command.reject(error instanceof Error ? error : new GatewayProtocolError(String(error)));
    }
  }

  private shutdown(reason: Error) {
    this.closed = true;
    for (const command of this.pending.splice(0)) {
      command.reject(reason);
    }
  }

  private toRemoteValue(value: WireValue): RemoteValue {
    switch (value.type) {
      case 'void':
      case 'null':
        return null;
      case 'reference':
        return new GatewayObject(this, value.id, value.kind);
      default:
        return value.value;
    }
  }
}
