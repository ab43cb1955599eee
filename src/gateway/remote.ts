import { GatewayProtocolError } from '../errors';
import { logger } from '../utils/logger';

/** How the gateway reported a returned reference. */
export type RemoteKind = 'object' | 'list' | 'set' | 'map' | 'array' | 'iterator';

/**
 * Handle to an object living in the QuPath JVM. Every method call is a round
 * trip through the gateway.
 */
export interface RemoteObject {
  readonly id: string;
  readonly kind: RemoteKind;
  call(method: string, ...args: RemoteArgument[]): Promise<RemoteValue>;
  /** Reads a remote array or collection into a local array. */
  elements(): Promise<RemoteValue[]>;
  /**
   * Lets the gateway forget this object. The handle must not be used
   * afterwards; releasing twice is a no-op.
   */
  release(): Promise<void>;
}

export type RemoteValue = string | number | boolean | null | Uint8Array | RemoteObject;

/** Forces a number to travel as a Java `double`, even when it is integral. */
export class JavaDouble {
  constructor(readonly value: number) {}
}

export const asDouble = (value: number) => new JavaDouble(value);

export type RemoteArgument = RemoteValue | JavaDouble;

export interface Gateway {
  readonly entryPoint: RemoteObject;
  callStatic(className: string, method: string, ...args: RemoteArgument[]): Promise<RemoteValue>;
  close(): Promise<void>;
}

export const isRemoteObject = (value: unknown): value is RemoteObject =>
  typeof value === 'object'
  && value !== null
  && !(value instanceof Uint8Array)
  && 'call' in value
  && typeof value.call === 'function'
  && 'elements' in value
  && 'release' in value;

export const isGateway = (value: unknown): value is Gateway =>
  typeof value === 'object'
  && value !== null
  && 'entryPoint' in value
  && 'callStatic' in value
  && typeof value.callStatic === 'function';

const describe = (value: RemoteValue) => {
  if (value === null) return 'null';
  if (value instanceof Uint8Array) return `bytes[${value.length}]`;
  if (isRemoteObject(value)) return `remote ${value.kind} ${value.id}`;
  return `${typeof value} ${JSON.stringify(value)}`;
};

const mismatch = (what: string, expected: string, value: RemoteValue) =>
  new GatewayProtocolError(`Expected ${what} to return ${expected} but received ${describe(value)}`);

export const expectString = (value: RemoteValue, what: string): string => {
  if (typeof value !== 'string') throw mismatch(what, 'a string', value);
  return value;
};

export const optionalString = (value: RemoteValue, what: string): string | null =>
  value === null ? null : expectString(value, what);

export const expectNumber = (value: RemoteValue, what: string): number => {
  if (typeof value !== 'number') throw mismatch(what, 'a number', value);
  return value;
};

export const optionalNumber = (value: RemoteValue, what: string): number | null =>
  value === null ? null : expectNumber(value, what);

export const expectBoolean = (value: RemoteValue, what: string): boolean => {
  if (typeof value !== 'boolean') throw mismatch(what, 'a boolean', value);
  return value;
};

export const expectBytes = (value: RemoteValue, what: string): Uint8Array => {
  if (!(value instanceof Uint8Array)) throw mismatch(what, 'bytes', value);
  return value;
};

export const expectObject = (value: RemoteValue, what: string): RemoteObject => {
  if (!isRemoteObject(value)) throw mismatch(what, 'a remote object', value);
  return value;
};

export const optionalObject = (value: RemoteValue, what: string): RemoteObject | null =>
  value === null ? null : expectObject(value, what);

export const callString = async (target: RemoteObject, method: string, ...args: RemoteArgument[]) =>
  expectString(await target.call(method, ...args), `${method}()`);

export const callNumber = async (target: RemoteObject, method: string, ...args: RemoteArgument[]) =>
  expectNumber(await target.call(method, ...args), `${method}()`);

export const callBoolean = async (target: RemoteObject, method: string, ...args: RemoteArgument[]) =>
  expectBoolean(await target.call(method, ...args), `${method}()`);

export const callObject = async (target: RemoteObject, method: string, ...args: RemoteArgument[]) =>
  expectObject(await target.call(method, ...args), `${method}()`);

export const callOptionalObject = async (target: RemoteObject, method: string, ...args: RemoteArgument[]) =>
  optionalObject(await target.call(method, ...args), `${method}()`);

/**
 * Releases every remote object among `values`. Failures are logged so they
 * never hide the error of the work that used the handles.
 */
export async function releaseHandles(...values: Array<RemoteValue | undefined>) {
  for (const value of values) {
    if (!isRemoteObject(value)) continue;
    try {
      await value.release();
    } catch (error) {
      logger.warn({ err: error, id: value.id }, 'Failed to release gateway object');
    }
  }
}

/**
 * Calls a method returning a collection or array and reads its elements.
 * The collection handle itself is released; remote elements stay with the
 * caller.
 */
export async function callElements(target: RemoteObject, method: string, ...args: RemoteArgument[]) {
  const collection = await callObject(target, method, ...args);
  try {
    return await collection.elements();
  } finally {
    await releaseHandles(collection);
  }
}
