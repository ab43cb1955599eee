/**
 * Py4J text protocol: command encoding and response decoding.
 *
 * Commands are newline separated parts closed by `e\n`; every response is one
 * line starting with `!`, then `y` (success), `x` (Java error) or `z`
 * (fatal), then a typed value.
 */
import { GatewayProtocolError } from '../errors';
import { isRemoteObject, JavaDouble, type RemoteArgument, type RemoteKind } from './remote';

export const ENTRY_POINT_ID = 't';
export const STATIC_PREFIX = 'z:';

const END = 'e\n';
const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;

const REFERENCE_KINDS: Record<string, RemoteKind> = {
  r: 'object',
  l: 'list',
  h: 'set',
  a: 'map',
  t: 'array',
  g: 'iterator',
};

export type WireValue =
  | { type: 'void' }
  | { type: 'null' }
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'boolean'; value: boolean }
  | { type: 'bytes'; value: Uint8Array }
  | { type: 'reference'; id: string; kind: RemoteKind };

export type WireResponse =
  | { status: 'success'; value: WireValue }
  | { status: 'error'; value: WireValue }
  | { status: 'fatal'; message: string };

export const escapeString = (value: string) =>
  value.replace(/\\/g, '\\\\').replace(/\r/g, '\\r').replace(/\n/g, '\\n');

export const unescapeString = (value: string) =>
  value.replace(/\\(.)/g, (_match, escaped: string) => {
    if (escaped === 'n') return '\n';
    if (escaped === 'r') return '\r';
    return escaped;
  });

const encodeNumber = (value: number) => {
  if (Number.isInteger(value)) {
    return value >= INT_MIN && value <= INT_MAX ? `i${value}` : `L${value}`;
  }
  return `d${value}`;
};

export const encodeArgument = (arg: RemoteArgument): string => {
  if (arg === null) return 'n';
  if (arg instanceof JavaDouble) return `d${arg.value}`;
  if (arg instanceof Uint8Array) return `j${Buffer.from(arg).toString('base64')}`;
  if (isRemoteObject(arg)) return `r${arg.id}`;
  switch (typeof arg) {
    case 'string':
      return `s${escapeString(arg)}`;
    case 'boolean':
      return arg ? 'btrue' : 'bfalse';
    case 'number':
      return encodeNumber(arg);
  }
  throw new GatewayProtocolError(`Cannot encode argument of type ${typeof arg}`);
};

const command = (parts: string[]) => `${parts.map((part) => `${part}\n`).join('')}${END}`;

export const callCommand = (targetId: string, method: string, args: RemoteArgument[] = []) =>
  command(['c', targetId, method, ...args.map(encodeArgument)]);

export const staticCallCommand = (className: string, method: string, args: RemoteArgument[] = []) =>
  callCommand(`${STATIC_PREFIX}${className}`, method, args);

export const arrayLengthCommand = (arrayId: string) => command(['a', 'e', arrayId]);

export const arrayGetCommand = (arrayId: string, index: number) =>
  command(['a', 'g', arrayId, encodeNumber(index)]);

/** Tells the gateway to drop its reference to an object it handed out. */
export const memoryDeleteCommand = (objectId: string) => command(['m', 'd', objectId]);

export const authCommand = (token: string) => `A\n${escapeString(token)}\n`;

const parseNumber = (raw: string, line: string) => {
  const value = Number(raw);
  if (Number.isNaN(value) && raw !== 'NaN') {
    throw new GatewayProtocolError(`Malformed number in gateway response: ${line}`);
  }
  return value;
};

export const decodeValue = (payload: string, line: string): WireValue => {
  if (payload === '') return { type: 'void' };
  const tag = payload[0];
  const body = payload.slice(1);
  switch (tag) {
    case 'v':
      return { type: 'void' };
    case 'n':
      return { type: 'null' };
    case 's':
      return { type: 'string', value: unescapeString(body) };
    case 'i':
    case 'L':
    case 'd':
    case 'D':
      return { type: 'number', value: parseNumber(body, line) };
    case 'b':
      return { type: 'boolean', value: body.toLowerCase() === 'true' };
    case 'j':
      return { type: 'bytes', value: new Uint8Array(Buffer.from(body, 'base64')) };
  }
  const kind = REFERENCE_KINDS[tag];
  if (kind) {
    return { type: 'reference', id: body, kind };
  }
  throw new GatewayProtocolError(`Unsupported value type '${tag}' in gateway response: ${line}`);
};

export const decodeResponse = (line: string): WireResponse => {
  if (!line.startsWith('!') || line.length < 2) {
    throw new GatewayProtocolError(`Malformed gateway response: ${line}`);
  }
  const status = line[1];
  const payload = line.slice(2);
  if (status === 'y') return { status: 'success', value: decodeValue(payload, line) };
  if (status === 'x') return { status: 'error', value: decodeValue(payload, line) };
  if (status === 'z') return { status: 'fatal', message: unescapeString(payload) };
  throw new GatewayProtocolError(`Unknown response status '${status}': ${line}`);
};
