import type { RemoteObject } from './gateway/remote';

/** No usable gateway, image server or configuration value. */
export class GatewayConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GatewayConfigurationError';
  }
}

export class GatewayConnectionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'GatewayConnectionError';
  }
}

/** The gateway answered with something this client cannot interpret. */
export class GatewayProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GatewayProtocolError';
  }
}

/**
 * A remote call failed on the Java side. When the gateway hands back the
 * thrown exception, it is kept as a remote handle.
 */
export class GatewayCallError extends Error {
  constructor(message: string, readonly exception?: RemoteObject) {
    super(message);
    this.name = 'GatewayCallError';
  }
}

export class ImageDataNotFoundError extends Error {
  constructor(message = 'Cannot find an ImageData') {
    super(message);
    this.name = 'ImageDataNotFoundError';
  }
}

export class InvalidBlockError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidBlockError';
  }
}
