export { loadConfig, type BridgeConfig, type PixelAccess, type ResizeMethod } from './config';
export * from './errors';
export { GatewayClient, type GatewayConnectionOptions } from './gateway/client';
export {
  asDouble,
  isGateway,
  isRemoteObject,
  JavaDouble,
  type Gateway,
  type RemoteArgument,
  type RemoteKind,
  type RemoteObject,
  type RemoteValue,
} from './gateway/remote';
export {
  getCurrentImageData,
  getRemoteTypeNames,
  hasRemoteType,
  RemoteType,
  resolveHierarchy,
  resolveImageData,
  resolveServer,
  type RemoteInput,
  type RemoteTypeName,
} from './gateway/resolve';
export {
  createGateway,
  gatewayOrDefault,
  getDefaultGateway,
  setDefaultGateway,
  type CreateGatewayOptions,
} from './gateway/session';
export { ImageServer, resolveLevel, validateBlock } from './images/imageServer';
export { getServer, QuPathServer, unpackColor, type QuPathServerOptions } from './images/qupathServer';
export { resizeBlock } from './images/resize';
export * from './images/types';
export { encodeGeoJson, featuresFromString, parseGeoJson } from './objects/geojson';
export { findProperty, ImageObject, toGeometry, type ImageObjectInit } from './objects/imageObject';
export type { Feature, FeatureCollection } from './objects/schemas';
export * from './objects/types';
export * from './services/objectService';
