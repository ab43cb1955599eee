import { ImageDataNotFoundError } from '../errors';
import {
  getCurrentImageData,
  resolveHierarchy,
  resolveImageData,
  type RemoteInput,
} from '../gateway/resolve';
import {
  callBoolean,
  callElements,
  callObject,
  callOptionalObject,
  expectString,
  releaseHandles,
  type Gateway,
  type RemoteObject,
} from '../gateway/remote';
import { gatewayOrDefault } from '../gateway/session';
import { encodeGeoJson, featuresFromString } from '../objects/geojson';
import { ImageObject } from '../objects/imageObject';
import type { Feature } from '../objects/schemas';
import { ObjectType } from '../objects/types';
import { logger } from '../utils/logger';

/**
 * Objects per feature collection requested from QuPath. Keeps each returned
 * string to a manageable length for large hierarchies.
 */
export const FEATURE_BATCH_SIZE = 1000;

const HIERARCHY_ACCESSORS = {
  [ObjectType.Annotation]: 'getAnnotationObjects',
  [ObjectType.Detection]: 'getDetectionObjects',
  [ObjectType.Tile]: 'getTileObjects',
  [ObjectType.Cell]: 'getCellObjects',
} as const;

type ListableType = keyof typeof HIERARCHY_ACCESSORS;

export interface ObjectQueryOptions {
  /** All objects when omitted. */
  objectType?: ObjectType;
  gateway?: Gateway;
}

export interface AddObjectsOptions {
  imageData?: RemoteObject;
  gateway?: Gateway;
}

async function selectObjects(hierarchy: RemoteObject, objectType?: ObjectType): Promise<RemoteObject | null> {
  if (objectType === undefined) {
    return callObject(hierarchy, 'getAllObjects', false);
  }
  if (objectType === ObjectType.TmaCore) {
    const grid = await callOptionalObject(hierarchy, 'getTMAGrid');
    if (!grid) return null;
    try {
      return await callObject(grid, 'getTMACoreList');
    } finally {
      await releaseHandles(grid);
    }
  }
  return callObject(hierarchy, HIERARCHY_ACCESSORS[objectType]);
}

/**
 * Reads objects from a QuPath hierarchy as GeoJSON features, in the order
 * QuPath returns them. The remote object list is released afterwards, so
 * objects deleted in QuPath are not kept alive by this call.
 */
export async function getFeatures(input?: RemoteInput, options: ObjectQueryOptions = {}): Promise<Feature[]> {
  const gateway = await gatewayOrDefault(input, options.gateway);
  const hierarchy = await resolveHierarchy(input, gateway);
  if (!hierarchy) {
    logger.warn('No object hierarchy found');
    return [];
  }
  let pathObjects: RemoteObject | null = null;
  try {
    pathObjects = await selectObjects(hierarchy, options.objectType);
    if (!pathObjects) {
      return [];
    }
    const features: Feature[] = [];
    const collections = await callElements(gateway.entryPoint, 'toFeatureCollections', pathObjects, FEATURE_BATCH_SIZE);
    for (const collection of collections) {
      features.push(...featuresFromString(expectString(collection, 'toFeatureCollections()')));
    }
    return features;
  } finally {
    await releaseHandles(pathObjects, hierarchy === input ? undefined : hierarchy);
  }
}

export async function getObjects(input?: RemoteInput, options: ObjectQueryOptions = {}): Promise<ImageObject[]> {
  return (await getFeatures(input, options)).map((feature) => ImageObject.fromFeature(feature));
}

export const getAnnotations = (input?: RemoteInput, options: Omit<ObjectQueryOptions, 'objectType'> = {}) =>
  getObjects(input, { ...options, objectType: ObjectType.Annotation });

export const getDetections = (input?: RemoteInput, options: Omit<ObjectQueryOptions, 'objectType'> = {}) =>
  getObjects(input, { ...options, objectType: ObjectType.Detection });

export const getCells = (input?: RemoteInput, options: Omit<ObjectQueryOptions, 'objectType'> = {}) =>
  getObjects(input, { ...options, objectType: ObjectType.Cell });

export const getTiles = (input?: RemoteInput, options: Omit<ObjectQueryOptions, 'objectType'> = {}) =>
  getObjects(input, { ...options, objectType: ObjectType.Tile });

export const getTmaCores = (input?: RemoteInput, options: Omit<ObjectQueryOptions, 'objectType'> = {}) =>
  getObjects(input, { ...options, objectType: ObjectType.TmaCore });

const toFeature = (value: Feature | ImageObject): Feature =>
  value instanceof ImageObject ? value.toFeature() : value;

/**
 * Sends features to QuPath, which turns them into objects that are then added
 * to the image's hierarchy. NaN measurements are sent as NaN.
 */
export async function addObjects(objects: Array<Feature | ImageObject>, options: AddObjectsOptions = {}) {
  if (objects.length === 0) {
    return;
  }
  const gateway = await gatewayOrDefault(options.gateway);
  const imageData = options.imageData
    ? await resolveImageData(options.imageData, gateway)
    : await getCurrentImageData(gateway);
  if (!imageData) {
    throw new ImageDataNotFoundError();
  }
  const json = encodeGeoJson(objects.map(toFeature));
  let pathObjects: RemoteObject | undefined;
  let hierarchy: RemoteObject | undefined;
  try {
    pathObjects = await callObject(gateway.entryPoint, 'toPathObjects', json);
    hierarchy = await callObject(imageData, 'getHierarchy');
    await hierarchy.call('addObjects', pathObjects);
  } finally {
    await releaseHandles(pathObjects, hierarchy, imageData === options.imageData ? undefined : imageData);
  }
}

export const addObject = (object: Feature | ImageObject, options: AddObjectsOptions = {}) =>
  addObjects([object], options);

/**
 * Runs `remove` on the hierarchy of the image data behind `input`. Without
 * image data it only warns.
 */
async function withHierarchyForDelete(input: RemoteInput, remove: (hierarchy: RemoteObject) => Promise<void>) {
  const imageData = await resolveImageData(input);
  if (!imageData) {
    logger.warn('No image data found; nothing deleted');
    return;
  }
  let hierarchy: RemoteObject | undefined;
  try {
    hierarchy = await callObject(imageData, 'getHierarchy');
    await remove(hierarchy);
  } finally {
    await releaseHandles(hierarchy, imageData === input ? undefined : imageData);
  }
}

const deleteObjectsOfType = (input: RemoteInput, objectType: ListableType) =>
  withHierarchyForDelete(input, async (hierarchy) => {
    const pathObjects = await callObject(hierarchy, HIERARCHY_ACCESSORS[objectType]);
    try {
      if (!(await callBoolean(pathObjects, 'isEmpty'))) {
        await hierarchy.call('removeObjects', pathObjects, true);
      }
    } finally {
      await releaseHandles(pathObjects);
    }
  });

export const deleteAllObjects = (input?: RemoteInput) =>
  withHierarchyForDelete(input, async (hierarchy) => {
    await hierarchy.call('clearAll');
  });

export const deleteDetections = (input?: RemoteInput) => deleteObjectsOfType(input, ObjectType.Detection);

export const deleteAnnotations = (input?: RemoteInput) => deleteObjectsOfType(input, ObjectType.Annotation);

export const deleteCells = (input?: RemoteInput) => deleteObjectsOfType(input, ObjectType.Cell);

export const deleteTiles = (input?: RemoteInput) => deleteObjectsOfType(input, ObjectType.Tile);
