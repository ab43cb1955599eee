import { gatewayOrDefault } from './session';
import {
  callElements,
  callObject,
  callOptionalObject,
  callString,
  isGateway,
  isRemoteObject,
  releaseHandles,
  type Gateway,
  type RemoteObject,
} from './remote';

/** Remote capabilities recognised by name, since handles carry no local type. */
export const RemoteType = {
  ImageData: 'qupath.lib.images.ImageData',
  Hierarchy: 'qupath.lib.objects.hierarchy.PathObjectHierarchy',
  ImageServer: 'qupath.lib.images.servers.ImageServer',
} as const;

export type RemoteTypeName = (typeof RemoteType)[keyof typeof RemoteType];

/** What callers may hand to a resolver. */
export type RemoteInput = Gateway | RemoteObject | null | undefined;

/**
 * Names of the remote object's class, its superclasses and every interface
 * they declare directly.
 */
export async function getRemoteTypeNames(target: RemoteObject): Promise<Set<string>> {
  const names = new Set<string>();
  let cls: RemoteObject | null = await callObject(target, 'getClass');
  while (cls) {
    const current: RemoteObject = cls;
    try {
      names.add(await callString(current, 'getName'));
      const interfaces = await callElements(current, 'getInterfaces');
      try {
        for (const iface of interfaces) {
          if (isRemoteObject(iface)) names.add(await callString(iface, 'getName'));
        }
      } finally {
        await releaseHandles(...interfaces);
      }
      cls = await callOptionalObject(current, 'getSuperclass');
    } finally {
      await releaseHandles(current);
    }
  }
  return names;
}

export async function hasRemoteType(target: RemoteObject, type: RemoteTypeName) {
  return (await getRemoteTypeNames(target)).has(type);
}

export async function getCurrentImageData(gateway?: Gateway): Promise<RemoteObject | null> {
  const resolved = await gatewayOrDefault(gateway);
  const qupath = await callOptionalObject(resolved.entryPoint, 'getQuPath');
  if (!qupath) return null;
  try {
    return await callOptionalObject(qupath, 'getImageData');
  } finally {
    await releaseHandles(qupath);
  }
}

export async function resolveImageData(input?: RemoteInput, gateway?: Gateway): Promise<RemoteObject | null> {
  if (input === undefined || input === null) {
    return getCurrentImageData(gateway);
  }
  if (isGateway(input)) {
    return getCurrentImageData(input);
  }
  return (await hasRemoteType(input, RemoteType.ImageData)) ? input : null;
}

/** Reads `method` from the image data behind `input`, releasing image data it looked up itself. */
async function fromImageData(input: RemoteInput, gateway: Gateway | undefined, method: string) {
  const imageData = await resolveImageData(input, gateway);
  if (!imageData) return null;
  try {
    return await callOptionalObject(imageData, method);
  } finally {
    if (imageData !== input) await releaseHandles(imageData);
  }
}

export async function resolveHierarchy(input?: RemoteInput, gateway?: Gateway): Promise<RemoteObject | null> {
  if (input && !isGateway(input) && await hasRemoteType(input, RemoteType.Hierarchy)) {
    return input;
  }
  return fromImageData(input, gateway, 'getHierarchy');
}

export async function resolveServer(input?: RemoteInput, gateway?: Gateway): Promise<RemoteObject | null> {
  if (input && !isGateway(input) && await hasRemoteType(input, RemoteType.ImageServer)) {
    return input;
  }
  return fromImageData(input, gateway, 'getServer');
}
