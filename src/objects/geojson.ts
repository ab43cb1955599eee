import { randomUUID } from 'crypto';
import JSON5 from 'json5';
import { featureListSchema, type Feature } from './schemas';

/**
 * Parses GeoJSON text that may contain `NaN` and `Infinity` literals, as
 * QuPath writes them for missing measurements.
 */
export const parseGeoJson = (text: string): unknown => JSON5.parse(text);

/**
 * Serialises to JSON, writing non-finite numbers as bare `NaN`, `Infinity`
 * and `-Infinity` instead of `null`.
 */
export function encodeGeoJson(value: unknown, indent = 2): string {
  const marker = `__non_finite_${randomUUID()}__`;
  const text = JSON.stringify(
    value,
    (_key, item: unknown) => (typeof item === 'number' && !Number.isFinite(item) ? `${marker}${item}` : item),
    indent,
  );
  return text.replace(new RegExp(`"${marker}(NaN|-?Infinity)"`, 'g'), '$1');
}

/**
 * Reads features from GeoJSON text. A feature collection is unwrapped to its
 * features.
 */
export const featuresFromString = (text: string): Feature[] => featureListSchema.parse(parseGeoJson(text));
