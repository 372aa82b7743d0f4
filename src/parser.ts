import { isOpenOsmPoi } from './lifecycle.js';
import { CafeRecord, Coordinate, OsmElementType, OsmTags, OverpassElement } from './types.js';

export const UNNAMED_CAFE = 'Unnamed Cafe';

const ADDRESS_KEYS = ['addr:housenumber', 'addr:street', 'addr:city', 'addr:postcode'] as const;

export interface ParseOptions {
  lifecycleFilter: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumberOrUndefined(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toElementType(value: unknown): OsmElementType | undefined {
  return value === 'node' || value === 'way' || value === 'relation' ? value : undefined;
}

function toTags(value: unknown): OsmTags {
  const tags: OsmTags = {};
  if (!isRecord(value)) {
    return tags;
  }
  for (const [key, tagValue] of Object.entries(value)) {
    if (typeof tagValue === 'string') {
      tags[key] = tagValue;
    }
  }
  return tags;
}

function normalizeElement(raw: Record<string, unknown>): OverpassElement {
  const element: OverpassElement = {
    type: toElementType(raw.type),
    id: toNumberOrUndefined(raw.id),
    lat: toNumberOrUndefined(raw.lat),
    lon: toNumberOrUndefined(raw.lon),
    tags: toTags(raw.tags)
  };

  const center = raw.center;
  if (isRecord(center)) {
    element.center = {
      lat: toNumberOrUndefined(center.lat),
      lon: toNumberOrUndefined(center.lon)
    };
  }

  return element;
}

/**
 * Pulls the `elements` array out of an Overpass JSON payload.
 * A payload without one is treated as an empty result, not an error.
 */
export function extractElements(payload: unknown): OverpassElement[] {
  if (!isRecord(payload)) {
    return [];
  }
  const elements: unknown = payload.elements;
  if (!Array.isArray(elements)) {
    return [];
  }
  return elements.filter(isRecord).map(normalizeElement);
}

export function formatAddress(tags: OsmTags): string | undefined {
  const parts = ADDRESS_KEYS.map((key) => tags[key]).filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(', ') : undefined;
}

function resolvePosition(element: OverpassElement): Coordinate | null {
  if (element.lat !== undefined && element.lon !== undefined) {
    return { lat: element.lat, lon: element.lon };
  }
  const center = element.center;
  if (center?.lat !== undefined && center.lon !== undefined) {
    return { lat: center.lat, lon: center.lon };
  }
  return null;
}

/**
 * Converts Overpass elements into café records, keeping input order.
 *
 * Elements are dropped when closed (if `lifecycleFilter` is set), when they repeat an
 * earlier `(type, id)` pair, or when neither their own coordinates nor a center exist.
 */
export function parseOverpassElements(
  elements: Iterable<OverpassElement>,
  options: ParseOptions
): CafeRecord[] {
  const cafes: CafeRecord[] = [];
  const seen = new Set<string>();

  for (const element of elements) {
    const tags = element.tags;
    if (options.lifecycleFilter && !isOpenOsmPoi(tags)) {
      continue;
    }

    if (element.type !== undefined && element.id !== undefined) {
      const key = `${element.type}/${element.id}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
    }

    const position = resolvePosition(element);
    if (!position) {
      continue;
    }

    const cafe: CafeRecord = {
      name: tags.name || tags.brand || UNNAMED_CAFE,
      lat: position.lat,
      lon: position.lon,
      source: 'osm',
      osm_id: element.id ?? null,
      osm_type: element.type ?? null
    };

    const address = formatAddress(tags);
    if (address !== undefined) {
      cafe.address = address;
    }

    cafes.push(cafe);
  }

  return cafes;
}
