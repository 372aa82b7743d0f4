import { Coordinate } from './types.js';

/** Tag selectors a feature may carry to count as a café. */
export const CAFE_SELECTORS: ReadonlyArray<readonly [key: string, value: string]> = [
  ['amenity', 'cafe'],
  ['amenity', 'coffee_shop'],
  ['shop', 'coffee']
];

const ELEMENT_TYPES = ['node', 'way', 'relation'] as const;

/** Filters appended in strict mode so closed venues are dropped server-side. */
export const LIFECYCLE_QUERY_FILTERS: readonly string[] = [
  '["disused:amenity"!~"."]',
  '["abandoned:amenity"!~"."]',
  '["was:amenity"!~"."]',
  '["end_date"!~"."]',
  '["disused"!="yes"]',
  '["abandoned"!="yes"]',
  '["closed"!="yes"]',
  '["name"!~"closed",i]'
];

export interface QueryOptions {
  timeoutSeconds: number;
  excludeLifecycle: boolean;
}

/**
 * Builds an Overpass QL query for cafés within `radius` meters of `point`.
 *
 * Candidates are collected into the `.cafes` set. With `excludeLifecycle` the set is
 * re-filtered so features tagged as disused, abandoned or ended never leave Overpass.
 * Output includes tags and a center point for ways and relations.
 */
export function buildOverpassQuery(point: Coordinate, radius: number, options: QueryOptions): string {
  const around = `(around:${radius},${point.lat},${point.lon})`;

  const statements = CAFE_SELECTORS.flatMap(([key, value]) =>
    ELEMENT_TYPES.map((type) => `  ${type}["${key}"="${value}"]${around};`)
  );

  const selection = options.excludeLifecycle
    ? `nwr.cafes${LIFECYCLE_QUERY_FILTERS.join('')};`
    : '.cafes;';

  return `[out:json][timeout:${options.timeoutSeconds}];
(
${statements.join('\n')}
)->.cafes;
(${selection});
out center tags;`;
}
