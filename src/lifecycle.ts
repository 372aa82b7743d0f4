import { OsmTags } from './types.js';

const LIFECYCLE_PREFIXES = ['disused:', 'abandoned:', 'was:'] as const;
const LIFECYCLE_FLAGS = ['disused', 'abandoned', 'closed'] as const;
const CLOSED_NAME_PATTERN = /\bclosed\b/i;

/**
 * Decides whether OSM tags describe a venue that is still operating.
 *
 * Untagged features count as open: OSM data is sparse and a missing tag says nothing about
 * whether a place closed. Lifecycle-prefixed keys (`disused:amenity`, `was:shop`, ...),
 * `disused`/`abandoned`/`closed=yes`, a non-empty `end_date` or the word "closed" in the
 * display name all mark the venue as closed.
 */
export function isOpenOsmPoi(tags: OsmTags): boolean {
  const keys = Object.keys(tags);
  if (keys.length === 0) {
    return true;
  }

  for (const key of keys) {
    const lowered = key.toLowerCase();
    if (LIFECYCLE_PREFIXES.some((prefix) => lowered.startsWith(prefix))) {
      return false;
    }
  }

  for (const flag of LIFECYCLE_FLAGS) {
    if (tags[flag] === 'yes') {
      return false;
    }
  }

  if (tags.end_date) {
    return false;
  }

  const name = tags.name || tags.brand || '';
  return !CLOSED_NAME_PATTERN.test(name);
}
