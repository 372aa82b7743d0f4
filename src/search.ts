import { UpstreamServiceError } from './errors.js';
import { OverpassClientDeps, requestOverpass } from './overpass.js';
import { extractElements, parseOverpassElements } from './parser.js';
import { buildOverpassQuery } from './query.js';
import { CafeRecord, CafeSearchResult, Coordinate, ServiceConfig } from './types.js';

export type SearchDeps = OverpassClientDeps;

export function initialRadius(requested: number, config: ServiceConfig): number {
  return Math.min(Math.max(requested, config.defaultRadius), config.maxRadius);
}

export function nextRadius(current: number, config: ServiceConfig): number {
  return Math.min(Math.max(current * 2, current + config.defaultRadius), config.maxRadius);
}

async function runRound(
  point: Coordinate,
  radius: number,
  round: number,
  strict: boolean,
  deps: SearchDeps
): Promise<CafeRecord[]> {
  const { config, log } = deps;
  const query = buildOverpassQuery(point, radius, {
    timeoutSeconds: config.overpassTimeoutSeconds,
    excludeLifecycle: strict
  });

  log.info('Requesting cafes', { radius, lat: point.lat, lon: point.lon, round });
  log.debug('Overpass query', { query });

  const result = await requestOverpass(query, deps);
  if (result.kind !== 'ok') {
    throw new UpstreamServiceError('overpass', 'Overpass request failed', {
      cause: result.error,
      timedOut: result.kind === 'timeout'
    });
  }

  const elements = extractElements(result.payload);
  const cafes = parseOverpassElements(elements, { lifecycleFilter: strict });

  log.info('Overpass returned results', {
    radius,
    rawCount: elements.length,
    filteredCount: cafes.length
  });

  return cafes;
}

/**
 * Finds cafés around `point`.
 *
 * In strict mode the radius grows between rounds until `minResults` open cafés are found,
 * `maxRadius` is reached or `maxExpansions` extra rounds were spent; the last round's cafés
 * and radius are returned either way. Basic mode runs one unfiltered round at the requested
 * radius.
 *
 * @throws UpstreamServiceError when Overpass cannot be reached after retries.
 */
export async function searchCafes(
  point: Coordinate,
  requestedRadius: number,
  deps: SearchDeps
): Promise<CafeSearchResult> {
  const { config } = deps;

  if (config.filterMode === 'basic') {
    const cafes = await runRound(point, requestedRadius, 0, false, deps);
    deps.log.info('Cafe search finished', { radius: requestedRadius, rounds: 1, count: cafes.length });
    return { cafes, radius: requestedRadius, rounds: 1 };
  }

  let radius = initialRadius(requestedRadius, config);

  for (let round = 0; ; round += 1) {
    const cafes = await runRound(point, radius, round, true, deps);

    if (cafes.length >= config.minResults || radius >= config.maxRadius || round >= config.maxExpansions) {
      deps.log.info('Cafe search finished', { radius, rounds: round + 1, count: cafes.length });
      return { cafes, radius, rounds: round + 1 };
    }

    radius = nextRadius(radius, config);
    await deps.sleep(config.retryDelayMs);
  }
}
