import { readFile } from 'node:fs/promises';
import type { JSONSchemaType } from 'ajv';
import { describeError, InvalidInputError, UpstreamServiceError } from './errors.js';
import { searchCafes, SearchDeps } from './search.js';
import { CafeSearchQuery, CafeSearchResponse } from './types.js';
import { ajv } from './validation.js';

export type AppDeps = SearchDeps;

export type HandlerResult =
  | { type: 'json'; status: number; body: unknown; headers?: Record<string, string> }
  | { type: 'html'; status: number; body: string };

type Handler = (url: URL, deps: AppDeps) => Promise<HandlerResult>;

export const MISSING_COORDINATES_MESSAGE = 'lat and lon query parameters are required';
export const INVALID_COORDINATES_MESSAGE = 'lat and lon must be valid coordinates';
export const NO_RESULTS_MESSAGE = 'No open cafes found. Try expanding the search area.';

const SHELL_PATH = new URL('../public/index.html', import.meta.url);

const querySchema: JSONSchemaType<CafeSearchQuery> = {
  type: 'object',
  required: ['lat', 'lon'],
  additionalProperties: true,
  properties: {
    lat: { type: 'number', minimum: -90, maximum: 90 },
    lon: { type: 'number', minimum: -180, maximum: 180 }
  }
};

const validateQuery = ajv.compile(querySchema);

function json(status: number, body: unknown, headers?: Record<string, string>): HandlerResult {
  return { type: 'json', status, body, headers };
}

/** Reads `lat`/`lon` from the query string, coercing them to numbers. */
export function parseCafeQuery(params: URLSearchParams): CafeSearchQuery {
  const candidate: unknown = Object.fromEntries(params);
  if (validateQuery(candidate)) {
    return { lat: candidate.lat, lon: candidate.lon };
  }

  const errors = validateQuery.errors ?? [];
  if (errors.some((error) => error.keyword === 'required' || error.keyword === 'type')) {
    throw new InvalidInputError(MISSING_COORDINATES_MESSAGE);
  }
  throw new InvalidInputError(INVALID_COORDINATES_MESSAGE, errors);
}

/** Positive integer radius, or `fallback` when absent or unusable. */
export function parseRadius(value: string | null, fallback: number): number {
  const trimmed = value?.trim();
  if (!trimmed || !/^[+-]?\d+$/.test(trimmed)) {
    return fallback;
  }
  const parsed = Number.parseInt(trimmed, 10);
  return parsed > 0 ? parsed : fallback;
}

export async function handleCafeSearch(params: URLSearchParams, deps: AppDeps): Promise<HandlerResult> {
  const { config, log } = deps;

  try {
    const point = parseCafeQuery(params);
    const radius = parseRadius(params.get('radius'), config.defaultRadius);
    const result = await searchCafes(point, radius, deps);

    const response: CafeSearchResponse = {
      cafes: result.cafes,
      count: result.cafes.length,
      radius: result.radius
    };
    if (result.cafes.length === 0 && config.filterMode === 'strict') {
      response.message = NO_RESULTS_MESSAGE;
    }
    return json(200, response);
  } catch (error) {
    if (error instanceof InvalidInputError) {
      return json(
        400,
        error.details === undefined ? { error: error.message } : { error: error.message, details: error.details }
      );
    }

    if (error instanceof UpstreamServiceError) {
      const details = describeError(error.cause ?? error);
      log.error('Overpass lookup failed', {
        service: error.service,
        timedOut: error.timedOut,
        cause: details
      });
      return json(error.timedOut ? 504 : 502, { error: 'Overpass request failed', details });
    }

    const details = describeError(error);
    log.error('Failed to fetch cafes', { error: details });
    return json(502, { error: 'Failed to fetch cafes', details });
  }
}

export async function handleIndex(): Promise<HandlerResult> {
  const body = await readFile(SHELL_PATH, 'utf-8');
  return { type: 'html', status: 200, body };
}

export async function handleHealth(): Promise<HandlerResult> {
  return json(200, { status: 'ok' });
}

const routes: Record<string, Handler> = {
  '/': handleIndex,
  '/healthz': handleHealth,
  '/api/cafes': (url, deps) => handleCafeSearch(url.searchParams, deps)
};

/** Dispatches a request to its GET handler, answering 404 and 405 itself. */
export async function routeRequest(method: string, url: URL, deps: AppDeps): Promise<HandlerResult> {
  const handler = Object.hasOwn(routes, url.pathname) ? routes[url.pathname] : undefined;
  if (!handler) {
    return json(404, { error: 'Not found' });
  }
  if (method !== 'GET' && method !== 'HEAD') {
    return json(405, { error: 'Method not allowed' }, { Allow: 'GET, HEAD' });
  }
  return handler(url, deps);
}
