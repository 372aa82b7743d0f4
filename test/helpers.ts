import { vi } from 'vitest';
import { Logger } from '../src/log.js';
import { Fetch, Sleep } from '../src/overpass.js';
import { AppDeps } from '../src/routes.js';
import { ServiceConfig } from '../src/types.js';

export function testConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    port: 0,
    overpassUrl: 'https://overpass.test/api/interpreter',
    userAgent: 'cafe-scout-test/1.0',
    overpassTimeoutSeconds: 60,
    retryDelayMs: 2000,
    maxRetries: 1,
    defaultRadius: 4000,
    maxRadius: 15000,
    minResults: 10,
    maxExpansions: 2,
    filterMode: 'strict',
    ...overrides
  };
}

export function silentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    error: vi.fn()
  };
}

export function createDeps(config: ServiceConfig = testConfig()) {
  const fetchMock = vi.fn<Fetch>();
  const sleepMock = vi.fn<Sleep>().mockResolvedValue(undefined);
  const log = silentLogger();
  const deps: AppDeps = { config, log, fetch: fetchMock, sleep: sleepMock };
  return { deps, fetchMock, sleepMock, log };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

export function timeoutError(): Error {
  const error = new Error('The operation was aborted due to timeout');
  error.name = 'TimeoutError';
  return error;
}

/** `count` open cafés as Overpass nodes, ids starting at `firstId`. */
export function cafeNodes(count: number, firstId = 1): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, index) => ({
    type: 'node',
    id: firstId + index,
    lat: 52.5 + index * 0.001,
    lon: 13.4,
    tags: { amenity: 'cafe', name: `Cafe ${firstId + index}` }
  }));
}
