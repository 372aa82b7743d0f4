import { describe, expect, it } from 'vitest';
import {
  handleCafeSearch,
  INVALID_COORDINATES_MESSAGE,
  MISSING_COORDINATES_MESSAGE,
  NO_RESULTS_MESSAGE,
  parseCafeQuery,
  parseRadius,
  routeRequest
} from '../src/routes.js';
import { cafeNodes, createDeps, jsonResponse, testConfig, timeoutError } from './helpers.js';

function params(query: string): URLSearchParams {
  return new URLSearchParams(query);
}

describe('parseCafeQuery', () => {
  it('coerces lat and lon to numbers', () => {
    expect(parseCafeQuery(params('lat=52.52&lon=13.405&radius=900'))).toEqual({ lat: 52.52, lon: 13.405 });
  });

  it.each(['lon=13.4', 'lat=52.5', '', 'lat=abc&lon=13.4', 'lat=&lon=13.4'])(
    'rejects %j as missing coordinates',
    (query) => {
      expect(() => parseCafeQuery(params(query))).toThrow(MISSING_COORDINATES_MESSAGE);
    }
  );

  it('rejects coordinates outside WGS84 bounds', () => {
    expect(() => parseCafeQuery(params('lat=95&lon=13.4'))).toThrow(INVALID_COORDINATES_MESSAGE);
  });
});

describe('parseRadius', () => {
  it('accepts a positive integer', () => {
    expect(parseRadius('2500', 4000)).toBe(2500);
  });

  it.each([null, '', '0', '-5', 'wide', '12.5'])('falls back for %j', (value) => {
    expect(parseRadius(value, 4000)).toBe(4000);
  });
});

describe('handleCafeSearch', () => {
  it('answers 400 when lat is missing', async () => {
    const { deps, fetchMock } = createDeps();

    const result = await handleCafeSearch(params('lon=13.4'), deps);

    expect(result).toEqual({
      type: 'json',
      status: 400,
      body: { error: 'lat and lon query parameters are required' },
      headers: undefined
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('includes validation details for out-of-range coordinates', async () => {
    const { deps } = createDeps();

    const result = await handleCafeSearch(params('lat=52.5&lon=200'), deps);

    expect(result.status).toBe(400);
    expect(result.body).toMatchObject({
      error: INVALID_COORDINATES_MESSAGE,
      details: [expect.objectContaining({ instancePath: '/lon', keyword: 'maximum' })]
    });
  });

  it('returns the cafes, count and radius', async () => {
    const { deps, fetchMock } = createDeps();
    fetchMock.mockResolvedValueOnce(jsonResponse({ elements: cafeNodes(10) }));

    const result = await handleCafeSearch(params('lat=52.52&lon=13.405&radius=2000'), deps);

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ count: 10, radius: 4000 });
    expect(result.body).not.toHaveProperty('message');
  });

  it('uses the default radius when none is given', async () => {
    const { deps, fetchMock } = createDeps(testConfig({ filterMode: 'basic' }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ elements: cafeNodes(1) }));

    const result = await handleCafeSearch(params('lat=52.52&lon=13.405'), deps);

    expect(result.body).toMatchObject({ count: 1, radius: 4000 });
  });

  it('adds a hint when nothing open was found', async () => {
    const { deps, fetchMock } = createDeps(testConfig({ maxExpansions: 0 }));
    fetchMock.mockResolvedValueOnce(jsonResponse({}));

    const result = await handleCafeSearch(params('lat=52.52&lon=13.405'), deps);

    expect(result.body).toEqual({ cafes: [], count: 0, radius: 4000, message: NO_RESULTS_MESSAGE });
  });

  it('leaves out the hint in basic mode', async () => {
    const { deps, fetchMock } = createDeps(testConfig({ filterMode: 'basic' }));
    fetchMock.mockResolvedValueOnce(jsonResponse({ elements: [] }));

    const result = await handleCafeSearch(params('lat=52.52&lon=13.405&radius=800'), deps);

    expect(result.body).toEqual({ cafes: [], count: 0, radius: 800 });
  });

  it('answers 504 when Overpass times out', async () => {
    const { deps, fetchMock, log } = createDeps();
    fetchMock.mockImplementation(async () => {
      throw timeoutError();
    });

    const result = await handleCafeSearch(params('lat=52.52&lon=13.405'), deps);

    expect(result.status).toBe(504);
    expect(result.body).toEqual({
      error: 'Overpass request failed',
      details: 'The operation was aborted due to timeout'
    });
    expect(log.error).toHaveBeenCalledWith('Overpass lookup failed', {
      service: 'overpass',
      timedOut: true,
      cause: 'The operation was aborted due to timeout'
    });
  });

  it('answers 502 for other upstream failures', async () => {
    const { deps, fetchMock } = createDeps();
    fetchMock.mockImplementation(async () => new Response('nope', { status: 500 }));

    const result = await handleCafeSearch(params('lat=52.52&lon=13.405'), deps);

    expect(result.status).toBe(502);
    expect(result.body).toEqual({
      error: 'Overpass request failed',
      details: 'Overpass responded with status 500: nope'
    });
  });

  it('answers 502 for unexpected errors', async () => {
    const { deps, fetchMock, sleepMock } = createDeps();
    fetchMock.mockResolvedValueOnce(jsonResponse({ elements: [] }));
    sleepMock.mockRejectedValueOnce(new Error('clock failure'));

    const result = await handleCafeSearch(params('lat=52.52&lon=13.405'), deps);

    expect(result.status).toBe(502);
    expect(result.body).toEqual({ error: 'Failed to fetch cafes', details: 'clock failure' });
  });
});

describe('routeRequest', () => {
  it('answers the health check', async () => {
    const { deps } = createDeps();
    const result = await routeRequest('GET', new URL('http://localhost/healthz'), deps);
    expect(result).toMatchObject({ status: 200, body: { status: 'ok' } });
  });

  it('serves the application shell', async () => {
    const { deps } = createDeps();
    const result = await routeRequest('GET', new URL('http://localhost/'), deps);

    expect(result.type).toBe('html');
    expect(result.status).toBe(200);
    expect(result.body).toContain('<title>Cafe Scout</title>');
  });

  it('dispatches the cafe search', async () => {
    const { deps } = createDeps();
    const result = await routeRequest('GET', new URL('http://localhost/api/cafes?lat=52.5'), deps);
    expect(result).toMatchObject({ status: 400, body: { error: MISSING_COORDINATES_MESSAGE } });
  });

  it('rejects other methods', async () => {
    const { deps } = createDeps();
    const result = await routeRequest('POST', new URL('http://localhost/api/cafes'), deps);
    expect(result).toEqual({
      type: 'json',
      status: 405,
      body: { error: 'Method not allowed' },
      headers: { Allow: 'GET, HEAD' }
    });
  });

  it('answers 404 for unknown paths', async () => {
    const { deps } = createDeps();
    const result = await routeRequest('GET', new URL('http://localhost/toString'), deps);
    expect(result).toMatchObject({ status: 404, body: { error: 'Not found' } });
  });
});
