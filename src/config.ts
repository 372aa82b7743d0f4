import type { JSONSchemaType } from 'ajv';
import { ServiceConfig } from './types.js';
import { ajv } from './validation.js';

const DEFAULT_PORT = 3000;
const DEFAULT_OVERPASS_URL = 'https://overpass-api.de/api/interpreter';
const DEFAULT_USER_AGENT = 'cafe-scout/1.0';
const DEFAULT_OVERPASS_TIMEOUT_SECONDS = 60;
const DEFAULT_RETRY_DELAY_MS = 2000;
const DEFAULT_RADIUS = 4000;
const DEFAULT_MAX_RADIUS = 15000;
const DEFAULT_MIN_RESULTS = 10;
const DEFAULT_MAX_EXPANSIONS = 2;
const MAX_RETRIES = 1;

const configSchema: JSONSchemaType<ServiceConfig> = {
  type: 'object',
  required: [
    'port',
    'overpassUrl',
    'userAgent',
    'overpassTimeoutSeconds',
    'retryDelayMs',
    'maxRetries',
    'defaultRadius',
    'maxRadius',
    'minResults',
    'maxExpansions',
    'filterMode'
  ],
  additionalProperties: false,
  properties: {
    port: { type: 'integer', minimum: 0, maximum: 65535 },
    overpassUrl: { type: 'string', format: 'uri' },
    userAgent: { type: 'string', minLength: 1 },
    overpassTimeoutSeconds: { type: 'integer', minimum: 1 },
    retryDelayMs: { type: 'integer', minimum: 0 },
    maxRetries: { type: 'integer', minimum: 0 },
    defaultRadius: { type: 'integer', minimum: 1 },
    maxRadius: { type: 'integer', minimum: 1 },
    minResults: { type: 'integer', minimum: 0 },
    maxExpansions: { type: 'integer', minimum: 0 },
    filterMode: { type: 'string', enum: ['strict', 'basic'] }
  }
};

const validateConfig = ajv.compile(configSchema);

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const candidate: unknown = {
    port: parseInteger(env.PORT, DEFAULT_PORT),
    overpassUrl: env.OVERPASS_URL?.trim() || DEFAULT_OVERPASS_URL,
    userAgent: env.OVERPASS_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    overpassTimeoutSeconds: parseInteger(env.OVERPASS_TIMEOUT_SECONDS, DEFAULT_OVERPASS_TIMEOUT_SECONDS),
    retryDelayMs: parseInteger(env.OVERPASS_RETRY_DELAY_MS, DEFAULT_RETRY_DELAY_MS),
    maxRetries: MAX_RETRIES,
    defaultRadius: parseInteger(env.CAFE_DEFAULT_RADIUS, DEFAULT_RADIUS),
    maxRadius: parseInteger(env.CAFE_MAX_RADIUS, DEFAULT_MAX_RADIUS),
    minResults: parseInteger(env.CAFE_MIN_RESULTS, DEFAULT_MIN_RESULTS),
    maxExpansions: parseInteger(env.CAFE_MAX_EXPANSIONS, DEFAULT_MAX_EXPANSIONS),
    filterMode: env.CAFE_FILTER_MODE?.trim().toLowerCase() || 'strict'
  };

  if (!validateConfig(candidate)) {
    throw new Error(`Invalid configuration: ${ajv.errorsText(validateConfig.errors)}`);
  }

  if (candidate.maxRadius < candidate.defaultRadius) {
    throw new Error(
      `Invalid configuration: CAFE_MAX_RADIUS (${candidate.maxRadius}) is below CAFE_DEFAULT_RADIUS (${candidate.defaultRadius})`
    );
  }

  return candidate;
}
