import { Logger } from './log.js';
import { ServiceConfig } from './types.js';

export type Sleep = (ms: number) => Promise<void>;
export type Fetch = typeof fetch;

export interface OverpassClientDeps {
  config: ServiceConfig;
  log: Logger;
  fetch: Fetch;
  sleep: Sleep;
}

export type OverpassResult =
  | { kind: 'ok'; payload: unknown }
  | { kind: 'timeout'; error: Error }
  | { kind: 'failure'; error: Error };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function failed(error: unknown): OverpassResult {
  return isTimeoutError(error)
    ? { kind: 'timeout', error: toError(error) }
    : { kind: 'failure', error: toError(error) };
}

async function attemptRequest(query: string, deps: OverpassClientDeps): Promise<OverpassResult> {
  const { config } = deps;

  try {
    const response = await deps.fetch(config.overpassUrl, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'text/plain; charset=utf-8',
        'User-Agent': config.userAgent
      },
      body: query,
      signal: AbortSignal.timeout(config.overpassTimeoutSeconds * 1000)
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      return {
        kind: 'failure',
        error: new Error(`Overpass responded with status ${response.status}: ${body}`)
      };
    }

    const payload: unknown = await response.json();
    return { kind: 'ok', payload };
  } catch (error) {
    return failed(error);
  }
}

/**
 * Posts an Overpass QL query and returns the decoded JSON body.
 *
 * Any failed attempt (error status, unreadable body, timeout, network error) is retried
 * `config.maxRetries` times after `config.retryDelayMs`. Failures are returned as a tagged
 * result rather than thrown so callers can tell a timeout apart from other upstream errors;
 * the kind reflects the last attempt.
 */
export async function requestOverpass(query: string, deps: OverpassClientDeps): Promise<OverpassResult> {
  const { config, log } = deps;
  const attempts = config.maxRetries + 1;
  let result = await attemptRequest(query, deps);

  for (let attempt = 1; attempt < attempts && result.kind !== 'ok'; attempt += 1) {
    log.info('Retrying Overpass request', {
      attempt,
      reason: result.error.message,
      delay: config.retryDelayMs
    });
    await deps.sleep(config.retryDelayMs);
    result = await attemptRequest(query, deps);
  }

  return result;
}
