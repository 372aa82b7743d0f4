import http from 'node:http';
import { describeError } from './errors.js';
import { AppDeps, HandlerResult, routeRequest } from './routes.js';

type ResponseHeaders = Record<string, string>;

function send(
  res: http.ServerResponse,
  statusCode: number,
  body: string,
  contentType: string,
  extraHeaders: ResponseHeaders = {}
): void {
  res.writeHead(statusCode, {
    'Content-Type': contentType,
    'Content-Length': Buffer.byteLength(body).toString(),
    ...extraHeaders
  });
  res.end(body);
}

function sendResult(res: http.ServerResponse, result: HandlerResult): void {
  if (result.type === 'html') {
    send(res, result.status, result.body, 'text/html; charset=utf-8');
    return;
  }
  send(res, result.status, JSON.stringify(result.body), 'application/json; charset=utf-8', result.headers);
}

export function createServer(deps: AppDeps): http.Server {
  const { log } = deps;

  return http.createServer(async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    try {
      const result = await routeRequest(req.method ?? 'GET', url, deps);
      sendResult(res, result);
    } catch (error) {
      log.error('Unhandled server error', {
        path: url.pathname,
        error: describeError(error)
      });
      sendResult(res, { type: 'json', status: 500, body: { error: 'Internal server error' } });
    }
  });
}
