import http, { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../logger.js';
import defaultRegistry, { type MetricsRegistry } from '../metrics/index.js';

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';
const HEALTH_PATH = '/healthz';

export interface HttpServerOptions {
  port?: number;
  host?: string;
  path?: string;
  registry?: MetricsRegistry;
  health?: () => Record<string, unknown>;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

/**
 * Serves the registry in Prometheus text format. Rendering happens per request, so scrapes never
 * wait on probe cycles.
 */
export async function startHttpServer(options: HttpServerOptions = {}): Promise<HttpServerRuntime> {
  const port = options.port ?? 8001;
  const host = options.host ?? '0.0.0.0';
  const metricsPath = options.path ?? '/metrics';
  const registry = options.registry ?? defaultRegistry;

  const server = http.createServer((req, res) => {
    try {
      handleRequest(req, res, { metricsPath, registry, health: options.health });
    } catch (error) {
      logger.error({ err: error, url: req.url }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  server.on('error', error => {
    logger.error({ err: error }, 'HTTP server error');
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host, path: metricsPath }, 'Metrics server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      })
  };
}

type RouteContext = {
  metricsPath: string;
  registry: MetricsRegistry;
  health?: () => Record<string, unknown>;
};

function handleRequest(req: IncomingMessage, res: ServerResponse, context: RouteContext) {
  const { pathname } = new URL(req.url ?? '/', 'http://localhost');

  if (pathname !== context.metricsPath && pathname !== HEALTH_PATH) {
    sendJson(res, 404, { error: 'Not found' });
    return;
  }

  if (req.method !== 'GET' && req.method !== 'HEAD') {
    res.setHeader('Allow', 'GET, HEAD');
    sendJson(res, 405, { error: 'Method not allowed' });
    return;
  }

  if (pathname === HEALTH_PATH) {
    sendJson(res, 200, { status: 'ok', ...(context.health?.() ?? {}) }, req.method === 'HEAD');
    return;
  }

  const body = context.registry.formatPrometheus();
  res.writeHead(200, {
    'Content-Type': PROMETHEUS_CONTENT_TYPE,
    'Content-Length': Buffer.byteLength(body)
  });
  res.end(req.method === 'HEAD' ? undefined : body);
}

function sendJson(res: ServerResponse, statusCode: number, payload: unknown, headOnly = false) {
  const body = JSON.stringify(payload);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body)
  });
  res.end(headOnly ? undefined : body);
}
