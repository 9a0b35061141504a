/**
 * Node.js `http` binding for the handler.
 */

import * as http from 'node:http';
import { GqlServeError, InternalServerError, toError } from './errors';
import { createHandler } from './handler';
import type { GraphQLHandler } from './handler';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { JSON_CONTENT_TYPE } from './render';
import type { ServerConfig } from './types';

const DEFAULT_SERVER_OPTIONS = {
  port: 4000,
  host: '0.0.0.0', // Bind to all interfaces by default
  path: '/graphql',
} as const;

/**
 * Anything that answers Fetch API requests.
 */
export interface FetchHandler {
  fetch(request: Request): Promise<Response>;
}

export type NodeListener = (
  req: http.IncomingMessage,
  res: http.ServerResponse
) => Promise<void>;

export interface GqlServer {
  /**
   * Starts the server.
   */
  listen(options?: { port?: number; host?: string }): Promise<ServerInfo>;

  /**
   * Stops the server gracefully.
   */
  stop(): Promise<void>;

  readonly handler: GraphQLHandler;

  /**
   * Returns the underlying HTTP server (if started).
   */
  readonly httpServer: http.Server | null;
}

/**
 * Server info returned after starting.
 */
export interface ServerInfo {
  readonly url: string;
  readonly port: number;
  readonly host: string;
}

/**
 * Converts http.IncomingMessage headers to a Headers object.
 */
function convertHeaders(incomingHeaders: http.IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incomingHeaders)) {
    if (value) {
      if (Array.isArray(value)) {
        for (const v of value) {
          headers.append(key, v);
        }
      } else {
        headers.set(key, value);
      }
    }
  }
  return headers;
}

/**
 * Converts an incoming Node.js request into a Fetch API request. The body
 * is streamed, not buffered.
 */
export function toRequest(req: http.IncomingMessage): Request {
  const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);
  const method = req.method ?? 'GET';
  const hasBody = method !== 'GET' && method !== 'HEAD';

  return new Request(url, {
    method,
    headers: convertHeaders(req.headers),
    body: hasBody ? req : undefined,
    duplex: 'half',
  });
}

/**
 * Writes a Fetch API response to a Node.js response.
 */
export async function sendResponse(response: Response, res: http.ServerResponse): Promise<void> {
  const body = Buffer.from(await response.arrayBuffer());

  res.statusCode = response.status;
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  res.setHeader('Content-Length', body.byteLength);
  res.end(body);
}

/**
 * Sends a JSON error body.
 */
function sendJsonError(res: http.ServerResponse, statusCode: number, error: GqlServeError): void {
  const json = JSON.stringify({ errors: [error.toJSON()] });
  res.statusCode = statusCode;
  res.setHeader('Content-Type', JSON_CONTENT_TYPE);
  res.setHeader('Content-Length', Buffer.byteLength(json));
  res.end(json);
}

/**
 * Adapts a handler to `http.createServer`. Failures escaping the handler
 * are logged and answered with a 500.
 *
 * @example
 * ```typescript
 * const listener = toNodeListener(createHandler({ schema }));
 * http.createServer((req, res) => void listener(req, res)).listen(4000);
 * ```
 */
export function toNodeListener(
  handler: FetchHandler,
  logger: Logger = createLogger()
): NodeListener {
  return async (req, res) => {
    try {
      const response = await handler.fetch(toRequest(req));
      await sendResponse(response, res);
    } catch (error) {
      const cause = toError(error);
      logger.error('Request failed', { method: req.method, url: req.url, error: cause });
      if (!res.headersSent) {
        sendJsonError(res, 500, new InternalServerError(cause.message, cause));
      } else {
        res.destroy(cause);
      }
    }
  };
}

/**
 * Creates a server that mounts a handler on one path.
 *
 * @example
 * ```typescript
 * const server = createServer({ schema, title: 'Books API' });
 * const info = await server.listen({ port: 4000 });
 * // POST http://0.0.0.0:4000/graphql
 * ```
 */
export function createServer(config: ServerConfig): GqlServer {
  const logger = config.logger ?? createLogger();
  const handler = createHandler({ ...config, logger });
  const path = config.path ?? DEFAULT_SERVER_OPTIONS.path;
  const listener = toNodeListener(handler, logger);

  let httpServer: http.Server | null = null;

  const route = (req: http.IncomingMessage, res: http.ServerResponse): void => {
    const { pathname } = new URL(req.url || '/', 'http://localhost');
    if (pathname !== path) {
      sendJsonError(res, 404, new GqlServeError('Not found', 'NOT_FOUND'));
      return;
    }
    void listener(req, res);
  };

  return {
    handler,

    get httpServer() {
      return httpServer;
    },

    async listen(listenOptions) {
      const port = listenOptions?.port ?? config.port ?? DEFAULT_SERVER_OPTIONS.port;
      const host = listenOptions?.host ?? config.host ?? DEFAULT_SERVER_OPTIONS.host;
      const server = http.createServer(route);
      httpServer = server;

      return new Promise<ServerInfo>((resolve, reject) => {
        server.once('error', reject);

        server.listen(port, host, () => {
          const address = server.address();
          const boundPort = typeof address === 'object' && address ? address.port : port;

          logger.info(`Server running at http://${host}:${boundPort}${path}`);
          if (handler.config.playground) {
            logger.info(`Playground available at http://${host}:${boundPort}${path}`);
          }

          resolve({
            url: `http://${host}:${boundPort}`,
            port: boundPort,
            host,
          });
        });
      });
    },

    async stop() {
      const server = httpServer;
      if (!server) {
        return;
      }

      return new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            logger.info('Server stopped');
            httpServer = null;
            resolve();
          }
        });
      });
    },
  };
}
