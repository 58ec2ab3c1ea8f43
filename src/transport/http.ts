import { createServer, type IncomingHttpHeaders, type Server } from 'node:http';
import express from 'express';
import PQueue from 'p-queue';
import { TransportStartError, errorMessage } from '../errors';
import { type Request, createRequest, parseRequestTarget } from '../message/request';
import { type Response, ResponseStatus, errorResponse } from '../message/response';
import type { Router } from '../router/router';
import { BaseTransportAdapter, type TransportAdapterOptions } from './adapter';

export const DEFAULT_HTTP_PORT = 8080;

export interface HttpTransportOptions extends TransportAdapterOptions {
  /** Port to listen on (default: 8080; 0 picks a free port) */
  port?: number;
  /** Interface to bind (default: all interfaces) */
  host?: string;
  /** Largest accepted request body, in body-parser notation (default: "100mb") */
  bodyLimit?: string | number;
}

function headersToMetadata(headers: IncomingHttpHeaders): Record<string, string> {
  const entries: [string, string][] = [];
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    entries.push([name, Array.isArray(value) ? value.join(', ') : value]);
  }
  return Object.fromEntries(entries);
}

function httpStatusOf(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return null;
}

/**
 * Convert an express request into a transport-agnostic Request.
 * @returns null when the URL path is not valid percent-encoding
 */
export function toRequest(req: express.Request): Request | null {
  const target = parseRequestTarget(req.originalUrl);
  let path: string;
  try {
    path = decodeURIComponent(target.path);
  } catch {
    return null;
  }

  const body: unknown = req.body;
  return createRequest(path, {
    queryParams: target.queryParams,
    metadata: headersToMetadata(req.headers),
    ...(Buffer.isBuffer(body) && body.length > 0 ? { body } : {}),
  });
}

export function sendResponse(res: express.Response, response: Response): void {
  res
    .status(response.status)
    .type(response.contentType)
    .send(Buffer.from(response.body));
}

/**
 * Serves a router over local HTTP. Every method on every path goes to the router.
 *
 * start() and stop() run one at a time, in call order.
 */
export class HttpTransportAdapter extends BaseTransportAdapter {
  readonly name = 'http';
  private readonly requestedPort: number;
  private readonly host: string | undefined;
  private readonly bodyLimit: string | number;
  private readonly lifecycle = new PQueue({ concurrency: 1 });
  private server: Server | null = null;

  constructor(options: HttpTransportOptions = {}) {
    super(options);
    this.requestedPort = options.port ?? DEFAULT_HTTP_PORT;
    this.host = options.host;
    this.bodyLimit = options.bodyLimit ?? '100mb';
  }

  get isRunning(): boolean {
    return this.server !== null;
  }

  /** The bound port while running, otherwise null */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  /**
   * Build the express application for the bound router.
   * @throws TransportStartError if no router is bound
   */
  createApp(): express.Application {
    const router = this.requireRouter();
    const app = express();
    app.disable('x-powered-by');
    app.disable('etag');
    app.use(express.raw({ type: () => true, limit: this.bodyLimit }));

    app.use((req: express.Request, res: express.Response, next: express.NextFunction) => {
      this.serve(router, req, res).catch(next);
    });

    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      const status = httpStatusOf(err);
      const message = errorMessage(err);
      this.logger?.warn(`HTTP ${req.method} ${req.originalUrl} failed: ${message}`);
      if (res.headersSent) {
        res.end();
        return;
      }
      const isClientError = status !== null && status >= 400 && status < 500;
      sendResponse(res, errorResponse(message, isClientError ? ResponseStatus.badRequest : ResponseStatus.internalError));
    });

    return app;
  }

  private async serve(router: Router, req: express.Request, res: express.Response): Promise<void> {
    const request = toRequest(req);
    if (!request) {
      sendResponse(res, errorResponse('Malformed URL path', ResponseStatus.badRequest));
      return;
    }
    this.logger?.debug(`HTTP ${req.method} ${request.path}`);
    sendResponse(res, await router.handle(request));
  }

  start(): Promise<void> {
    return this.lifecycle.add(() => this.listen(), { throwOnTimeout: true });
  }

  stop(): Promise<void> {
    return this.lifecycle.add(() => this.close(), { throwOnTimeout: true });
  }

  private async listen(): Promise<void> {
    if (this.server) {
      return;
    }
    const app = this.createApp();
    const server = createServer(app);

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new TransportStartError(this.name, `cannot listen on port ${this.requestedPort}: ${err.message}`, { cause: err }));
      };
      server.once('error', onError);
      server.listen(this.requestedPort, this.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    this.server = server;
    server.on('error', (err) => {
      this.logger?.error(`HTTP server error: ${err.message}`);
    });
    this.logger?.info(`HTTP transport listening on port ${this.port ?? this.requestedPort}`);
  }

  private async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) {
          this.logger?.warn(`HTTP server close failed: ${err.message}`);
        }
        resolve();
      });
      server.closeAllConnections();
    });
    this.logger?.info('HTTP transport stopped');
  }
}
