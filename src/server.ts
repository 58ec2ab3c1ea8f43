import { networkInterfaces } from 'node:os';
import { ConfigurationError, errorMessage } from './errors';
import type { Logger } from './logger';
import type { Request } from './message/request';
import type { Response } from './message/response';
import { P2PTransportAdapter, type P2PTransportOptions } from './p2p/adapter';
import type { Dispatcher } from './router/dispatcher';
import { registerIndexEndpoint } from './router/index-endpoint';
import { Router } from './router/router';
import type { RouteHandler, RouteOptions } from './router/types';
import type { TransportAdapter } from './transport/adapter';
import { HttpTransportAdapter, type HttpTransportOptions } from './transport/http';

export interface XplorerServerOptions {
  /** Description of the root router */
  description?: string;
  logger?: Logger;
  dispatcher?: Dispatcher;
  /** Register the self-description document at "/" (default: true) */
  indexEndpoint?: boolean;
}

/**
 * Owns the root router and the transports that serve it.
 *
 * Register endpoints and mount routers first, then start(). The router tree
 * is locked while the server runs.
 */
export class XplorerServer {
  readonly router: Router;
  private readonly logger: Logger | null;
  private readonly adapters: TransportAdapter[] = [];

  constructor(options: XplorerServerOptions = {}) {
    this.logger = options.logger ?? null;
    this.router = new Router({
      description: options.description ?? 'Xplorer debugging agent',
      dispatcher: options.dispatcher,
      logger: options.logger,
    });
    if (options.indexEndpoint ?? true) {
      registerIndexEndpoint(this.router);
    }
  }

  /** True while any transport is running */
  get isRunning(): boolean {
    return this.adapters.some((transport) => transport.isRunning);
  }

  get transports(): readonly TransportAdapter[] {
    return [...this.adapters];
  }

  addTransport<T extends TransportAdapter>(transport: T): T {
    transport.bind(this.router);
    if (!this.adapters.includes(transport)) {
      this.adapters.push(transport);
    }
    return transport;
  }

  /**
   * Stop `transport` and forget it.
   */
  async removeTransport(transport: TransportAdapter): Promise<void> {
    const index = this.adapters.indexOf(transport);
    if (index === -1) {
      return;
    }
    this.adapters.splice(index, 1);
    await transport.stop();
  }

  /**
   * Start every transport in the order added. If one fails, those already
   * started are stopped again and the failure is rethrown.
   */
  async start(): Promise<void> {
    this.router.lock();
    const started: TransportAdapter[] = [];
    try {
      for (const transport of this.adapters) {
        await transport.start();
        started.push(transport);
      }
    } catch (err) {
      this.logger?.error(`Server failed to start: ${errorMessage(err)}`);
      await Promise.all(started.map((transport) => transport.stop()));
      this.router.unlock();
      throw err;
    }
    this.logger?.info(`Server started with transports: ${this.adapters.map((t) => t.name).join(', ') || 'none'}`);
  }

  async stop(): Promise<void> {
    await Promise.all(this.adapters.map((transport) => transport.stop()));
    this.router.unlock();
    this.logger?.info('Server stopped');
  }

  /**
   * Register an endpoint on the root router.
   *
   * @example
   * server.register('/custom/user', { description: 'Current user' }, () => jsonResponse({ name: 'test-user' }));
   */
  register(path: string, handler: RouteHandler): void;
  register(path: string, options: RouteOptions, handler: RouteHandler): void;
  register(path: string, optionsOrHandler: RouteOptions | RouteHandler, handler?: RouteHandler): void {
    if (typeof optionsOrHandler === 'function') {
      this.router.register(path, optionsOrHandler);
    } else if (handler) {
      this.router.register(path, optionsOrHandler, handler);
    } else {
      throw new ConfigurationError(`No handler given for ${path}`);
    }
  }

  /** Quick registration: assign a handler, or null to remove it */
  route(path: string, handler: RouteHandler | null): void {
    this.router.set(path, handler);
  }

  mount(prefix: string, router: Router): void {
    this.router.mount(prefix, router);
  }

  /** Route a request in process, without any transport */
  handle(request: Request): Promise<Response> {
    return this.router.handle(request);
  }

  /**
   * A server with one HTTP transport.
   */
  static withHttp(
    options: XplorerServerOptions & { http?: HttpTransportOptions } = {}
  ): { server: XplorerServer; http: HttpTransportAdapter } {
    const server = new XplorerServer(options);
    const http = server.addTransport(new HttpTransportAdapter({ logger: options.logger, ...options.http }));
    return { server, http };
  }

  /**
   * A server reachable both over local HTTP and over P2P.
   */
  static withHttpAndP2P(
    options: XplorerServerOptions & { http?: HttpTransportOptions; p2p?: P2PTransportOptions } = {}
  ): { server: XplorerServer; http: HttpTransportAdapter; p2p: P2PTransportAdapter } {
    const { server, http } = XplorerServer.withHttp(options);
    const p2p = server.addTransport(new P2PTransportAdapter({ logger: options.logger, ...options.p2p }));
    return { server, http, p2p };
  }
}

/**
 * First non-internal IPv4 address of this machine, if any.
 */
export function getLanAddress(): string | null {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        return address.address;
      }
    }
  }
  return null;
}
