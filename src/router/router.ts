import { ConfigurationError, MountCycleError, RouteConflictError, RouterLockedError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { type Request, withPath } from '../message/request';
import { type Response, errorResponse, notFoundResponse } from '../message/response';
import { Dispatcher } from './dispatcher';
import {
  type EndpointEntry,
  type EndpointInfo,
  type RouteEntry,
  type RouteHandler,
  type RouteOptions,
  type RouterInfo,
  toParameterInfo,
} from './types';

export interface RouterOptions {
  /** Shown in the self-description document */
  description?: string;
  /** Execution contexts for handlers; a router creates its own when omitted */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

interface ResolvedRoute {
  entry: EndpointEntry;
  /** Path as seen by the router that owns the entry */
  path: string;
}

/**
 * Join a router's base path and one of its own paths.
 */
function joinPath(base: string, path: string): string {
  if (base === '/') {
    return path;
  }
  return path === '/' ? base : `${base}${path}`;
}

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function overlaps(a: string, b: string): boolean {
  return a === b || a.startsWith(`${b}/`) || b.startsWith(`${a}/`);
}

/**
 * Transport-agnostic router: a registry of endpoints plus mounted sub-routers.
 *
 * Lookup is by exact path (a single trailing slash is ignored). A request whose
 * path falls under a mount prefix is delegated to the mounted router with the
 * prefix stripped. Handlers run through the root router's {@link Dispatcher}.
 *
 * @example
 * const files = new Router({ description: 'File browsing' });
 * files.register('/list', { description: 'List a directory', runsOnMainThread: false }, listFiles);
 * root.mount('/files', files); // reachable at /files/list
 */
export class Router {
  description: string;
  private readonly endpoints = new Map<string, EndpointEntry>();
  private readonly mounts = new Map<string, Router>();
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger | null;
  private parent: Router | null = null;
  private mountPrefix: string | null = null;
  private locked = false;
  private notFoundHandler: RouteHandler = () => notFoundResponse('Endpoint not found');

  constructor(options: RouterOptions = {}) {
    this.description = options.description ?? '';
    this.dispatcher = options.dispatcher ?? new Dispatcher();
    this.logger = options.logger ?? null;
  }

  /**
   * Register an endpoint.
   * @throws RouteConflictError if the path is taken here or lies under a mount prefix
   */
  register(path: string, handler: RouteHandler): void;
  register(path: string, options: RouteOptions, handler: RouteHandler): void;
  register(path: string, optionsOrHandler: RouteOptions | RouteHandler, maybeHandler?: RouteHandler): void {
    const options = typeof optionsOrHandler === 'function' ? {} : optionsOrHandler;
    const handler = typeof optionsOrHandler === 'function' ? optionsOrHandler : maybeHandler;
    if (!handler) {
      throw new ConfigurationError(`No handler given for ${path}`);
    }
    this.insert(path, options, handler, false);
  }

  /**
   * Quick registration. Assigning replaces any endpoint at `path`; `null` removes it.
   */
  set(path: string, handler: RouteHandler | null): void {
    if (handler) {
      this.insert(path, {}, handler, true);
    } else {
      this.remove(path);
    }
  }

  /** The handler registered directly at `path` */
  get(path: string): RouteHandler | undefined {
    return this.endpoints.get(path)?.handler;
  }

  /**
   * Remove a direct endpoint.
   * @returns true if one was registered
   */
  remove(path: string): boolean {
    this.assertUnlocked(`remove ${path}`);
    return this.endpoints.delete(path);
  }

  setNotFoundHandler(handler: RouteHandler): void {
    this.notFoundHandler = handler;
  }

  /**
   * Attach `router` under `prefix`. The router keeps its own registrations.
   * @throws MountCycleError if `router` is this router or one of its ancestors
   * @throws RouteConflictError if `prefix` collides with an endpoint or another mount
   */
  mount(prefix: string, router: Router): void {
    this.assertUnlocked(`mount ${prefix}`);
    if (!prefix.startsWith('/') || prefix === '/' || prefix.endsWith('/')) {
      throw new ConfigurationError(`Invalid mount prefix: "${prefix}"`);
    }
    if (router.isAncestorOf(this)) {
      throw new MountCycleError(prefix);
    }
    if (router.parent) {
      throw new ConfigurationError(`Router is already mounted at ${router.basePath}`);
    }
    for (const existing of this.mounts.keys()) {
      if (overlaps(prefix, existing)) {
        throw new RouteConflictError(prefix, `Mount prefix ${prefix} collides with router mounted at ${existing}`);
      }
    }
    for (const path of this.endpoints.keys()) {
      if (overlaps(path, prefix)) {
        throw new RouteConflictError(prefix, `Mount prefix ${prefix} collides with route ${path}`);
      }
    }

    router.parent = this;
    router.mountPrefix = prefix;
    this.mounts.set(prefix, router);
  }

  /**
   * Detach the router mounted at `prefix`.
   * @returns the detached router, or undefined if nothing was mounted there
   */
  unmount(prefix: string): Router | undefined {
    this.assertUnlocked(`unmount ${prefix}`);
    const router = this.mounts.get(prefix);
    if (!router) {
      return undefined;
    }
    this.mounts.delete(prefix);
    router.parent = null;
    router.mountPrefix = null;
    return router;
  }

  /**
   * Make this router and everything mounted under it read-only.
   */
  lock(): void {
    this.locked = true;
    for (const router of this.mounts.values()) {
      router.lock();
    }
  }

  unlock(): void {
    this.locked = false;
    for (const router of this.mounts.values()) {
      router.unlock();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Route a request and resolve with the handler's response.
   * Never rejects: handler faults become internalError responses.
   */
  async handle(request: Request): Promise<Response> {
    const resolved = this.resolve(request.path);

    try {
      if (!resolved) {
        return await this.notFoundHandler(request);
      }
      const { entry, path } = resolved;
      const routed = path === request.path ? request : withPath(request, path);
      return await this.dispatcher.run(entry.runsOnMainThread, () => entry.handler(routed));
    } catch (error) {
      const message = errorMessage(error);
      this.logger?.error(`Handler for ${request.path} failed: ${message}`);
      return errorResponse(message);
    }
  }

  private resolve(path: string): ResolvedRoute | null {
    const direct = this.endpoints.get(path);
    if (direct) {
      return { entry: direct, path };
    }

    if (path.length > 1 && path.endsWith('/')) {
      const trimmed = path.slice(0, -1);
      const entry = this.endpoints.get(trimmed);
      if (entry) {
        return { entry, path: trimmed };
      }
    }

    for (const [prefix, router] of this.mounts) {
      if (path === prefix || path.startsWith(`${prefix}/`)) {
        return router.resolve(path.slice(prefix.length) || '/');
      }
    }
    return null;
  }

  /** Full path this router is reachable at from the root ("/" for a root) */
  get basePath(): string {
    if (!this.parent || this.mountPrefix === null) {
      return '/';
    }
    return joinPath(this.parent.basePath, this.mountPrefix);
  }

  /** Directly registered paths, sorted */
  get registeredPaths(): string[] {
    return [...this.endpoints.keys()].sort();
  }

  /** Endpoints in this router and every router mounted under it */
  get totalEndpointCount(): number {
    let count = this.endpoints.size;
    for (const router of this.mounts.values()) {
      count += router.totalEndpointCount;
    }
    return count;
  }

  /** Direct endpoints and mounts, in registration order */
  get entries(): RouteEntry<Router>[] {
    const mounts = [...this.mounts].map(([path, router]) => ({ kind: 'mount' as const, path, router }));
    return [...this.endpoints.values(), ...mounts];
  }

  /**
   * Self-description document. When `deep` is false, mounted routers are
   * reported as summaries (path, description, endpointCount).
   */
  routerInfo(deep = true): RouterInfo {
    const base = this.basePath;
    const endpoints: EndpointInfo[] = [...this.endpoints.values()]
      .map((entry) => ({
        path: joinPath(base, entry.path),
        description: entry.description,
        runsOnMainThread: entry.runsOnMainThread,
        ...(entry.parameters.length > 0 ? { parameters: entry.parameters.map((p) => ({ ...p })) } : {}),
      }))
      .sort((a, b) => comparePaths(a.path, b.path));

    const routers = [...this.mounts.values()].map((router) =>
      deep ? router.routerInfo(true) : router.summary()
    );

    return {
      path: base,
      description: this.description,
      endpointCount: this.totalEndpointCount,
      endpoints,
      routers,
    };
  }

  private summary(): RouterInfo {
    return {
      path: this.basePath,
      description: this.description,
      endpointCount: this.totalEndpointCount,
    };
  }

  private insert(path: string, options: RouteOptions, handler: RouteHandler, replace: boolean): void {
    this.assertUnlocked(`register ${path}`);
    if (!path.startsWith('/')) {
      throw new ConfigurationError(`Route path must start with "/": ${path}`);
    }
    if (!replace && this.endpoints.has(path)) {
      throw new RouteConflictError(path, `Route already registered: ${path}`);
    }
    for (const prefix of this.mounts.keys()) {
      if (overlaps(path, prefix)) {
        throw new RouteConflictError(path, `Route ${path} collides with router mounted at ${prefix}`);
      }
    }

    this.endpoints.set(path, {
      kind: 'endpoint',
      path,
      description: options.description ?? '',
      parameters: (options.parameters ?? []).map(toParameterInfo),
      runsOnMainThread: options.runsOnMainThread ?? true,
      handler,
    });
  }

  private isAncestorOf(router: Router): boolean {
    for (let node: Router | null = router; node; node = node.parent) {
      if (node === this) {
        return true;
      }
    }
    return false;
  }

  private assertUnlocked(operation: string): void {
    if (this.locked) {
      throw new RouterLockedError(operation);
    }
  }
}
