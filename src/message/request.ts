/**
 * A transport-agnostic request. Frozen once constructed.
 */
export interface Request {
  /** Absolute path, e.g. "/files/list" */
  readonly path: string;
  readonly queryParams: Readonly<Record<string, string>>;
  readonly body?: Uint8Array;
  /** Transport headers and annotations */
  readonly metadata: Readonly<Record<string, string>>;
}

export interface RequestOptions {
  queryParams?: Record<string, string>;
  body?: Uint8Array;
  metadata?: Record<string, string>;
}

/**
 * Build a request. A missing leading slash is added to the path.
 */
export function createRequest(path: string, options: RequestOptions = {}): Request {
  const request: Request = {
    path: path.startsWith('/') ? path : `/${path}`,
    queryParams: Object.freeze({ ...options.queryParams }),
    metadata: Object.freeze({ ...options.metadata }),
    ...(options.body !== undefined ? { body: options.body } : {}),
  };
  return Object.freeze(request);
}

/**
 * Copy of `request` addressed to another path. Used when a router strips a mount prefix.
 */
export function withPath(request: Request, path: string): Request {
  return createRequest(path, {
    queryParams: request.queryParams,
    metadata: request.metadata,
    body: request.body,
  });
}

/**
 * Split "path?query" into a path and a query map. When a key repeats, the last value wins.
 *
 * @example parseRequestTarget('/echo?name=Kyle') // { path: '/echo', queryParams: { name: 'Kyle' } }
 */
export function parseRequestTarget(target: string): { path: string; queryParams: Record<string, string> } {
  const queryIndex = target.indexOf('?');
  const rawPath = queryIndex === -1 ? target : target.slice(0, queryIndex);
  const queryParams: Record<string, string> =
    queryIndex === -1 ? {} : Object.fromEntries(new URLSearchParams(target.slice(queryIndex + 1)));

  const path = rawPath.length === 0 ? '/' : rawPath;
  return { path: path.startsWith('/') ? path : `/${path}`, queryParams };
}
