/**
 * Base class for every error the agent raises itself.
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export class XplorerError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid setup: bad prefixes, double mounting, rebinding a transport, bad config files.
 * Raised while wiring things together, never while serving a request.
 */
export class ConfigurationError extends XplorerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
  }
}

/**
 * A path is already taken in a router's namespace, directly or by a mount prefix.
 */
export class RouteConflictError extends XplorerError {
  readonly path: string;

  constructor(path: string, message: string) {
    super('ROUTE_CONFLICT', message);
    this.path = path;
  }
}

/**
 * Mounting would make a router reachable from itself.
 */
export class MountCycleError extends XplorerError {
  constructor(prefix: string) {
    super('MOUNT_CYCLE', `Mounting at ${prefix} would create a cycle`);
  }
}

/**
 * The router tree is read-only while transports are serving it.
 */
export class RouterLockedError extends XplorerError {
  constructor(operation: string) {
    super('ROUTER_LOCKED', `Cannot ${operation}: router is locked while transports are running`);
  }
}

/**
 * The affinity queue already holds its maximum number of waiting tasks.
 */
export class DispatchQueueFullError extends XplorerError {
  constructor(limit: number) {
    super('DISPATCH_QUEUE_FULL', `Affinity queue is full (${limit} pending)`);
  }
}

/**
 * A transport could not come up. The cause carries the underlying fault.
 */
export class TransportStartError extends XplorerError {
  constructor(transport: string, message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_START', `${transport}: ${message}`, options);
  }
}

export type IdentityErrorCode = 'INVALID_KEY_LENGTH' | 'NODE_RUNNING';

/**
 * Identity operations that cannot proceed (wrong key size, adapter not idle).
 */
export class IdentityError extends XplorerError {
  constructor(code: IdentityErrorCode, message: string) {
    super(code, message);
  }
}

export type FrameErrorCode = 'INVALID_LENGTH' | 'TRUNCATED';

/**
 * Protocol violation on a single P2P stream. Aborts that stream only.
 */
export class FrameError extends XplorerError {
  constructor(code: FrameErrorCode, message: string) {
    super(code, message);
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
