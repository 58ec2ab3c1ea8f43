import { ConfigurationError, TransportStartError } from '../errors';
import type { Logger } from '../logger';
import type { Router } from '../router/router';

/**
 * A way of delivering requests to a router (HTTP, P2P, ...).
 *
 * Implementations keep no request state between calls. Several adapters
 * may be bound to the same router and run at the same time.
 */
export interface TransportAdapter {
  readonly name: string;
  readonly router: Router | null;
  readonly isRunning: boolean;
  /** Attach the router this transport serves. Binding a second router throws. */
  bind(router: Router): void;
  /** Resolves once the transport is fully listening. Idempotent. */
  start(): Promise<void>;
  /** Resolves once everything start() acquired is released. Idempotent, never rejects. */
  stop(): Promise<void>;
}

export interface TransportAdapterOptions {
  logger?: Logger;
}

/**
 * Shared binding logic for transport adapters.
 */
export abstract class BaseTransportAdapter implements TransportAdapter {
  abstract readonly name: string;
  abstract readonly isRunning: boolean;
  protected readonly logger: Logger | null;
  private boundRouter: Router | null = null;

  constructor(options: TransportAdapterOptions = {}) {
    this.logger = options.logger ?? null;
  }

  get router(): Router | null {
    return this.boundRouter;
  }

  bind(router: Router): void {
    if (this.boundRouter === router) {
      return;
    }
    if (this.boundRouter) {
      throw new ConfigurationError(`${this.name} transport is already bound to a router`);
    }
    this.boundRouter = router;
  }

  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;

  /**
   * The bound router, for use in start().
   * @throws TransportStartError if nothing is bound
   */
  protected requireRouter(): Router {
    if (!this.boundRouter) {
      throw new TransportStartError(this.name, 'no router bound');
    }
    return this.boundRouter;
  }
}
