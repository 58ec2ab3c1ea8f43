import { AsyncLocalStorage, AsyncResource } from 'node:async_hooks';
import PQueue from 'p-queue';
import { DispatchQueueFullError } from '../errors';

export interface DispatcherOptions {
  /** Most tasks allowed to wait for the affinity context (default: 1000) */
  maxPending?: number;
  /** Concurrency of the worker pool for non-affinity tasks (default: unbounded) */
  workerConcurrency?: number;
}

/**
 * Runs handler invocations either on the single affinity context or on the worker pool.
 *
 * The affinity context is a concurrency-1 queue: tasks bound to it never overlap.
 * A task that is part of the async chain of the affinity task currently
 * holding the queue runs inline when it asks for the affinity context again,
 * so the queue never waits on itself. Work left behind by a task that has
 * already settled is queued like any other caller.
 */
export class Dispatcher {
  private readonly affinity = new PQueue({ concurrency: 1 });
  private readonly workers: PQueue;
  /** Token of the affinity task that owns the async chain */
  private readonly onAffinity = new AsyncLocalStorage<symbol>();
  /** Token of the affinity task holding the queue, if any */
  private activeToken: symbol | null = null;
  private readonly maxPending: number;

  constructor(options: DispatcherOptions = {}) {
    this.maxPending = options.maxPending ?? 1000;
    this.workers = new PQueue({ concurrency: options.workerConcurrency ?? Number.POSITIVE_INFINITY });
  }

  /**
   * True while executing inside the running affinity task (or anything it awaits).
   */
  isOnAffinityContext(): boolean {
    const token = this.onAffinity.getStore();
    return token !== undefined && token === this.activeToken;
  }

  /** Tasks waiting for the affinity context */
  get pending(): number {
    return this.affinity.size;
  }

  /**
   * Run `task` under the given affinity and resolve with its result.
   * @throws DispatchQueueFullError when the affinity queue is at capacity
   */
  async run<T>(runsOnAffinity: boolean, task: () => T | Promise<T>): Promise<T> {
    if (!runsOnAffinity) {
      // Bound so the caller's affinity token follows the task into the pool.
      return this.workers.add(AsyncResource.bind(async () => task()), { throwOnTimeout: true });
    }

    if (this.isOnAffinityContext()) {
      return task();
    }

    if (this.affinity.size >= this.maxPending) {
      throw new DispatchQueueFullError(this.maxPending);
    }

    return this.affinity.add(() => this.runExclusive(task), { throwOnTimeout: true });
  }

  private async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const token = Symbol('affinity');
    this.activeToken = token;
    try {
      return await this.onAffinity.run(token, async () => task());
    } finally {
      this.activeToken = null;
    }
  }

  /**
   * Resolve once both queues are empty and idle.
   */
  async drain(): Promise<void> {
    await Promise.all([this.affinity.onIdle(), this.workers.onIdle()]);
  }
}
