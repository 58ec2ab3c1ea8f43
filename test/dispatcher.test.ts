import { describe, it } from 'node:test';
import assert from 'node:assert';
import { setTimeout as delay } from 'node:timers/promises';
import { DispatchQueueFullError } from '../src/errors.js';
import { createRequest } from '../src/message/request.js';
import { bodyText, textResponse } from '../src/message/response.js';
import { Dispatcher } from '../src/router/dispatcher.js';
import { Router } from '../src/router/router.js';

function tracker() {
  let active = 0;
  let peak = 0;
  return {
    async task(ms: number) {
      active++;
      peak = Math.max(peak, active);
      await delay(ms);
      active--;
    },
    get peak() {
      return peak;
    },
  };
}

describe('Dispatcher', () => {
  it('should never overlap affinity tasks', async () => {
    const dispatcher = new Dispatcher();
    const t = tracker();
    await Promise.all([1, 2, 3].map(() => dispatcher.run(true, () => t.task(10))));
    assert.strictEqual(t.peak, 1);
  });

  it('should run worker tasks concurrently', async () => {
    const dispatcher = new Dispatcher();
    const t = tracker();
    await Promise.all([1, 2, 3].map(() => dispatcher.run(false, () => t.task(10))));
    assert.strictEqual(t.peak, 3);
  });

  it('should resolve with the task result', async () => {
    const dispatcher = new Dispatcher();
    assert.strictEqual(await dispatcher.run(true, () => 42), 42);
    assert.strictEqual(await dispatcher.run(false, async () => 'done'), 'done');
  });

  it('should propagate task errors', async () => {
    const dispatcher = new Dispatcher();
    await assert.rejects(
      dispatcher.run(true, () => {
        throw new Error('affinity failure');
      }),
      /affinity failure/
    );
  });

  it('should report the affinity context', async () => {
    const dispatcher = new Dispatcher();
    assert.strictEqual(dispatcher.isOnAffinityContext(), false);
    assert.strictEqual(await dispatcher.run(true, () => dispatcher.isOnAffinityContext()), true);
    assert.strictEqual(await dispatcher.run(false, () => dispatcher.isOnAffinityContext()), false);
  });

  it('should run re-entrant affinity tasks inline', async () => {
    const dispatcher = new Dispatcher();
    const result = await dispatcher.run(true, async () => {
      await delay(1);
      return dispatcher.run(true, () => 'nested');
    });
    assert.strictEqual(result, 'nested');
  });

  it('should queue affinity work left behind by a settled task', async () => {
    const dispatcher = new Dispatcher();
    const t = tracker();
    let background: Promise<boolean> = Promise.resolve(false);

    await dispatcher.run(true, () => {
      background = delay(5).then(async () => {
        const inline = dispatcher.isOnAffinityContext();
        await dispatcher.run(true, () => t.task(30));
        return inline;
      });
    });
    const foreground = dispatcher.run(true, () => t.task(30));

    const [inline] = await Promise.all([background, foreground]);
    assert.strictEqual(inline, false);
    assert.strictEqual(t.peak, 1);
  });

  it('should queue affinity requests left behind by a handler', async () => {
    const router = new Router();
    const t = tracker();
    let background: Promise<unknown> = Promise.resolve();
    router.register('/slow', async () => {
      await t.task(30);
      return textResponse('slow');
    });
    router.register('/kick', () => {
      background = delay(5).then(() => router.handle(createRequest('/slow')));
      return textResponse('kicked');
    });

    assert.strictEqual(bodyText(await router.handle(createRequest('/kick'))), 'kicked');
    const slow = await router.handle(createRequest('/slow'));
    await background;
    assert.strictEqual(bodyText(slow), 'slow');
    assert.strictEqual(t.peak, 1);
  });

  it('should keep the affinity context through the worker pool', async () => {
    const dispatcher = new Dispatcher();
    const result = await dispatcher.run(true, () =>
      dispatcher.run(false, () => dispatcher.run(true, () => dispatcher.isOnAffinityContext()))
    );
    assert.strictEqual(result, true);
  });

  it('should reject once maxPending tasks are waiting', async () => {
    const dispatcher = new Dispatcher({ maxPending: 1 });
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });

    const running = dispatcher.run(true, () => gate);
    const waiting = dispatcher.run(true, () => 'second');
    assert.strictEqual(dispatcher.pending, 1);
    await assert.rejects(dispatcher.run(true, () => 'third'), DispatchQueueFullError);

    release();
    await running;
    assert.strictEqual(await waiting, 'second');
    await dispatcher.drain();
    assert.strictEqual(dispatcher.pending, 0);
  });

  it('should turn a full queue into an internalError response at the router', async () => {
    const dispatcher = new Dispatcher({ maxPending: 1 });
    const router = new Router({ dispatcher });
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    router.register('/slow', async () => {
      await gate;
      return textResponse('slow');
    });

    const first = router.handle(createRequest('/slow'));
    const second = router.handle(createRequest('/slow'));
    const third = await router.handle(createRequest('/slow'));
    assert.strictEqual(third.status, 500);
    assert.deepStrictEqual(JSON.parse(bodyText(third)), { error: 'Affinity queue is full (1 pending)' });

    release();
    assert.strictEqual(bodyText(await first), 'slow');
    assert.strictEqual(bodyText(await second), 'slow');
  });
});
