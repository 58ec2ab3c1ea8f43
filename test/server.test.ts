import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { RouterLockedError, TransportStartError } from '../src/errors.js';
import { createRequest } from '../src/message/request.js';
import { bodyText, jsonResponse, textResponse } from '../src/message/response.js';
import { P2PClient } from '../src/p2p/client.js';
import { Router } from '../src/router/router.js';
import { XplorerServer } from '../src/server.js';
import { BaseTransportAdapter } from '../src/transport/adapter.js';

class FakeTransport extends BaseTransportAdapter {
  readonly name: string;
  running = false;
  starts = 0;
  stops = 0;
  private readonly failOnStart: boolean;

  constructor(name: string, failOnStart = false) {
    super();
    this.name = name;
    this.failOnStart = failOnStart;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    this.requireRouter();
    this.starts++;
    if (this.failOnStart) {
      throw new TransportStartError(this.name, 'port in use');
    }
    this.running = true;
  }

  async stop(): Promise<void> {
    this.stops++;
    this.running = false;
  }
}

describe('XplorerServer', () => {
  let server: XplorerServer | null = null;

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  describe('routing', () => {
    it('should register the self-description document at /', async () => {
      server = new XplorerServer({ description: 'Test agent' });
      server.register('/custom/user', { description: 'Current user' }, () => jsonResponse({ name: 'test-user' }));

      const response = await server.handle(createRequest('/'));
      assert.strictEqual(response.status, 200);
      const info: unknown = JSON.parse(bodyText(response));
      assert.ok(typeof info === 'object' && info !== null);
      assert.ok('description' in info && 'endpointCount' in info);
      assert.strictEqual(info.description, 'Test agent');
      assert.strictEqual(info.endpointCount, 2);
    });

    it('should leave / free when the index endpoint is disabled', async () => {
      server = new XplorerServer({ indexEndpoint: false });
      const response = await server.handle(createRequest('/'));
      assert.strictEqual(response.status, 404);
    });

    it('should route registered, assigned and mounted endpoints', async () => {
      server = new XplorerServer();
      server.register('/ping', () => textResponse('pong'));
      server.route('/quick', () => textResponse('quick'));
      const files = new Router({ description: 'Files' });
      files.register('/list', () => textResponse('listing'));
      server.mount('/files', files);

      assert.strictEqual(bodyText(await server.handle(createRequest('/ping'))), 'pong');
      assert.strictEqual(bodyText(await server.handle(createRequest('/quick'))), 'quick');
      assert.strictEqual(bodyText(await server.handle(createRequest('/files/list'))), 'listing');

      server.route('/quick', null);
      assert.strictEqual((await server.handle(createRequest('/quick'))).status, 404);
    });
  });

  describe('lifecycle', () => {
    it('should lock the router while running', async () => {
      server = new XplorerServer();
      const transport = server.addTransport(new FakeTransport('fake'));
      await server.start();

      assert.strictEqual(server.isRunning, true);
      assert.strictEqual(transport.router, server.router);
      assert.throws(() => server?.register('/late', () => textResponse('late')), RouterLockedError);

      await server.stop();
      assert.strictEqual(server.isRunning, false);
      server.register('/late', () => textResponse('late'));
    });

    it('should stop started transports when a later one fails', async () => {
      server = new XplorerServer();
      const first = server.addTransport(new FakeTransport('first'));
      const broken = server.addTransport(new FakeTransport('broken', true));
      const never = server.addTransport(new FakeTransport('never'));

      await assert.rejects(server.start(), TransportStartError);
      assert.strictEqual(first.running, false);
      assert.strictEqual(first.stops, 1);
      assert.strictEqual(broken.starts, 1);
      assert.strictEqual(never.starts, 0);
      assert.strictEqual(server.router.isLocked, false);
    });

    it('should add a transport once and stop it on removal', async () => {
      server = new XplorerServer();
      const transport = new FakeTransport('fake');
      server.addTransport(transport);
      server.addTransport(transport);
      assert.strictEqual(server.transports.length, 1);

      await server.start();
      await server.removeTransport(transport);
      assert.strictEqual(transport.running, false);
      assert.deepStrictEqual(server.transports, []);
    });
  });

  describe('factories', () => {
    it('should serve over HTTP', async () => {
      const created = XplorerServer.withHttp({ http: { port: 0, host: '127.0.0.1' } });
      server = created.server;
      server.register('/echo', (request) => textResponse(request.queryParams.name ?? ''));
      await server.start();

      const port = created.http.port;
      assert.ok(port !== null && port > 0);
      const res = await fetch(`http://127.0.0.1:${port}/echo?name=Kyle`);
      assert.strictEqual(res.status, 200);
      assert.strictEqual(await res.text(), 'Kyle');
    });

    it('should serve the same router over HTTP and P2P', async () => {
      const created = XplorerServer.withHttpAndP2P({
        http: { port: 0, host: '127.0.0.1' },
        p2p: { ephemeral: true, listen: ['/ip4/127.0.0.1/tcp/0'] },
      });
      server = created.server;
      server.register('/echo', (request) => textResponse(request.queryParams.name ?? ''));
      await server.start();

      const res = await fetch(`http://127.0.0.1:${created.http.port}/echo?name=Kyle`);
      assert.strictEqual(await res.text(), 'Kyle');

      const [address] = created.p2p.addresses;
      assert.ok(address);
      const client = await P2PClient.create({ timeoutMs: 10_000 });
      try {
        const response = await client.request(address, createRequest('/echo', { queryParams: { name: 'Kyle' } }));
        assert.strictEqual(bodyText(response), 'Kyle');
      } finally {
        await client.stop();
      }
    });
  });
});
