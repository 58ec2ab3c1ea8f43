import type { Connection, IncomingStreamData, Stream } from '@libp2p/interface';
import { multiaddr } from '@multiformats/multiaddr';
import PQueue from 'p-queue';
import { IdentityError, TransportStartError, XplorerError, errorMessage } from '../errors';
import { BaseTransportAdapter, type TransportAdapterOptions } from '../transport/adapter';
import { encodeFrame, readFrame } from './framing';
import {
  IdentityStore,
  assertSecretKey,
  generateSecretKey,
  getDefaultStoragePath,
  nodeIdFromSecret,
  privateKeyFromSecret,
} from './identity';
import { XPLORER_PROTOCOL, type XplorerNode, createNode, waitOnline } from './node';
import { encodeResponse, parseRequest } from './wire';

export interface P2PTransportOptions extends TransportAdapterOptions {
  /** Directory holding the identity key (default: ~/.xplorer/p2p) */
  storagePath?: string;
  /** Replace the stored identity on every start */
  forceNewIdentity?: boolean;
  /** Use a throwaway in-memory identity; nothing is written */
  ephemeral?: boolean;
  /** Listen multiaddrs (default: all interfaces, random TCP port) */
  listen?: string[];
  /** Circuit relay multiaddrs to dial after startup */
  relays?: string[];
  /** How long start() waits for listen addresses (default: 10s) */
  onlineTimeoutMs?: number;
  /** Concurrent inbound streams per connection (default: unbounded) */
  maxInboundStreams?: number;
}

/**
 * Serves the router over libp2p streams on {@link XPLORER_PROTOCOL}.
 *
 * Each inbound stream carries one exchange: a length-prefixed request
 * document in, a length-prefixed response document out, then the write
 * side is closed. Streams and connections are independent; a protocol
 * violation aborts only the stream it happened on.
 *
 * start(), stop(), importSecretKey() and resetIdentity() run one at a time,
 * in call order.
 */
export class P2PTransportAdapter extends BaseTransportAdapter {
  readonly name = 'p2p';
  private readonly store: IdentityStore;
  private readonly forceNewIdentity: boolean;
  private readonly ephemeral: boolean;
  private readonly listen: string[] | undefined;
  private readonly relays: string[];
  private readonly onlineTimeoutMs: number;
  private readonly maxInboundStreams: number;
  private readonly lifecycle = new PQueue({ concurrency: 1 });
  private node: XplorerNode | null = null;
  private secretKey: Uint8Array | null = null;
  private openConnections = 0;

  constructor(options: P2PTransportOptions = {}) {
    super(options);
    this.store = new IdentityStore(options.storagePath ?? getDefaultStoragePath(), options.logger);
    this.forceNewIdentity = options.forceNewIdentity ?? false;
    this.ephemeral = options.ephemeral ?? false;
    this.listen = options.listen;
    this.relays = options.relays ?? [];
    this.onlineTimeoutMs = options.onlineTimeoutMs ?? 10_000;
    this.maxInboundStreams = options.maxInboundStreams ?? Number.POSITIVE_INFINITY;
  }

  get isRunning(): boolean {
    return this.node !== null;
  }

  get storagePath(): string {
    return this.store.storagePath;
  }

  /** Public node identifier (peer id) while running */
  get nodeId(): string | null {
    return this.node?.peerId.toString() ?? null;
  }

  /** Dialable multiaddrs, each ending in /p2p/<nodeId>; empty while stopped */
  get addresses(): string[] {
    const node = this.node;
    if (!node) {
      return [];
    }
    const suffix = `/p2p/${node.peerId.toString()}`;
    return node.getMultiaddrs().map((address) => {
      const text = address.toString();
      return text.includes('/p2p/') ? text : `${text}${suffix}`;
    });
  }

  get connectionCount(): number {
    return this.openConnections;
  }

  start(): Promise<void> {
    return this.exclusive(() => this.startNode());
  }

  stop(): Promise<void> {
    return this.exclusive(() => this.stopNode());
  }

  /**
   * The active secret key, else the stored one, else null.
   */
  async exportSecretKey(): Promise<Uint8Array | null> {
    if (this.secretKey) {
      return new Uint8Array(this.secretKey);
    }
    return this.store.load();
  }

  /**
   * Replace the stored identity with `key` and clear the rest of the storage directory.
   * @throws IdentityError if the key is not 32 bytes or the adapter is running
   */
  async importSecretKey(key: Uint8Array): Promise<void> {
    assertSecretKey(key);
    return this.exclusive(async () => {
      this.assertIdle('import an identity');
      await this.store.clear();
      await this.store.save(key);
      this.logger?.info(`Imported identity into ${this.store.keyPath}`);
    });
  }

  /**
   * Generate and persist a fresh identity, clearing the storage directory first.
   * @returns the new node id
   * @throws IdentityError if the adapter is running
   */
  resetIdentity(): Promise<string> {
    return this.exclusive(async () => {
      this.assertIdle('reset the identity');
      const key = generateSecretKey();
      await this.store.clear();
      await this.store.save(key);
      const nodeId = await nodeIdFromSecret(key);
      this.logger?.info(`Reset identity, new node id ${nodeId}`);
      return nodeId;
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.lifecycle.add(task, { throwOnTimeout: true });
  }

  private assertIdle(operation: string): void {
    if (this.node) {
      throw new IdentityError('NODE_RUNNING', `Cannot ${operation} while the P2P transport is running`);
    }
  }

  private async startNode(): Promise<void> {
    if (this.node) {
      return;
    }
    this.requireRouter();

    let node: XplorerNode | null = null;
    try {
      const secret = this.ephemeral ? generateSecretKey() : await this.store.loadOrCreate(this.forceNewIdentity);
      node = await createNode({
        privateKey: await privateKeyFromSecret(secret),
        listen: this.listen,
        relays: this.relays,
      });
      node.addEventListener('connection:open', (event) => this.onConnectionOpen(event.detail));
      node.addEventListener('connection:close', (event) => this.onConnectionClose(event.detail));
      await node.handle(XPLORER_PROTOCOL, (data) => this.onStream(data), {
        maxInboundStreams: this.maxInboundStreams,
        runOnLimitedConnection: true,
      });

      await node.start();
      await waitOnline(node, this.onlineTimeoutMs);
      for (const relay of this.relays) {
        await node.dial(multiaddr(relay));
        this.logger?.info(`Connected to relay ${relay}`);
      }

      this.node = node;
      this.secretKey = secret;
    } catch (err) {
      if (node) {
        await this.shutdown(node);
      }
      throw new TransportStartError(this.name, errorMessage(err), { cause: err });
    }

    this.logger?.info(`P2P transport online as ${this.nodeId} on ${this.addresses.join(', ')}`);
  }

  private async stopNode(): Promise<void> {
    const node = this.node;
    if (!node) {
      return;
    }
    this.node = null;
    this.secretKey = null;
    await this.shutdown(node);
    this.logger?.info('P2P transport stopped');
  }

  private async shutdown(node: XplorerNode): Promise<void> {
    try {
      await node.stop();
    } catch (err) {
      this.logger?.warn(`Stopping libp2p node failed: ${errorMessage(err)}`);
    }
    this.openConnections = 0;
  }

  private onConnectionOpen(connection: Connection): void {
    this.openConnections++;
    this.logger?.debug(`Connection ${connection.id} opened from ${connection.remotePeer.toString()}`);
  }

  private onConnectionClose(connection: Connection): void {
    this.openConnections = Math.max(0, this.openConnections - 1);
    this.logger?.debug(`Connection ${connection.id} closed`);
  }

  private onStream({ stream, connection }: IncomingStreamData): void {
    this.serveStream(stream).catch((err: unknown) => {
      this.logger?.warn(`Aborting stream ${stream.id} from ${connection.remotePeer.toString()}: ${errorMessage(err)}`);
      stream.abort(err instanceof Error ? err : new Error(errorMessage(err)));
    });
  }

  private async serveStream(stream: Stream): Promise<void> {
    const router = this.router;
    if (!router) {
      throw new XplorerError('NO_ROUTER', 'No router bound, dropping request');
    }

    const request = parseRequest(await readFrame(stream.source));
    if (!request) {
      throw new XplorerError('MALFORMED_REQUEST', 'Malformed request document');
    }
    this.logger?.debug(`P2P request ${request.path}`);

    const response = await router.handle(request);
    await stream.sink([encodeFrame(encodeResponse(response))]);
    await stream.close();
  }
}
