import type { Stream } from '@libp2p/interface';
import { multiaddr } from '@multiformats/multiaddr';
import { XplorerError } from '../errors';
import type { Logger } from '../logger';
import type { Request } from '../message/request';
import type { Response } from '../message/response';
import { encodeFrame, readFrame } from './framing';
import { generateSecretKey, privateKeyFromSecret } from './identity';
import { XPLORER_PROTOCOL, type XplorerNode, createNode } from './node';
import { encodeRequest, parseResponse } from './wire';

export interface P2PClientOptions {
  /** Per-request deadline, dial included (default: 30s) */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Dial-only libp2p node that sends requests to an agent.
 * Uses a fresh ephemeral identity per client.
 */
export class P2PClient {
  private readonly node: XplorerNode;
  private readonly timeoutMs: number;
  private readonly logger: Logger | null;

  private constructor(node: XplorerNode, options: P2PClientOptions) {
    this.node = node;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.logger = options.logger ?? null;
  }

  static async create(options: P2PClientOptions = {}): Promise<P2PClient> {
    const node = await createNode({
      privateKey: await privateKeyFromSecret(generateSecretKey()),
      listen: [],
    });
    await node.start();
    return new P2PClient(node, options);
  }

  get nodeId(): string {
    return this.node.peerId.toString();
  }

  /**
   * Send one request on a new stream and wait for its response.
   * @param target multiaddr of the agent, ending in /p2p/<nodeId>
   */
  async request(target: string, request: Request): Promise<Response> {
    return this.exchange(target, async (stream) => {
      await stream.sink([encodeFrame(encodeRequest(request))]);
      const response = parseResponse(await readFrame(stream.source));
      if (!response) {
        throw new XplorerError('MALFORMED_RESPONSE', 'Malformed response document');
      }
      return response;
    });
  }

  /**
   * Write `data` verbatim on a new stream and collect everything the peer
   * sends back until it closes its side.
   */
  async sendRaw(target: string, data: Uint8Array): Promise<Uint8Array> {
    return this.exchange(target, async (stream) => {
      await stream.sink([data]);
      const chunks: Uint8Array[] = [];
      for await (const chunk of stream.source) {
        chunks.push(chunk.subarray());
      }
      return Buffer.concat(chunks);
    });
  }

  async stop(): Promise<void> {
    await this.node.stop();
  }

  private async exchange<T>(target: string, task: (stream: Stream) => Promise<T>): Promise<T> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    const stream = await this.node.dialProtocol(multiaddr(target), XPLORER_PROTOCOL, { signal });
    this.logger?.debug(`Opened stream ${stream.id} to ${target}`);

    const onTimeout = (): void => {
      stream.abort(new XplorerError('TIMEOUT', `No response within ${this.timeoutMs}ms`));
    };
    signal.addEventListener('abort', onTimeout, { once: true });
    try {
      const result = await task(stream);
      await stream.close();
      return result;
    } catch (err) {
      stream.abort(err instanceof Error ? err : new Error(String(err)));
      throw err;
    } finally {
      signal.removeEventListener('abort', onTimeout);
    }
  }
}
