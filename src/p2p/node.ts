import { noise } from '@chainsafe/libp2p-noise';
import { yamux } from '@chainsafe/libp2p-yamux';
import { circuitRelayTransport } from '@libp2p/circuit-relay-v2';
import { type Identify, identify } from '@libp2p/identify';
import type { PrivateKey } from '@libp2p/interface';
import { tcp } from '@libp2p/tcp';
import { type Libp2p, createLibp2p } from 'libp2p';

/** Protocol id the agent serves requests on */
export const XPLORER_PROTOCOL = '/xplorer/rpc/1.0.0';

export const DEFAULT_LISTEN_ADDRESSES = ['/ip4/0.0.0.0/tcp/0'];

export type XplorerNode = Libp2p<{ identify: Identify }>;

export interface NodeOptions {
  privateKey: PrivateKey;
  /** Listen multiaddrs; an empty list makes a dial-only node */
  listen?: string[];
  /** Relay multiaddrs; when set, the node also listens through circuit relay */
  relays?: string[];
}

/**
 * Build (but do not start) a libp2p node: TCP with circuit relay, Noise, Yamux.
 */
export async function createNode(options: NodeOptions): Promise<XplorerNode> {
  const listen = [...(options.listen ?? DEFAULT_LISTEN_ADDRESSES)];
  if (options.relays && options.relays.length > 0) {
    listen.push('/p2p-circuit');
  }

  return createLibp2p({
    start: false,
    privateKey: options.privateKey,
    addresses: { listen },
    transports: [tcp(), circuitRelayTransport()],
    connectionEncrypters: [noise()],
    streamMuxers: [yamux()],
    connectionGater: {
      // allow loopback and private addresses
      denyDialMultiaddr: async () => false,
    },
    services: {
      identify: identify(),
    },
  });
}

/**
 * Resolve once the node reports at least one listen address.
 * @throws Error when `timeoutMs` passes first
 */
export async function waitOnline(node: XplorerNode, timeoutMs: number): Promise<void> {
  if (node.getMultiaddrs().length > 0) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const onUpdate = (): void => {
      if (node.getMultiaddrs().length > 0) {
        cleanup();
        resolve();
      }
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new Error(`Node did not come online within ${timeoutMs}ms`));
    }, timeoutMs);
    const cleanup = (): void => {
      clearTimeout(timer);
      node.removeEventListener('self:peer:update', onUpdate);
    };
    node.addEventListener('self:peer:update', onUpdate);
  });
}
