import { createRequest, parseRequestTarget } from '../message/request';
import { P2PClient } from '../p2p/client';
import type { Logger } from '../logger';
import type { ClientTarget } from './args';

export interface RawResponse {
  status: number;
  body: Uint8Array;
}

export interface SendOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Send one request for `command` (path plus optional query) to an agent.
 */
export async function sendCommand(target: ClientTarget, command: string, options: SendOptions = {}): Promise<RawResponse> {
  if (target.kind === 'http') {
    const response = await fetch(`${target.baseUrl}${command}`, {
      signal: AbortSignal.timeout(options.timeoutMs ?? 30_000),
    });
    return { status: response.status, body: new Uint8Array(await response.arrayBuffer()) };
  }

  const { path, queryParams } = parseRequestTarget(command);
  const client = await P2PClient.create(options);
  try {
    const response = await client.request(target.address, createRequest(path, { queryParams }));
    return { status: response.status, body: response.body };
  } finally {
    await client.stop();
  }
}
