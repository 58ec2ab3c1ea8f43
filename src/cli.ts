#!/usr/bin/env node

import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { parseClientArgs, resolveTarget } from './client/args';
import { sendCommand } from './client/request';
import { classifyResponse, detectFileExtension, generateTimestampFilename } from './client/response-type';
import { loadServerConfig } from './config';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { bodyText, textResponse } from './message/response';
import { P2PTransportAdapter } from './p2p/adapter';
import { IdentityStore, getDefaultStoragePath, nodeIdFromSecret } from './p2p/identity';
import { XplorerServer, getLanAddress } from './server';
import { HttpTransportAdapter } from './transport/http';

const USAGE = `xplorer - client and server for the xplorer debugging agent

Usage:
  xplorer <target> [command] [-o <file>]
  xplorer serve [--config <file>] [--port <n>] [--p2p] [--storage <dir>] [--new-identity]
  xplorer identity <show|export|reset|import <hex>> [--storage <dir>]

Targets:
  host:port, http://host:port      HTTP transport
  p2p:<multiaddr>, /ip4/.../p2p/…  P2P transport

Options:
  -o, --output <file>   Write the response to <file> (any type)
                        Without it, binary responses are saved under /tmp

Examples:
  xplorer localhost:8080                       # API index
  xplorer localhost:8080 "/?depth=shallow"     # API index, sub-routers summarized
  xplorer localhost:8080 "echo?name=test"      # Echo a query parameter
  xplorer p2p:/ip4/127.0.0.1/tcp/4001/p2p/<id> info -o info.json`;

/**
 * Write a value to stdout, pretty-printed when it is not a string.
 */
function output(data: unknown): void {
  console.log(typeof data === 'string' ? data : JSON.stringify(data, null, 2));
}

async function handleRequest(args: string[]): Promise<void> {
  const parsed = parseClientArgs(args);
  if (parsed.showHelp) {
    output(USAGE);
    return;
  }

  const target = resolveTarget(parsed.target);
  const logger = createLogger({ name: 'xplorer-cli', level: 'warn', stderr: true });
  const response = await sendCommand(target, parsed.command, { logger });
  const classified = classifyResponse(response.body);

  if (response.status >= 400) {
    const detail = classified.kind === 'binary' ? '' : `\n${classified.text}`;
    console.error(`Error: HTTP ${response.status}${detail}`);
    process.exitCode = 1;
    return;
  }

  if (parsed.outputFile) {
    await writeFile(parsed.outputFile, response.body);
    output(`Saved ${response.body.byteLength} bytes to: ${parsed.outputFile}`);
    return;
  }

  if (classified.kind === 'binary') {
    const path = generateTimestampFilename(detectFileExtension(classified.data));
    await writeFile(path, classified.data);
    output(`Saved ${classified.data.byteLength} bytes to: ${path}`);
    return;
  }
  output(classified.text);
}

async function handleServe(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: 'string' },
      port: { type: 'string' },
      p2p: { type: 'boolean' },
      storage: { type: 'string' },
      'new-identity': { type: 'boolean' },
    },
    strict: true,
  });

  const config = await loadServerConfig(values.config);
  const logger = createLogger({ name: 'xplorer', level: config.logLevel });

  const server = new XplorerServer({ description: config.description, logger });
  server.register(
    '/echo',
    {
      description: 'Echo the name parameter, or the request body',
      parameters: [{ name: 'name', description: 'Text to echo back', examples: ['test'] }],
      runsOnMainThread: false,
    },
    (request) => textResponse(request.queryParams.name ?? (request.body ? bodyText({ body: request.body }) : ''))
  );

  let http: HttpTransportAdapter | null = null;
  if (config.http.enabled) {
    const port = values.port !== undefined ? Number(values.port) : config.http.port;
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new Error(`Invalid port number '${values.port}'. Port must be between 0 and 65535.`);
    }
    http = server.addTransport(new HttpTransportAdapter({ port, host: config.http.host, logger }));
  }

  let p2p: P2PTransportAdapter | null = null;
  if (config.p2p.enabled || values.p2p) {
    p2p = server.addTransport(
      new P2PTransportAdapter({
        storagePath: values.storage ?? config.p2p.storagePath,
        forceNewIdentity: values['new-identity'] ?? config.p2p.forceNewIdentity,
        ephemeral: config.p2p.ephemeral,
        listen: config.p2p.listen,
        relays: config.p2p.relays,
        logger,
      })
    );
  }

  await server.start();

  if (http) {
    output(`HTTP: http://${getLanAddress() ?? 'localhost'}:${http.port}`);
  }
  if (p2p) {
    output(`Node ID: ${p2p.nodeId}`);
    for (const address of p2p.addresses) {
      output(`  xplorer p2p:${address}`);
    }
  }
  output('Press Ctrl+C to stop the server');

  const shutdown = (): void => {
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('Error stopping server:', errorMessage(err));
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function handleIdentity(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: { storage: { type: 'string' } },
    strict: true,
    allowPositionals: true,
  });
  const [subcommand = 'show', keyHex] = positionals;
  const storagePath = values.storage ?? process.env.XPLORER_P2P_STORAGE ?? getDefaultStoragePath();
  const adapter = new P2PTransportAdapter({ storagePath });

  switch (subcommand) {
    case 'show': {
      const key = await adapter.exportSecretKey();
      output(key ? { nodeId: await nodeIdFromSecret(key), keyPath: new IdentityStore(storagePath).keyPath } : { nodeId: null });
      break;
    }
    case 'export': {
      const key = await adapter.exportSecretKey();
      if (!key) {
        throw new Error(`No identity stored under ${storagePath}`);
      }
      output(Buffer.from(key).toString('hex'));
      break;
    }
    case 'reset':
      output({ nodeId: await adapter.resetIdentity() });
      break;
    case 'import': {
      if (!keyHex || !/^[0-9a-fA-F]+$/.test(keyHex)) {
        throw new Error('Usage: xplorer identity import <64 hex characters>');
      }
      const key = new Uint8Array(Buffer.from(keyHex, 'hex'));
      await adapter.importSecretKey(key);
      output({ nodeId: await nodeIdFromSecret(key) });
      break;
    }
    default:
      throw new Error(`Unknown identity subcommand '${subcommand}'. Use: show, export, reset, import`);
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.error(USAGE);
    process.exit(1);
  }

  try {
    switch (args[0]) {
      case 'serve':
        await handleServe(args.slice(1));
        break;
      case 'identity':
        await handleIdentity(args.slice(1));
        break;
      default:
        await handleRequest(args);
    }
  } catch (e) {
    console.error('Error:', errorMessage(e));
    process.exit(1);
  }
}

main().catch((e) => {
  console.error('Fatal error:', errorMessage(e));
  process.exit(1);
});
