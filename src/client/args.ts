import { parseArgs } from 'node:util';
import { ConfigurationError } from '../errors';

export interface ClientArgs {
  target: string;
  /** API path with optional query, always starting with "/" */
  command: string;
  outputFile?: string;
  showHelp: boolean;
}

export type ClientTarget = { kind: 'http'; baseUrl: string } | { kind: 'p2p'; address: string };

/**
 * Parse `xplorer <target> [command] [-o|--output <file>] [-h|--help]`.
 * @throws TypeError from node:util on unknown options or a missing option value
 */
export function parseClientArgs(args: string[]): ClientArgs {
  const parsed = parseArgs({
    args,
    options: {
      output: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: true,
  });

  const [target = '', command = '/'] = parsed.positionals;
  return {
    target,
    command: command.startsWith('/') ? command : `/${command}`,
    ...(parsed.values.output !== undefined ? { outputFile: parsed.values.output } : {}),
    showHelp: parsed.values.help ?? false,
  };
}

/**
 * Work out which transport a target names.
 *
 * - `p2p:<multiaddr>` or a bare multiaddr ("/ip4/...") is P2P
 * - `http://...` / `https://...` is used as given
 * - anything else (`host:port`) gets an `http://` prefix
 */
export function resolveTarget(target: string): ClientTarget {
  if (target.length === 0) {
    throw new ConfigurationError('A target is required');
  }
  if (target.startsWith('p2p:')) {
    return { kind: 'p2p', address: target.slice('p2p:'.length) };
  }
  if (target.startsWith('/')) {
    return { kind: 'p2p', address: target };
  }
  const baseUrl = /^https?:\/\//.test(target) ? target : `http://${target}`;
  return { kind: 'http', baseUrl: baseUrl.replace(/\/+$/, '') };
}
