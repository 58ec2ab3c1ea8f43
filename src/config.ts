import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError } from './errors';
import { type LogLevel, isLogLevel } from './logger';
import { getDefaultStoragePath } from './p2p/identity';
import { DEFAULT_HTTP_PORT } from './transport/http';

export interface HttpConfig {
  enabled: boolean;
  port: number;
  host?: string;
}

export interface P2PConfig {
  enabled: boolean;
  storagePath: string;
  forceNewIdentity: boolean;
  ephemeral: boolean;
  listen?: string[];
  relays: string[];
}

/**
 * Normalized server configuration.
 * Use loadServerConfig() to read it from a file and the environment.
 */
export interface ServerConfig {
  description?: string;
  http: HttpConfig;
  p2p: P2PConfig;
  logLevel?: LogLevel;
}

/**
 * Default config file path: XPLORER_CONFIG env or ~/.config/xplorer/config.json
 */
export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.XPLORER_CONFIG) {
    return resolve(env.XPLORER_CONFIG);
  }
  return resolve(homedir(), '.config', 'xplorer', 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] | undefined {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : undefined;
}

function parsePort(value: string, source: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid port in ${source}: ${value}`);
  }
  return port;
}

/**
 * Normalize a parsed config document. Fields of the wrong type fall back to defaults.
 */
export function parseServerConfig(config: Record<string, unknown>): ServerConfig {
  const rawHttp = isRecord(config.http) ? config.http : {};
  const rawP2P = isRecord(config.p2p) ? config.p2p : {};

  const http: HttpConfig = {
    enabled: typeof rawHttp.enabled === 'boolean' ? rawHttp.enabled : true,
    port: typeof rawHttp.port === 'number' ? parsePort(String(rawHttp.port), 'http.port') : DEFAULT_HTTP_PORT,
    ...(typeof rawHttp.host === 'string' ? { host: rawHttp.host } : {}),
  };

  const listen = stringList(rawP2P.listen);
  const p2p: P2PConfig = {
    enabled: typeof rawP2P.enabled === 'boolean' ? rawP2P.enabled : false,
    storagePath: typeof rawP2P.storagePath === 'string' ? resolve(rawP2P.storagePath) : getDefaultStoragePath(),
    forceNewIdentity: typeof rawP2P.forceNewIdentity === 'boolean' ? rawP2P.forceNewIdentity : false,
    ephemeral: typeof rawP2P.ephemeral === 'boolean' ? rawP2P.ephemeral : false,
    ...(listen ? { listen } : {}),
    relays: stringList(rawP2P.relays) ?? [],
  };

  let logLevel: LogLevel | undefined;
  if (typeof config.logLevel === 'string') {
    if (!isLogLevel(config.logLevel)) {
      throw new ConfigurationError(`Invalid logLevel in config: ${config.logLevel}`);
    }
    logLevel = config.logLevel;
  }

  return {
    ...(typeof config.description === 'string' ? { description: config.description } : {}),
    http,
    p2p,
    ...(logLevel ? { logLevel } : {}),
  };
}

/**
 * Apply XPLORER_HTTP_PORT, XPLORER_P2P_STORAGE and LOG_LEVEL on top of `config`.
 */
export function applyEnvironment(config: ServerConfig, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result: ServerConfig = { ...config, http: { ...config.http }, p2p: { ...config.p2p } };
  if (env.XPLORER_HTTP_PORT) {
    result.http.port = parsePort(env.XPLORER_HTTP_PORT, 'XPLORER_HTTP_PORT');
  }
  if (env.XPLORER_P2P_STORAGE) {
    result.p2p.storagePath = resolve(env.XPLORER_P2P_STORAGE);
  }
  if (env.LOG_LEVEL) {
    if (!isLogLevel(env.LOG_LEVEL)) {
      throw new ConfigurationError(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
    }
    result.logLevel = env.LOG_LEVEL;
  }
  return result;
}

/**
 * Load server configuration from a JSON file and the environment.
 *
 * A missing file at the default location yields the defaults; a missing
 * file that was named explicitly is an error.
 *
 * @throws ConfigurationError on a missing explicit file, invalid JSON or invalid values
 */
export async function loadServerConfig(path?: string, env: NodeJS.ProcessEnv = process.env): Promise<ServerConfig> {
  const explicit = path !== undefined || Boolean(env.XPLORER_CONFIG);
  const configPath = path ? resolve(path) : getDefaultConfigPath(env);

  let content: string | null = null;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    if (!missing) {
      throw err;
    }
    if (explicit) {
      throw new ConfigurationError(`Config file not found at ${configPath}`, { cause: err });
    }
  }

  let config: Record<string, unknown> = {};
  if (content !== null) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new ConfigurationError(`Invalid JSON in config file: ${configPath}`, { cause: err });
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Config file must contain a JSON object: ${configPath}`);
    }
    config = parsed;
  }

  return applyEnvironment(parseServerConfig(config), env);
}
