import pino from 'pino';

/**
 * Minimal logging surface the agent depends on.
 * Every component takes one optionally and logs nothing without it.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface CreateLoggerOptions {
  /** Logger name, emitted on every line (default: "xplorer") */
  name?: string;
  /** Minimum level; defaults to LOG_LEVEL from the environment, then "info" */
  level?: LogLevel;
  /** Write to stderr instead of stdout (used by the CLI client so stdout stays clean) */
  stderr?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Read LOG_LEVEL from the environment.
 * @throws Error if LOG_LEVEL is set to something pino does not know
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const level = env.LOG_LEVEL;
  if (!level) {
    return undefined;
  }
  if (!isLogLevel(level)) {
    throw new Error(`Unexpected LOG_LEVEL: ${level}. Expecting one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

/**
 * Create a pino-backed logger. Construct one at process start and pass it down.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? getLogLevel() ?? 'info';
  const config = { name: options.name ?? 'xplorer', level };
  return options.stderr ? pino(config, pino.destination(2)) : pino(config);
}
