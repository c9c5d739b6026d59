import { cyan, dim, red, yellow } from 'colorette';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Defaults to console; tests pass their own sink */
  sink?: Pick<Console, 'log' | 'error'>;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const min = LEVEL_ORDER[opts.level ?? 'info'];
  const sink = opts.sink ?? console;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= min;

  return {
    debug: (message) => {
      if (enabled('debug')) sink.log(dim(`  ${message}`));
    },
    info: (message) => {
      if (enabled('info')) sink.log(message);
    },
    warn: (message) => {
      if (enabled('warn')) sink.error(yellow(`warn: ${message}`));
    },
    error: (message) => {
      if (enabled('error')) sink.error(red(`error: ${message}`));
    },
  };
}

/** Logger that drops everything (library default) */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function levelFromFlags(opts: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (opts.verbose) return 'debug';
  if (opts.quiet) return 'warn';
  return 'info';
}

/** Strip credentials from a URL before it reaches the log */
export function sanitizeUrlForLogs(raw: string): string {
  try {
    const url = new URL(raw);
    url.username = '';
    url.password = '';
    for (const key of ['X-Plex-Token', 'api_key', 'ApiKey']) {
      if (url.searchParams.has(key)) url.searchParams.set(key, 'REDACTED');
    }
    return url.toString();
  } catch {
    return raw;
  }
}

export function heading(title: string): string {
  return cyan(`\n── ${title} ${'─'.repeat(Math.max(3, 56 - title.length))}`);
}
