export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: unknown): LogLevel | null {
  const raw = String(value || '').trim().toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') {
    return raw;
  }
  return null;
}

let configuredLevel: LogLevel | null = null;

/** Pins the level for this process; `null` goes back to `APP_LOG_LEVEL`. */
export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

function resolveLogLevel(): LogLevel {
  if (configuredLevel) return configuredLevel;
  const fromEnv = parseLogLevel(process.env.APP_LOG_LEVEL);
  if (fromEnv) return fromEnv;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLogLevel()];
}

function write(level: LogLevel, message: string, ...args: unknown[]): void {
  if (!shouldLog(level)) return;
  if (level === 'error') {
    console.error(message, ...args);
    return;
  }
  if (level === 'warn') {
    console.warn(message, ...args);
    return;
  }
  if (level === 'info') {
    console.info(message, ...args);
    return;
  }
  console.debug(message, ...args);
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

export const logger: Logger = {
  debug: (message: string, ...args: unknown[]) => write('debug', message, ...args),
  info: (message: string, ...args: unknown[]) => write('info', message, ...args),
  warn: (message: string, ...args: unknown[]) => write('warn', message, ...args),
  error: (message: string, ...args: unknown[]) => write('error', message, ...args),
};

/** Logger whose lines start with `[scope]`, e.g. `[ingest] element dropped`. */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...args) => write('debug', `${prefix} ${message}`, ...args),
    info: (message, ...args) => write('info', `${prefix} ${message}`, ...args),
    warn: (message, ...args) => write('warn', `${prefix} ${message}`, ...args),
    error: (message, ...args) => write('error', `${prefix} ${message}`, ...args),
  };
}
