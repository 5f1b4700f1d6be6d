type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const order: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

function isLevel(value: string): value is Level {
  return Object.prototype.hasOwnProperty.call(order, value);
}

function resolveLevel(raw: string | undefined): Level {
  const value = (raw || (process.env.NODE_ENV === 'production' ? 'warn' : 'info')).toLowerCase();
  return isLevel(value) ? value : 'info';
}

const envLevel = resolveLevel(process.env.LOG_LEVEL);

function shouldLog(level: Level) {
  return order[level] >= order[envLevel];
}

function describe(msg: unknown): string {
  if (msg instanceof Error) return msg.stack ?? msg.message;
  if (typeof msg === 'string') return msg;
  try {
    return JSON.stringify(msg);
  } catch {
    return String(msg);
  }
}

function format(level: string, msg: unknown, source?: string) {
  const time = new Date().toISOString();
  return `[${time}]${source ? ` [${source}]` : ''} ${level.toUpperCase()}: ${describe(msg)}`;
}

export const logger = {
  debug: (msg: unknown, source?: string) => {
    if (shouldLog('debug')) console.debug(format('debug', msg, source));
  },
  info: (msg: unknown, source?: string) => {
    if (shouldLog('info')) console.info(format('info', msg, source));
  },
  warn: (msg: unknown, source?: string) => {
    if (shouldLog('warn')) console.warn(format('warn', msg, source));
  },
  error: (msg: unknown, source?: string) => {
    if (shouldLog('error')) console.error(format('error', msg, source));
  }
};

export type SourceLogger = {
  debug: (msg: unknown) => void;
  info: (msg: unknown) => void;
  warn: (msg: unknown) => void;
  error: (msg: unknown) => void;
};

// Binds a source tag; calls still go through `logger` so tests can spy on it.
export function forSource(source: string): SourceLogger {
  return {
    debug: (msg) => logger.debug(msg, source),
    info: (msg) => logger.info(msg, source),
    warn: (msg) => logger.warn(msg, source),
    error: (msg) => logger.error(msg, source),
  };
}
