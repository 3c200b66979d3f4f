import type { LogLevel } from './config';

export type LogPayload = Record<string, unknown>;

export type Logger = {
  debug(event: string, payload?: LogPayload): void;
  info(event: string, payload?: LogPayload): void;
  warn(event: string, payload?: LogPayload): void;
  error(event: string, payload?: LogPayload): void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function cleanPayload(input: LogPayload) {
  const output: LogPayload = {};
  for (const [key, value] of Object.entries(input)) {
    if (value == null) continue;
    if (typeof value === 'string' && value.trim().length === 0) continue;
    output[key] = value;
  }
  return output;
}

/**
 * Console logger writing one `[event] {json}` line per call.
 * Calls below `level` are dropped; `silent` drops everything.
 */
export function createLogger(level: LogLevel): Logger {
  const threshold = LEVEL_RANK[level];
  const write = (at: Exclude<LogLevel, 'silent'>, event: string, payload?: LogPayload) => {
    if (LEVEL_RANK[at] < threshold) return;
    const line = JSON.stringify(cleanPayload(payload || {}));
    if (at === 'error') console.error(`[${event}]`, line);
    else if (at === 'warn') console.warn(`[${event}]`, line);
    else console.log(`[${event}]`, line);
  };

  return {
    debug: (event, payload) => write('debug', event, payload),
    info: (event, payload) => write('info', event, payload),
    warn: (event, payload) => write('warn', event, payload),
    error: (event, payload) => write('error', event, payload),
  };
}
