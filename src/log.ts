// src/log.ts
// Console logging with a process-wide level (LOG_LEVEL or --log-level).

import type { LogLevel } from './classification/config.js';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let current: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? 'info';

function parseLevel(x: string | undefined): LogLevel | undefined {
  const s = String(x ?? '').trim().toLowerCase();
  return s === 'debug' || s === 'info' || s === 'warn' || s === 'error' ? s : undefined;
}

export function setLogLevel(level: string): void {
  const l = parseLevel(level);
  if (!l) throw new Error(`Unknown log level: ${level}`);
  current = l;
}

export function getLogLevel(): LogLevel {
  return current;
}

export type Logger = {
  debug: (msg: string, ...rest: unknown[]) => void;
  info: (msg: string, ...rest: unknown[]) => void;
  warn: (msg: string, ...rest: unknown[]) => void;
  error: (msg: string, ...rest: unknown[]) => void;
};

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, msg: string, rest: unknown[]) => {
    if (RANK[level] < RANK[current]) return;
    const line = `[${scope}] ${msg}`;
    if (level === 'error') console.error(line, ...rest);
    else if (level === 'warn') console.warn(line, ...rest);
    else console.log(line, ...rest);
  };
  return {
    debug: (msg, ...rest) => emit('debug', msg, rest),
    info: (msg, ...rest) => emit('info', msg, rest),
    warn: (msg, ...rest) => emit('warn', msg, rest),
    error: (msg, ...rest) => emit('error', msg, rest)
  };
}
