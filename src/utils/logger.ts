/**
 * Leveled console logger with timestamped, level-prefixed lines.
 */

import { DECODER_CONFIG, type LogLevel } from './config.js';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

type EmitLevel = Exclude<LogLevel, 'silent'>;

let currentLevel: LogLevel = DECODER_CONFIG.logLevel;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function log(level: EmitLevel, msg: string, meta?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;
  const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
  const fn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  fn(`${prefix} ${msg}${metaStr}`);
}

const logger = {
  debug: (msg: string, meta?: Record<string, unknown>): void => log('debug', msg, meta),
  info: (msg: string, meta?: Record<string, unknown>): void => log('info', msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>): void => log('warn', msg, meta),
  error: (msg: string, meta?: Record<string, unknown>): void => log('error', msg, meta),
};

export default logger;
