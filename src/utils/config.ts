/**
 * Runtime configuration from environment variables.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized: string = (value ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export const DECODER_CONFIG = {
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  batchOutputDir: process.env.ESP_DECODER_OUTPUT_DIR || 'batch_output',
};
