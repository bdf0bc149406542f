/**
 * Context-tagged console logger. Debug output is off unless DEBUG=true
 * or the server config enables it.
 *
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.debug('content', 'Cache miss for', key);
 *   logger.info('review', 'Opened session', description);
 *   logger.error('review', 'GitHub request failed:', error);
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

let debugEnabled = process.env.DEBUG === 'true';

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

function formatArg(arg: unknown): unknown {
  if (arg instanceof Error) return arg.message;
  return typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : arg;
}

function formatMessage(level: LogLevel, context: string, ...args: unknown[]): string {
  const timestamp = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
  const prefix = `[${timestamp}] [${level.toUpperCase()}] [${context}]`;
  return `${prefix} ${args.map(formatArg).join(' ')}`;
}

export const logger = {
  /** Only shown when debug logging is enabled */
  debug(context: string, ...args: unknown[]) {
    if (debugEnabled) {
      console.log(formatMessage('debug', context, ...args));
    }
  },

  info(context: string, ...args: unknown[]) {
    console.log(formatMessage('info', context, ...args));
  },

  warn(context: string, ...args: unknown[]) {
    console.warn(formatMessage('warn', context, ...args));
  },

  error(context: string, ...args: unknown[]) {
    console.error(formatMessage('error', context, ...args));
  },
};
