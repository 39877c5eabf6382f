/**
 * Console-backed structured logger and no-op metrics
 *
 * One JSON object per line, tagged with the emitting module.
 */

import type { Logger, Metrics } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function resolveMinLevel(): LogLevel {
  const level = process.env['LOG_LEVEL'];
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
}

function write(level: LogLevel, module: string, message: string, context?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveMinLevel()]) {
    return;
  }
  const line = JSON.stringify({
    level,
    module,
    message,
    ...context,
    timestamp: new Date().toISOString(),
  });
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/**
 * Create a logger that tags every line with `module`
 */
export function createLogger(module: string): Logger {
  return {
    info: (message, context) => write('info', module, message, context),
    warn: (message, context) => write('warn', module, message, context),
    error: (message, context) => write('error', module, message, context),
    debug: (message, context) => write('debug', module, message, context),
  };
}

export const silentLogger: Logger = {
  info: () => { /* no-op */ },
  warn: () => { /* no-op */ },
  error: () => { /* no-op */ },
  debug: () => { /* no-op */ },
};

export const noopMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};
