/**
 * Logger utility using pino
 * Logs always go to stderr; stdout is reserved for the rendered document.
 */

import pino from 'pino';
import { getConfig } from '../config/index.js';

let _logger: pino.Logger | null = null;

/**
 * Get the logger instance
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    const config = getConfig();

    if (config.logFormat === 'pretty') {
      _logger = pino({
        level: config.logLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            destination: 2,
          },
        },
      });
    } else {
      _logger = pino({ level: config.logLevel }, pino.destination(2));
    }
  }
  return _logger;
}

/**
 * Create a child logger with context
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}

/**
 * Drop the cached logger so the next getLogger() call picks up config changes
 */
export function resetLogger(): void {
  _logger = null;
}

/**
 * Logger that discards everything; the default diagnostic channel of the core
 */
export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
