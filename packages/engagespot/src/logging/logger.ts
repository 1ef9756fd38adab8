/**
 * Logger
 *
 * Winston logger creation and management
 */

import * as winston from 'winston';
import type { LoggerMeta } from './types.js';
import { createDevFormat, createProdFormat } from './formatting.js';
import { SDK_VERSION } from '../version.js';

const SERVICE_NAME = 'engagespot';

/**
 * Level for SDK loggers. Quiet by default inside a host application; set
 * LOG_LEVEL to see request traffic.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_LEVEL || 'warn';
}

/**
 * Create a Winston logger instance for one module of the SDK
 */
export function createLogger(moduleName: string, options: Partial<LoggerMeta> = {}): winston.Logger {
  const meta: LoggerMeta = {
    service: SERVICE_NAME,
    module: moduleName,
    env: process.env.NODE_ENV || 'development',
    version: SDK_VERSION,
    ...options,
  };

  const isDevelopment = process.env.NODE_ENV === 'development';

  return winston.createLogger({
    level: resolveLogLevel(),
    defaultMeta: meta,
    format: isDevelopment ? createDevFormat() : createProdFormat(),
    transports: [new winston.transports.Console()],
  });
}

const loggers = new Map<string, winston.Logger>();

/**
 * Get or create a logger
 */
export function getLogger(moduleName: string): winston.Logger {
  let logger = loggers.get(moduleName);
  if (!logger) {
    logger = createLogger(moduleName);
    loggers.set(moduleName, logger);
  }
  return logger;
}
