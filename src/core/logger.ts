import pino, { type DestinationStream, type Logger } from 'pino';
import type { ServerConfig } from './config.js';

/**
 * Pass `pino.destination(2)` in stdio mode: stdout carries the protocol.
 */
export function createLogger(cfg: Pick<ServerConfig, 'REDMINE_MCP_LOG_LEVEL'>, destination?: DestinationStream): Logger {
  const options = {
    level: cfg.REDMINE_MCP_LOG_LEVEL,
    redact: {
      paths: ['req.headers["x-redmine-api-key"]', 'req.headers.authorization', 'req.headers.cookie', 'apiKey'],
      remove: true
    }
  };
  return destination ? pino(options, destination) : pino(options);
}
