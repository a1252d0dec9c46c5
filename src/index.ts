#!/usr/bin/env node
import Fastify from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { registerRoutes } from './api/routes.js';
import { RedmineClient } from './infra/redmine-client.js';
import { loadSessionRules } from './infra/rule-files.js';

async function main() {
  const cfg = loadConfig(process.env);
  const log = createLogger(cfg);
  const app = Fastify({
    logger: {
      level: cfg.REDMINE_MCP_LOG_LEVEL,
      redact: {
        paths: ['req.headers["x-redmine-api-key"]', 'req.headers.authorization', 'req.headers.cookie'],
        remove: true
      }
    }
  });

  await app.register(helmet, { global: true });
  await app.register(rateLimit, { max: cfg.REDMINE_MCP_RATE_LIMIT_RPM, timeWindow: '1 minute' });

  // Loaded once, shared read-only by every connection
  const rules = await loadSessionRules(cfg, log);

  await registerRoutes(app, {
    rules,
    readOnly: cfg.REDMINE_MCP_READ_ONLY,
    clientFor: (apiKey) =>
      new RedmineClient({ baseUrl: cfg.REDMINE_URL, apiKey, timeoutMs: cfg.REDMINE_TIMEOUT_MS, log }),
    log
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down...');
    await app.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  const addr = await app.listen({ port: cfg.REDMINE_MCP_PORT, host: cfg.REDMINE_MCP_BIND });
  log.info({ addr, redmine: cfg.REDMINE_URL, readOnly: cfg.REDMINE_MCP_READ_ONLY }, 'Redmine MCP listening');
}

main().catch((err) => {
  console.error('Failed to start Redmine MCP:', err);
  process.exit(1);
});
