#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import pino from 'pino';
import { createToolServer } from './api/tools.js';
import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { RedmineSession } from './core/session.js';
import { RedmineClient } from './infra/redmine-client.js';
import { loadSessionRules } from './infra/rule-files.js';

// Start server
async function main() {
  const cfg = loadConfig(process.env);
  // stdout carries the protocol
  const log = createLogger(cfg, pino.destination(2));

  if (!cfg.REDMINE_API_KEY) {
    throw new Error('REDMINE_API_KEY is required in stdio mode');
  }

  const rules = await loadSessionRules(cfg, log);
  const client = new RedmineClient({
    baseUrl: cfg.REDMINE_URL,
    apiKey: cfg.REDMINE_API_KEY,
    timeoutMs: cfg.REDMINE_TIMEOUT_MS,
    log
  });
  const session = new RedmineSession(client, rules, log, { readOnly: cfg.REDMINE_MCP_READ_ONLY });

  const server = createToolServer(session, log);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ url: cfg.REDMINE_URL, readOnly: session.readOnly }, 'mcp.stdio.ready');
}

main().catch((err) => {
  console.error('Redmine MCP server error:', err);
  process.exit(1);
});
