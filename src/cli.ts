#!/usr/bin/env node
import pino from 'pino';
import type { Logger } from 'pino';
import { loadConfig, type ServerConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { RedmineClient } from './infra/redmine-client.js';
import { USAGE, runCommand } from './infra/rules-command.js';

function clientFrom(cfg: ServerConfig, log: Logger): RedmineClient {
  if (!cfg.REDMINE_API_KEY) throw new Error('REDMINE_API_KEY is required');
  return new RedmineClient({ baseUrl: cfg.REDMINE_URL, apiKey: cfg.REDMINE_API_KEY, timeoutMs: cfg.REDMINE_TIMEOUT_MS, log });
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length === 0 || args.includes('--help')) {
    console.log(USAGE);
    return;
  }

  const cfg = loadConfig(process.env);
  // Progress goes to stderr; stdout keeps the summary line
  const log = createLogger(cfg, pino.destination(2));
  const summary = await runCommand(args, { source: clientFrom(cfg, log), log, sample: cfg.REDMINE_WORKFLOW_SAMPLE });
  console.log(summary);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
