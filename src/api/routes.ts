import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { RedmineApi } from '../core/directory.js';
import { RedmineSession, type SessionRules } from '../core/session.js';
import { createToolServer } from './tools.js';

export const API_KEY_HEADER = 'x-redmine-api-key';
export const MESSAGE_PATH = '/messages';

function ok<T>(data: T) {
  return { ok: true as const, data };
}

function bad(message: string) {
  return { ok: false as const, error: message };
}

const MessageQuery = z.object({
  sessionId: z.string().min(1)
});

export interface RouteDeps {
  rules: SessionRules;
  readOnly: boolean;
  /** Builds the Redmine client for one caller's API key. */
  clientFor: (apiKey: string) => RedmineApi;
  log: Logger;
}

/**
 * SSE endpoints. Each `GET /sse` opens one MCP session bound to the caller's
 * API key, with its own resolver cache; rule sets are shared.
 */
export async function registerRoutes(app: FastifyInstance, deps: RouteDeps) {
  const transports = new Map<string, SSEServerTransport>();

  app.get('/health', async () => ok({ status: 'healthy', sessions: transports.size }));

  app.get('/sse', async (req, reply) => {
    const apiKey = req.headers[API_KEY_HEADER];
    if (typeof apiKey !== 'string' || apiKey.trim() === '') {
      return reply.status(401).send(bad(`missing ${API_KEY_HEADER} header`));
    }

    reply.hijack();
    const transport = new SSEServerTransport(MESSAGE_PATH, reply.raw);
    const sessionId = transport.sessionId;
    const log = deps.log.child({ sessionId });
    const session = new RedmineSession(deps.clientFor(apiKey), deps.rules, log, { readOnly: deps.readOnly });
    const server = createToolServer(session, log);

    transports.set(sessionId, transport);
    transport.onclose = () => {
      transports.delete(sessionId);
      log.info('sse.session.closed');
    };

    try {
      await server.connect(transport);
      log.info('sse.session.opened');
    } catch (err) {
      transports.delete(sessionId);
      log.error({ err }, 'sse.session.failed');
      if (!reply.raw.headersSent) {
        reply.raw.statusCode = 500;
      }
      reply.raw.end('Error establishing SSE stream');
    }
  });

  app.post(MESSAGE_PATH, async (req, reply) => {
    const parsed = MessageQuery.safeParse(req.query);
    if (!parsed.success) return reply.status(400).send(bad('sessionId query parameter is required'));

    const transport = transports.get(parsed.data.sessionId);
    if (!transport) return reply.status(404).send(bad(`session not found: ${parsed.data.sessionId}`));

    reply.hijack();
    try {
      await transport.handlePostMessage(req.raw, reply.raw, req.body);
    } catch (err) {
      deps.log.error({ err, sessionId: parsed.data.sessionId }, 'sse.message.failed');
      if (!reply.raw.headersSent) {
        reply.raw.statusCode = 500;
        reply.raw.end('Error handling message');
      }
    }
  });

  app.addHook('onClose', async () => {
    for (const transport of transports.values()) await transport.close();
    transports.clear();
  });
}
