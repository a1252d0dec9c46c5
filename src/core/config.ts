import { z } from 'zod';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((v) => v === 'true');

const optionalPath = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v : undefined));

const EnvSchema = z.object({
  REDMINE_URL: z
    .string()
    .url()
    .transform((v) => v.replace(/\/+$/, '')),
  REDMINE_API_KEY: z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== '' ? v : undefined)),
  REDMINE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  REDMINE_MCP_PORT: z.coerce.number().int().positive().default(8080),
  REDMINE_MCP_BIND: z.string().default('127.0.0.1'),
  REDMINE_MCP_RATE_LIMIT_RPM: z.coerce.number().int().positive().default(100),
  REDMINE_MCP_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // Every mutating tool answers with a Forbidden error
  REDMINE_MCP_READ_ONLY: booleanFlag('false'),
  REDMINE_FIELD_RULES_FILE: optionalPath,
  REDMINE_WORKFLOW_RULES_FILE: optionalPath,
  // Unknown trackers and source statuses become transition errors
  REDMINE_WORKFLOW_STRICT: booleanFlag('false'),
  REDMINE_WORKFLOW_SAMPLE: z.coerce.number().int().positive().default(50)
});

export type ServerConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): ServerConfig {
  // If you use dotenv, load it before calling this function.
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${msg}`);
  }
  return parsed.data;
}
