import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { ServerConfig } from '../core/config.js';
import { CustomFieldRuleEngine, type CustomFieldRuleSet } from '../core/domain/field-rules.js';
import { type WorkflowRuleSet, WorkflowStateMachine, normalizeTargets } from '../core/domain/workflow.js';
import { ConfigurationError } from '../core/errors.js';
import type { SessionRules } from '../core/session.js';

// On-disk shapes use snake_case keys and numeric-string ids.

const idKey = z.string().regex(/^\d+$/, 'expected a numeric id key');

const FieldRuleFile = z.object({
  name: z.string(),
  values: z.array(z.string()).default([]),
  required_by_trackers: z.array(z.number().int()).default([])
});
const FieldRulesMap = z.record(idKey, FieldRuleFile);

const WorkflowTrackerFile = z.object({
  name: z.string(),
  statuses: z.record(idKey, z.object({ name: z.string(), is_closed: z.boolean().default(false) })).default({}),
  transitions: z.record(idKey, z.array(z.number().int())).default({})
});
const WorkflowRulesMap = z.record(idKey, WorkflowTrackerFile);

// Wrapped form first; a bare mapping is accepted as well. Both parse to the mapping.
const FieldRulesDocument = z.union([
  z
    .object({ fields: FieldRulesMap })
    .strict()
    .transform((doc) => doc.fields),
  FieldRulesMap
]);
const WorkflowRulesDocument = z.union([
  z
    .object({ trackers: WorkflowRulesMap })
    .strict()
    .transform((doc) => doc.trackers),
  WorkflowRulesMap
]);

/**
 * Load a field rule file. A missing file means no constraint is known and
 * yields `undefined`.
 *
 * @throws ConfigurationError when the file cannot be read or does not parse
 */
export async function loadFieldRules(path: string): Promise<CustomFieldRuleSet | undefined> {
  const map = await readDocument(path, FieldRulesDocument);
  if (map === undefined) return undefined;

  const rules: CustomFieldRuleSet = {};
  for (const [id, rule] of Object.entries(map)) {
    rules[id] = { name: rule.name, values: rule.values, requiredByTrackers: rule.required_by_trackers };
  }
  return rules;
}

/**
 * Load a workflow rule file; `undefined` when it does not exist.
 *
 * @throws ConfigurationError when the file cannot be read or does not parse
 */
export async function loadWorkflowRules(path: string): Promise<WorkflowRuleSet | undefined> {
  const map = await readDocument(path, WorkflowRulesDocument);
  if (map === undefined) return undefined;

  const rules: WorkflowRuleSet = {};
  for (const [id, tracker] of Object.entries(map)) {
    const statuses: WorkflowRuleSet[string]['statuses'] = {};
    for (const [statusId, s] of Object.entries(tracker.statuses)) {
      statuses[statusId] = { name: s.name, isClosed: s.is_closed };
    }
    const transitions: Record<string, number[]> = {};
    for (const [from, targets] of Object.entries(tracker.transitions)) {
      transitions[from] = normalizeTargets(targets);
    }
    rules[id] = { name: tracker.name, statuses, transitions };
  }
  return rules;
}

export async function saveFieldRules(path: string, rules: CustomFieldRuleSet): Promise<void> {
  const fields = Object.fromEntries(
    sortedIds(rules).map((id) => {
      const rule = rules[id];
      return [id, { name: rule.name, values: rule.values, required_by_trackers: rule.requiredByTrackers }];
    })
  );
  await writeDocument(path, { fields });
}

export async function saveWorkflowRules(path: string, rules: WorkflowRuleSet): Promise<void> {
  const trackers = Object.fromEntries(
    sortedIds(rules).map((id) => {
      const tracker = rules[id];
      const statuses = Object.fromEntries(
        sortedIds(tracker.statuses).map((sid) => {
          const s = tracker.statuses[sid];
          return [sid, { name: s.name, is_closed: s.isClosed }];
        })
      );
      const transitions = Object.fromEntries(sortedIds(tracker.transitions).map((sid) => [sid, tracker.transitions[sid]]));
      return [id, { name: tracker.name, statuses, transitions }];
    })
  );
  await writeDocument(path, { trackers });
}

/**
 * Rule engines for the configured files. A missing or broken file is logged
 * and leaves that engine empty; the server still starts.
 */
export async function loadSessionRules(
  cfg: Pick<ServerConfig, 'REDMINE_FIELD_RULES_FILE' | 'REDMINE_WORKFLOW_RULES_FILE' | 'REDMINE_WORKFLOW_STRICT'>,
  log: Logger
): Promise<SessionRules> {
  let fieldRules: CustomFieldRuleSet | undefined;
  let workflowRules: WorkflowRuleSet | undefined;

  if (cfg.REDMINE_FIELD_RULES_FILE) {
    try {
      fieldRules = await loadFieldRules(cfg.REDMINE_FIELD_RULES_FILE);
      if (fieldRules === undefined) log.warn({ path: cfg.REDMINE_FIELD_RULES_FILE }, 'rules.fields.missing');
    } catch (err) {
      log.warn({ path: cfg.REDMINE_FIELD_RULES_FILE, err: errorMessage(err) }, 'rules.fields.invalid');
    }
  }

  if (cfg.REDMINE_WORKFLOW_RULES_FILE) {
    try {
      workflowRules = await loadWorkflowRules(cfg.REDMINE_WORKFLOW_RULES_FILE);
      if (workflowRules === undefined) log.warn({ path: cfg.REDMINE_WORKFLOW_RULES_FILE }, 'rules.workflow.missing');
    } catch (err) {
      log.warn({ path: cfg.REDMINE_WORKFLOW_RULES_FILE, err: errorMessage(err) }, 'rules.workflow.invalid');
    }
  }

  const rules: SessionRules = {
    fields: new CustomFieldRuleEngine(fieldRules),
    workflow: new WorkflowStateMachine(workflowRules, { strict: cfg.REDMINE_WORKFLOW_STRICT })
  };
  log.info({ fields: rules.fields.size, trackers: rules.workflow.size, strict: rules.workflow.strict }, 'rules.loaded');
  return rules;
}

// ==================== PRIVATE HELPERS ====================

async function readDocument<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S> | undefined> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw new ConfigurationError(`failed to read rule file ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`failed to parse rule file ${path}`, { cause: err });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`invalid rule file ${path}: ${detail}`);
  }
  return parsed.data;
}

async function writeDocument(path: string, doc: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(doc, null, 2)}\n`, 'utf8');
}

// Integer-like keys already enumerate in ascending order; sort anyway so the
// output does not depend on that.
function sortedIds(record: Record<string, unknown>): string[] {
  return Object.keys(record).sort((a, b) => Number(a) - Number(b));
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
