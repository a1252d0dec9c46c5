import type { Logger } from 'pino';
import type { DirectorySource } from '../core/directory.js';
import {
  type CustomFieldRuleSet,
  type WorkflowRuleSet,
  WorkflowMiner,
  generateFieldRules,
  mergeFieldRules,
  mergeWorkflowRules
} from '../core/domain/index.js';
import { loadFieldRules, loadWorkflowRules, saveFieldRules, saveWorkflowRules } from './rule-files.js';

export const USAGE = `redmine-rules

Usage:
  redmine-rules fields --out <file> [--merge]
  redmine-rules workflow --out <file> [--per-tracker 50] [--merge]

  fields     Generate custom field rules from /custom_fields.json (admin key required)
  workflow   Infer status transitions from recent issue histories
  --merge    Keep entries of an existing <file> that the generated set does not replace

Env:
  REDMINE_URL=https://redmine.example.com
  REDMINE_API_KEY=<key>
  REDMINE_WORKFLOW_SAMPLE=50
`;

export function getFlag(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  if (i === -1) return undefined;
  return args[i + 1];
}

export interface CliDeps {
  source: DirectorySource;
  log: Logger;
  /** Default for `--per-tracker`. */
  sample: number;
}

/** Parsed and executed separately from process wiring so it can run against a fake source. */
export async function runCommand(args: string[], deps: CliDeps): Promise<string> {
  const [command] = args;
  const out = getFlag(args, '--out');
  const merge = args.includes('--merge');
  if (!out || (command !== 'fields' && command !== 'workflow')) {
    throw new UsageError(USAGE);
  }

  if (command === 'fields') {
    const definitions = await deps.source.listAllCustomFields();
    let rules: CustomFieldRuleSet = generateFieldRules(definitions);
    if (merge) rules = mergeFieldRules((await loadFieldRules(out)) ?? {}, rules);
    await saveFieldRules(out, rules);
    deps.log.info({ out, fields: Object.keys(rules).length, merge }, 'rules.fields.written');
    return `wrote ${Object.keys(rules).length} field rule(s) to ${out}`;
  }

  const perTrackerFlag = getFlag(args, '--per-tracker');
  const perTracker = perTrackerFlag === undefined ? deps.sample : Number.parseInt(perTrackerFlag, 10);
  if (!Number.isInteger(perTracker) || perTracker <= 0) {
    throw new UsageError(`--per-tracker must be a positive integer, got ${perTrackerFlag}`);
  }

  let rules: WorkflowRuleSet = await new WorkflowMiner(deps.source, deps.log).mine({ perTracker });
  if (merge) rules = mergeWorkflowRules((await loadWorkflowRules(out)) ?? {}, rules);
  await saveWorkflowRules(out, rules);
  deps.log.info({ out, trackers: Object.keys(rules).length, merge }, 'rules.workflow.written');
  return `wrote workflow rules for ${Object.keys(rules).length} tracker(s) to ${out}`;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
