import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CustomFieldRuleSet } from '../src/core/domain/field-rules.js';
import type { WorkflowRuleSet } from '../src/core/domain/workflow.js';
import { ConfigurationError } from '../src/core/errors.js';
import {
  loadFieldRules,
  loadSessionRules,
  loadWorkflowRules,
  saveFieldRules,
  saveWorkflowRules
} from '../src/infra/rule-files.js';
import { rejected } from './helpers/errors.js';

const log = pino({ level: 'silent' });

const FIELDS: CustomFieldRuleSet = {
  '223': { name: 'Product', values: ['Alpha', 'Beta'], requiredByTrackers: [32] },
  '42': { name: 'Component', values: ['SW Tool', 'HW'], requiredByTrackers: [] }
};

const WORKFLOW: WorkflowRuleSet = {
  '4': {
    name: 'Support',
    statuses: {
      '33': { name: 'Open', isClosed: false },
      '9': { name: 'Closed', isClosed: true }
    },
    transitions: { '33': [9] }
  }
};

describe('rule files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'redmine-rules-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('field rules', () => {
    it('reads the wrapped form', async () => {
      const path = join(dir, 'fields.json');
      await writeFile(
        path,
        JSON.stringify({ fields: { '42': { name: 'Component', values: ['SW Tool', 'HW'], required_by_trackers: [1] } } })
      );
      expect(await loadFieldRules(path)).toEqual({
        '42': { name: 'Component', values: ['SW Tool', 'HW'], requiredByTrackers: [1] }
      });
    });

    it('reads the bare form and fills defaults', async () => {
      const path = join(dir, 'fields.json');
      await writeFile(path, JSON.stringify({ '230': { name: 'Ticket Ref' } }));
      expect(await loadFieldRules(path)).toEqual({
        '230': { name: 'Ticket Ref', values: [], requiredByTrackers: [] }
      });
    });

    it('treats a missing file as no rules', async () => {
      expect(await loadFieldRules(join(dir, 'absent.json'))).toBeUndefined();
    });

    it('rejects malformed JSON', async () => {
      const path = join(dir, 'fields.json');
      await writeFile(path, '{ "42": ');
      const err = await rejected(ConfigurationError, loadFieldRules(path));
      expect(err.message).toBe(`failed to parse rule file ${path}`);
    });

    it('rejects a document of the wrong shape', async () => {
      const path = join(dir, 'fields.json');
      await writeFile(path, JSON.stringify({ component: { name: 'Component' } }));
      const err = await rejected(ConfigurationError, loadFieldRules(path));
      expect(err.message).toContain(`invalid rule file ${path}`);
    });

    it('writes the wrapped form in id order and reads it back', async () => {
      const path = join(dir, 'nested', 'fields.json');
      await saveFieldRules(path, FIELDS);

      const text = await readFile(path, 'utf8');
      expect(text.endsWith('}\n')).toBe(true);
      const doc: unknown = JSON.parse(text);
      expect(doc).toEqual({
        fields: {
          '42': { name: 'Component', values: ['SW Tool', 'HW'], required_by_trackers: [] },
          '223': { name: 'Product', values: ['Alpha', 'Beta'], required_by_trackers: [32] }
        }
      });
      expect(await loadFieldRules(path)).toEqual(FIELDS);
    });
  });

  describe('workflow rules', () => {
    it('round-trips through the snake_case file form', async () => {
      const path = join(dir, 'workflow.json');
      await saveWorkflowRules(path, WORKFLOW);

      const doc: unknown = JSON.parse(await readFile(path, 'utf8'));
      expect(doc).toEqual({
        trackers: {
          '4': {
            name: 'Support',
            statuses: { '9': { name: 'Closed', is_closed: true }, '33': { name: 'Open', is_closed: false } },
            transitions: { '33': [9] }
          }
        }
      });
      expect(await loadWorkflowRules(path)).toEqual(WORKFLOW);
    });

    it('reads the bare form', async () => {
      const path = join(dir, 'workflow.json');
      await writeFile(path, JSON.stringify({ '4': { name: 'Support', transitions: { '33': [9] } } }));
      expect(await loadWorkflowRules(path)).toEqual({
        '4': { name: 'Support', statuses: {}, transitions: { '33': [9] } }
      });
    });

    it('orders and deduplicates hand-written target lists', async () => {
      const path = join(dir, 'workflow.json');
      await writeFile(path, JSON.stringify({ trackers: { '4': { name: 'Support', transitions: { '33': [9, 2, 9, 5] } } } }));
      expect(await loadWorkflowRules(path)).toEqual({
        '4': { name: 'Support', statuses: {}, transitions: { '33': [2, 5, 9] } }
      });
    });

    it('rejects non-numeric status keys', async () => {
      const path = join(dir, 'workflow.json');
      await writeFile(path, JSON.stringify({ trackers: { '4': { name: 'Support', transitions: { open: [9] } } } }));
      await rejected(ConfigurationError, loadWorkflowRules(path));
    });
  });

  describe('loadSessionRules', () => {
    it('builds engines from the configured files', async () => {
      const fields = join(dir, 'fields.json');
      const workflow = join(dir, 'workflow.json');
      await saveFieldRules(fields, FIELDS);
      await saveWorkflowRules(workflow, WORKFLOW);

      const rules = await loadSessionRules(
        { REDMINE_FIELD_RULES_FILE: fields, REDMINE_WORKFLOW_RULES_FILE: workflow, REDMINE_WORKFLOW_STRICT: true },
        log
      );

      expect(rules.fields.size).toBe(2);
      expect(rules.workflow.size).toBe(1);
      expect(rules.workflow.strict).toBe(true);
    });

    it('starts with empty engines when files are missing or broken', async () => {
      const broken = join(dir, 'workflow.json');
      await writeFile(broken, 'not json');

      const rules = await loadSessionRules(
        {
          REDMINE_FIELD_RULES_FILE: join(dir, 'absent.json'),
          REDMINE_WORKFLOW_RULES_FILE: broken,
          REDMINE_WORKFLOW_STRICT: false
        },
        log
      );

      expect(rules.fields.size).toBe(0);
      expect(rules.workflow.size).toBe(0);
      expect(rules.workflow.strict).toBe(false);
    });

    it('needs no files at all', async () => {
      const rules = await loadSessionRules(
        { REDMINE_FIELD_RULES_FILE: undefined, REDMINE_WORKFLOW_RULES_FILE: undefined, REDMINE_WORKFLOW_STRICT: false },
        log
      );
      expect(rules.fields.size).toBe(0);
    });
  });
});
