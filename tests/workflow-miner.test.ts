import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { DEFAULT_PER_TRACKER, WorkflowMiner } from '../src/core/domain/workflow-miner.js';
import { UpstreamError } from '../src/core/errors.js';
import type { Issue } from '../src/core/types.js';
import { FakeRedmine, makeIssue } from './helpers/fake-redmine.js';
import { rejected } from './helpers/errors.js';

const log = pino({ level: 'silent' });

/** Fails to load one issue's history. */
class FlakyRedmine extends FakeRedmine {
  constructor(private readonly broken: number) {
    super();
  }

  override async getIssue(issueId: number): Promise<Issue> {
    if (issueId === this.broken) throw new UpstreamError('API error (status 403): ', 403);
    return super.getIssue(issueId);
  }
}

function seed(api: FakeRedmine): void {
  api.issues.set(1, makeIssue({ id: 1, trackerId: 1, statusChanges: [['1', '2']] }));
  api.issues.set(
    2,
    makeIssue({
      id: 2,
      trackerId: 1,
      statusChanges: [
        ['1', '2'],
        ['2', '5']
      ]
    })
  );
  api.issues.set(3, makeIssue({ id: 3, trackerId: 1, statusChanges: [['1', '3']] }));
  // history without status changes
  api.issues.set(10, makeIssue({ id: 10, trackerId: 4 }));
}

describe('WorkflowMiner', () => {
  let api: FakeRedmine;

  beforeEach(() => {
    api = new FakeRedmine();
    seed(api);
  });

  it('builds graphs from observed status changes', async () => {
    const rules = await new WorkflowMiner(api, log).mine();

    expect(rules).toEqual({
      '1': {
        name: 'Bug',
        statuses: {
          '1': { name: 'New', isClosed: false },
          '2': { name: 'In Progress', isClosed: false },
          '3': { name: 'Resolved', isClosed: false },
          '5': { name: 'Closed', isClosed: true }
        },
        transitions: { '1': [2, 3], '2': [5] }
      }
    });
  });

  it('searches every tracker newest first across all statuses', async () => {
    await new WorkflowMiner(api, log).mine();

    expect(api.searches).toEqual([1, 2, 4].map((trackerId) => ({
      trackerId,
      statusId: '*',
      sort: 'updated_on:desc',
      limit: DEFAULT_PER_TRACKER,
      offset: 0
    })));
  });

  it('inspects at most the requested number of issues per tracker', async () => {
    const rules = await new WorkflowMiner(api, log).mine({ perTracker: 2 });

    expect(api.count('getIssue')).toBe(3);
    expect(rules['1'].transitions).toEqual({ '1': [2], '2': [5] });
  });

  it('pages through large trackers', async () => {
    for (let id = 100; id < 220; id++) api.issues.set(id, makeIssue({ id, trackerId: 2 }));

    await new WorkflowMiner(api, log).mine({ perTracker: 150 });

    const featurePages = api.searches.filter((s) => s.trackerId === 2).map((s) => [s.limit, s.offset]);
    expect(featurePages).toEqual([
      [100, 0],
      [50, 100]
    ]);
  });

  it('skips issues whose history cannot be loaded', async () => {
    const flaky = new FlakyRedmine(2);
    seed(flaky);

    const rules = await new WorkflowMiner(flaky, log).mine();

    expect(rules['1'].transitions).toEqual({ '1': [2, 3] });
    expect(rules['1'].statuses['5']).toBeUndefined();
  });

  it('skips a tracker whose search fails', async () => {
    api.fail('searchIssues');
    expect(await new WorkflowMiner(api, log).mine()).toEqual({});
  });

  it('fails when the trackers cannot be listed', async () => {
    api.fail('listTrackers');
    const err = await rejected(UpstreamError, new WorkflowMiner(api, log).mine());
    expect(err.message).toBe('Failed to list trackers: API error (status 500): listTrackers failed');
  });

  it('fails when the statuses cannot be listed', async () => {
    api.fail('listIssueStatuses');
    const err = await rejected(UpstreamError, new WorkflowMiner(api, log).mine());
    expect(err.message).toBe('Failed to list issue statuses: API error (status 500): listIssueStatuses failed');
  });
});
