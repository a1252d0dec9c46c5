import type { Logger } from 'pino';
import type { DirectorySource } from '../directory.js';
import { toUpstreamError } from '../errors.js';
import type { Issue } from '../types.js';
import type { BaseComponent } from './base.js';
import { type ObservedTracker, type WorkflowRuleSet, buildWorkflowRules, extractTransitions } from './workflow.js';

const PAGE_SIZE = 100;
export const DEFAULT_PER_TRACKER = 50;

export interface MineOptions {
  /** Most recently updated records inspected per tracker. */
  perTracker?: number;
}

/**
 * Reconstructs per-tracker workflow graphs from the status changes recorded
 * in recent issue histories. Only observed transitions are reported.
 */
export class WorkflowMiner implements BaseComponent {
  constructor(
    private readonly source: DirectorySource,
    public readonly log: Logger
  ) {}

  async mine(options: MineOptions = {}): Promise<WorkflowRuleSet> {
    const perTracker = options.perTracker && options.perTracker > 0 ? options.perTracker : DEFAULT_PER_TRACKER;

    const trackers = await this.source.listTrackers().catch((err: unknown) => {
      throw toUpstreamError(err, 'Failed to list trackers');
    });
    const statuses = await this.source.listIssueStatuses().catch((err: unknown) => {
      throw toUpstreamError(err, 'Failed to list issue statuses');
    });

    const observed = new Map<number, ObservedTracker>();

    for (const [index, tracker] of trackers.entries()) {
      this.log.info(
        { tracker: tracker.name, trackerId: tracker.id, position: index + 1, total: trackers.length },
        'workflow.mine.tracker'
      );

      const records = await this.recentIssues(tracker.id, tracker.name, perTracker);
      if (records.length === 0) {
        this.log.info({ tracker: tracker.name }, 'workflow.mine.empty');
        continue;
      }

      const data: ObservedTracker = { name: tracker.name, transitions: new Map() };
      let count = 0;
      for (const record of records) {
        let issue: Issue;
        try {
          issue = await this.source.getIssue(record.id);
        } catch (err) {
          this.log.warn({ issueId: record.id, err: errorMessage(err) }, 'workflow.mine.issue_failed');
          continue;
        }
        for (const [from, to] of extractTransitions(issue.journals)) {
          const targets = data.transitions.get(from);
          if (targets) targets.push(to);
          else data.transitions.set(from, [to]);
          count++;
        }
      }

      this.log.info({ tracker: tracker.name, issues: records.length, transitions: count }, 'workflow.mine.inspected');
      observed.set(tracker.id, data);
    }

    return buildWorkflowRules(statuses, observed);
  }

  // Newest first, paged, until the cap or a short page. A failed page ends
  // the listing for this tracker and keeps what was already fetched.
  private async recentIssues(trackerId: number, trackerName: string, cap: number): Promise<Issue[]> {
    const collected: Issue[] = [];
    let remaining = cap;
    let offset = 0;

    while (remaining > 0) {
      const limit = Math.min(remaining, PAGE_SIZE);
      let page: Issue[];
      try {
        const result = await this.source.searchIssues({
          trackerId,
          statusId: '*',
          sort: 'updated_on:desc',
          limit,
          offset
        });
        page = result.issues;
      } catch (err) {
        this.log.warn({ tracker: trackerName, offset, err: errorMessage(err) }, 'workflow.mine.search_failed');
        break;
      }

      collected.push(...page);
      if (page.length < limit) break;
      remaining -= page.length;
      offset += page.length;
    }

    return collected;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
