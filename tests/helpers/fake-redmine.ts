import type { RedmineApi } from '../../src/core/directory.js';
import { UpstreamError } from '../../src/core/errors.js';
import type {
  CreateIssueParams,
  CreateTimeEntryParams,
  CustomFieldDefinition,
  CustomFieldDefinitionFull,
  Issue,
  IssuePage,
  IssuePriority,
  IssueStatus,
  ListTimeEntriesParams,
  Project,
  ProjectMembership,
  SearchIssuesParams,
  SearchUsersParams,
  TimeEntry,
  TimeEntryActivity,
  TimeEntryPage,
  Tracker,
  UpdateIssueParams,
  UpdateTimeEntryParams,
  User,
  UserPage
} from '../../src/core/types.js';

type Method = keyof RedmineApi;

/**
 * In-memory Redmine. Every call is counted; `fail` makes a method reject
 * with an UpstreamError, `failOnce` only on its next call.
 */
export class FakeRedmine implements RedmineApi {
  projects: Project[] = [
    { id: 1, name: 'Platform', identifier: 'platform' },
    { id: 2, name: 'Platform Tools', identifier: 'ptools' },
    { id: 3, name: 'Website', identifier: 'web' }
  ];
  trackers: Tracker[] = [
    { id: 1, name: 'Bug' },
    { id: 2, name: 'Feature' },
    { id: 4, name: 'Support' }
  ];
  statuses: IssueStatus[] = [
    { id: 1, name: 'New', is_closed: false },
    { id: 2, name: 'In Progress', is_closed: false },
    { id: 3, name: 'Resolved', is_closed: false },
    { id: 5, name: 'Closed', is_closed: true }
  ];
  priorities: IssuePriority[] = [
    { id: 1, name: 'Low', is_default: false, active: true },
    { id: 2, name: 'Normal', is_default: true, active: true },
    { id: 3, name: 'High', is_default: false, active: true }
  ];
  activities: TimeEntryActivity[] = [
    { id: 8, name: 'Design', is_default: false, active: true },
    { id: 9, name: 'Development', is_default: true, active: true }
  ];
  memberships: Record<number, ProjectMembership[]> = {
    1: [
      membership(1, 1, { user: { id: 10, name: 'Alice Smith' } }),
      membership(2, 1, { user: { id: 11, name: 'Bob Jones' } }),
      membership(3, 1, { user: { id: 12, name: 'Alicia Keyes' } }),
      membership(4, 1, { group: { id: 50, name: 'Alice Team' } })
    ]
  };
  currentUser: User = { id: 10, login: 'alice', firstname: 'Alice', lastname: 'Smith', name: 'Alice Smith' };
  globalFields: CustomFieldDefinitionFull[] | undefined = undefined;
  /** Global user list; undefined answers 403 like a non-admin key. */
  users: User[] | undefined = undefined;
  scopedFields: Record<string, CustomFieldDefinition[]> = {};
  issues = new Map<number, Issue>();
  spent: TimeEntry[] = [];

  readonly calls = new Map<Method, number>();
  readonly created: CreateIssueParams[] = [];
  readonly updated: UpdateIssueParams[] = [];
  readonly timeEntries: CreateTimeEntryParams[] = [];
  readonly searches: SearchIssuesParams[] = [];
  readonly timeQueries: ListTimeEntriesParams[] = [];
  readonly timeEntryUpdates: UpdateTimeEntryParams[] = [];
  readonly deletedTimeEntries: number[] = [];
  readonly userSearches: SearchUsersParams[] = [];
  private readonly failing = new Set<Method>();
  private readonly failingOnce = new Map<Method, number>();

  fail(method: Method): this {
    this.failing.add(method);
    return this;
  }

  failOnce(method: Method, status = 500): this {
    this.failingOnce.set(method, status);
    return this;
  }

  count(method: Method): number {
    return this.calls.get(method) ?? 0;
  }

  async listProjects(limit: number): Promise<Project[]> {
    this.hit('listProjects');
    return this.projects.slice(0, limit);
  }

  async listTrackers(): Promise<Tracker[]> {
    this.hit('listTrackers');
    return this.trackers;
  }

  async listIssueStatuses(): Promise<IssueStatus[]> {
    this.hit('listIssueStatuses');
    return this.statuses;
  }

  async listIssuePriorities(): Promise<IssuePriority[]> {
    this.hit('listIssuePriorities');
    return this.priorities;
  }

  async listTimeEntryActivities(): Promise<TimeEntryActivity[]> {
    this.hit('listTimeEntryActivities');
    return this.activities;
  }

  async getProjectMemberships(projectId: number): Promise<ProjectMembership[]> {
    this.hit('getProjectMemberships');
    return this.memberships[projectId] ?? [];
  }

  async getCurrentUser(): Promise<User> {
    this.hit('getCurrentUser');
    return this.currentUser;
  }

  async getProjectCustomFields(projectId: number, trackerId: number): Promise<CustomFieldDefinition[]> {
    this.hit('getProjectCustomFields');
    return this.scopedFields[`${projectId}:${trackerId}`] ?? [];
  }

  async listAllCustomFields(): Promise<CustomFieldDefinitionFull[]> {
    this.hit('listAllCustomFields');
    if (!this.globalFields) throw new UpstreamError('API error (status 403): Forbidden', 403);
    return this.globalFields;
  }

  async searchIssues(params: SearchIssuesParams): Promise<IssuePage> {
    this.hit('searchIssues');
    this.searches.push(params);
    const matching = [...this.issues.values()].filter(
      (i) => params.trackerId === undefined || i.tracker.id === params.trackerId
    );
    const offset = params.offset ?? 0;
    const page = matching.slice(offset, offset + (params.limit ?? 25));
    return { issues: page, totalCount: matching.length };
  }

  async getIssue(issueId: number): Promise<Issue> {
    this.hit('getIssue');
    const issue = this.issues.get(issueId);
    if (!issue) throw new UpstreamError('API error (status 404): ', 404);
    return issue;
  }

  async createIssue(params: CreateIssueParams): Promise<Issue> {
    this.hit('createIssue');
    this.created.push(params);
    const id = 1000 + this.created.length;
    const issue = makeIssue({
      id,
      projectId: params.projectId,
      projectName: this.projects.find((p) => p.id === params.projectId)?.name,
      trackerId: params.trackerId,
      trackerName: this.trackers.find((t) => t.id === params.trackerId)?.name,
      subject: params.subject
    });
    this.issues.set(id, issue);
    return issue;
  }

  async updateIssue(params: UpdateIssueParams): Promise<void> {
    this.hit('updateIssue');
    this.updated.push(params);
  }

  async createTimeEntry(params: CreateTimeEntryParams): Promise<TimeEntry> {
    this.hit('createTimeEntry');
    this.timeEntries.push(params);
    return {
      id: 700 + this.timeEntries.length,
      project: { id: 1, name: 'Platform' },
      issue: { id: params.issueId },
      user: { id: 10, name: 'Alice Smith' },
      activity: { id: params.activityId ?? 9, name: params.activityId === 8 ? 'Design' : 'Development' },
      hours: params.hours,
      comments: params.comments ?? '',
      spent_on: params.spentOn ?? '2024-03-01'
    };
  }

  async updateTimeEntry(params: UpdateTimeEntryParams): Promise<void> {
    this.hit('updateTimeEntry');
    this.timeEntryUpdates.push(params);
  }

  async deleteTimeEntry(timeEntryId: number): Promise<void> {
    this.hit('deleteTimeEntry');
    this.deletedTimeEntries.push(timeEntryId);
  }

  async searchUsers(params: SearchUsersParams): Promise<UserPage> {
    this.hit('searchUsers');
    this.userSearches.push(params);
    if (!this.users) throw new UpstreamError('API error (status 403): Forbidden', 403);
    const needle = params.name?.toLowerCase() ?? '';
    const matching = this.users.filter((u) => (u.name ?? '').toLowerCase().includes(needle));
    return { users: matching.slice(0, params.limit ?? 25), totalCount: matching.length };
  }

  async listTimeEntries(params: ListTimeEntriesParams): Promise<TimeEntryPage> {
    this.hit('listTimeEntries');
    this.timeQueries.push(params);
    return { timeEntries: this.spent, totalCount: this.spent.length };
  }

  private hit(method: Method): void {
    this.calls.set(method, this.count(method) + 1);
    const once = this.failingOnce.get(method);
    if (once !== undefined) {
      this.failingOnce.delete(method);
      throw new UpstreamError(`API error (status ${once}): ${method} failed`, once);
    }
    if (this.failing.has(method)) {
      throw new UpstreamError(`API error (status 500): ${method} failed`, 500);
    }
  }
}

export function membership(
  id: number,
  projectId: number,
  who: { user?: { id: number; name: string }; group?: { id: number; name: string } }
): ProjectMembership {
  return { id, project: { id: projectId, name: `Project ${projectId}` }, roles: [], ...who };
}

export interface IssueSeed {
  id: number;
  projectId?: number;
  projectName?: string;
  trackerId?: number;
  trackerName?: string;
  statusId?: number;
  subject?: string;
  /** `[from, to]` status changes, one journal each. */
  statusChanges?: Array<[string | null, string | null]>;
  customFields?: Issue['custom_fields'];
}

export function makeIssue(seed: IssueSeed): Issue {
  return {
    id: seed.id,
    project: { id: seed.projectId ?? 1, name: seed.projectName ?? 'Platform' },
    tracker: { id: seed.trackerId ?? 1, name: seed.trackerName ?? 'Bug' },
    status: { id: seed.statusId ?? 1, name: 'New' },
    priority: { id: 2, name: 'Normal' },
    author: { id: 10, name: 'Alice Smith' },
    subject: seed.subject ?? `Issue ${seed.id}`,
    done_ratio: 0,
    created_on: '2024-03-01T10:00:00Z',
    updated_on: '2024-03-02T10:00:00Z',
    custom_fields: seed.customFields ?? [],
    journals: (seed.statusChanges ?? []).map(([from, to], i) => ({
      id: seed.id * 100 + i,
      details: [{ property: 'attr', name: 'status_id', old_value: from, new_value: to }]
    })),
    watchers: [],
    allowed_statuses: []
  };
}
