import type { Logger } from 'pino';
import { z } from 'zod';
import type { RedmineApi } from '../core/directory.js';
import { UpstreamError } from '../core/errors.js';
import {
  type CreateIssueParams,
  type CreateTimeEntryParams,
  type CustomFieldDefinition,
  type CustomFieldDefinitionFull,
  CustomFieldDefinitionFullSchema,
  type CustomFieldPayload,
  EnumerationSchema,
  type Issue,
  type IssuePage,
  type IssuePriority,
  IssueSchema,
  type IssueStatus,
  IssueStatusSchema,
  type ListTimeEntriesParams,
  type Project,
  type ProjectMembership,
  ProjectMembershipSchema,
  ProjectSchema,
  type SearchIssuesParams,
  type SearchUsersParams,
  type TimeEntry,
  type TimeEntryActivity,
  type TimeEntryPage,
  TimeEntrySchema,
  type Tracker,
  TrackerSchema,
  type UpdateIssueParams,
  type UpdateTimeEntryParams,
  type User,
  type UserPage,
  UserSchema
} from '../core/types.js';

/** The subset of `fetch` the client needs; tests pass a stand-in. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RedmineClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  log: Logger;
}

const BATCH_SIZE = 100;
const DEFAULT_LIMIT = 25;
const ISSUE_INCLUDES = 'journals,watchers,relations,allowed_statuses,attachments';

// ==================== RESPONSE ENVELOPES ====================

const ProjectsResponse = z.object({ projects: z.array(ProjectSchema), total_count: z.number().int().default(0) });
const TrackersResponse = z.object({ trackers: z.array(TrackerSchema) });
const StatusesResponse = z.object({ issue_statuses: z.array(IssueStatusSchema) });
const PrioritiesResponse = z.object({ issue_priorities: z.array(EnumerationSchema) });
const ActivitiesResponse = z.object({ time_entry_activities: z.array(EnumerationSchema) });
const MembershipsResponse = z.object({ memberships: z.array(ProjectMembershipSchema) });
const CurrentUserResponse = z.object({ user: UserSchema });
const UsersResponse = z.object({ users: z.array(UserSchema), total_count: z.number().int().default(0) });
const CustomFieldsResponse = z.object({ custom_fields: z.array(CustomFieldDefinitionFullSchema) });
const IssuesResponse = z.object({ issues: z.array(IssueSchema), total_count: z.number().int().default(0) });
const IssueResponse = z.object({ issue: IssueSchema });
const TimeEntryResponse = z.object({ time_entry: TimeEntrySchema });
const TimeEntriesResponse = z.object({
  time_entries: z.array(TimeEntrySchema),
  total_count: z.number().int().default(0)
});

/**
 * Redmine JSON API client.
 *
 * Every transport failure, non-2xx answer and unexpected payload surfaces as
 * an {@link UpstreamError}; `status` is set whenever the server answered.
 */
export class RedmineClient implements RedmineApi {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  public readonly log: Logger;

  constructor(options: RedmineClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.log = options.log;
  }

  // ==================== DIRECTORIES ====================

  async getCurrentUser(): Promise<User> {
    const { user } = await this.get('/users/current.json', CurrentUserResponse);
    return withDisplayName(user);
  }

  /** Requires admin privileges. */
  async searchUsers(params: SearchUsersParams): Promise<UserPage> {
    const query = new URLSearchParams();
    if (params.name) query.set('name', params.name);
    query.set('status', String(params.status ?? 1));
    query.set('limit', String(params.limit && params.limit > 0 ? params.limit : DEFAULT_LIMIT));
    if (params.offset) query.set('offset', String(params.offset));

    const res = await this.get(`/users.json?${query.toString()}`, UsersResponse);
    return { users: res.users.map(withDisplayName), totalCount: res.total_count };
  }

  async listProjects(limit: number): Promise<Project[]> {
    const max = limit > 0 ? limit : BATCH_SIZE;
    const all: Project[] = [];
    let offset = 0;

    for (;;) {
      const page = await this.get(`/projects.json?limit=${BATCH_SIZE}&offset=${offset}`, ProjectsResponse);
      all.push(...page.projects);
      if (all.length >= page.total_count || all.length >= max || page.projects.length === 0) break;
      offset += page.projects.length;
    }

    return all.slice(0, max);
  }

  async listTrackers(): Promise<Tracker[]> {
    return (await this.get('/trackers.json', TrackersResponse)).trackers;
  }

  async listIssueStatuses(): Promise<IssueStatus[]> {
    return (await this.get('/issue_statuses.json', StatusesResponse)).issue_statuses;
  }

  async listIssuePriorities(): Promise<IssuePriority[]> {
    return (await this.get('/enumerations/issue_priorities.json', PrioritiesResponse)).issue_priorities;
  }

  async listTimeEntryActivities(): Promise<TimeEntryActivity[]> {
    return (await this.get('/enumerations/time_entry_activities.json', ActivitiesResponse)).time_entry_activities;
  }

  async getProjectMemberships(projectId: number, limit: number): Promise<ProjectMembership[]> {
    const max = limit > 0 ? limit : BATCH_SIZE;
    const res = await this.get(`/projects/${projectId}/memberships.json?limit=${max}`, MembershipsResponse);
    return res.memberships;
  }

  /**
   * Custom field definitions as seen on one issue of the scope. Needs no
   * privilege, but only fields with a value slot on that issue show up.
   */
  async getProjectCustomFields(projectId: number, trackerId: number): Promise<CustomFieldDefinition[]> {
    const query = new URLSearchParams({ project_id: String(projectId), limit: '1' });
    if (trackerId > 0) query.set('tracker_id', String(trackerId));

    const { issues } = await this.get(`/issues.json?${query.toString()}`, IssuesResponse);
    const sample = issues[0];
    if (!sample) return [];

    const issue = await this.getIssue(sample.id);
    return issue.custom_fields.map((cf) => ({ id: cf.id, name: cf.name, fieldFormat: 'unknown' }));
  }

  /** Requires admin privileges. */
  async listAllCustomFields(): Promise<CustomFieldDefinitionFull[]> {
    return (await this.get('/custom_fields.json', CustomFieldsResponse)).custom_fields;
  }

  // ==================== ISSUES ====================

  async searchIssues(params: SearchIssuesParams): Promise<IssuePage> {
    const query = new URLSearchParams();
    if (params.projectId !== undefined) query.set('project_id', String(params.projectId));
    if (params.trackerId) query.set('tracker_id', String(params.trackerId));
    if (params.statusId) query.set('status_id', params.statusId);
    if (params.assignedToId) query.set('assigned_to_id', params.assignedToId);
    // ~ is Redmine's "contains" operator
    if (params.subject) query.set('subject', `~${params.subject}`);
    if (params.parentId) query.set('parent_id', String(params.parentId));
    if (params.createdOn) query.set('created_on', params.createdOn);
    if (params.updatedOn) query.set('updated_on', params.updatedOn);
    if (params.sort) query.set('sort', params.sort);
    for (const [fieldId, value] of Object.entries(params.customFieldFilter ?? {})) {
      query.set(`cf_${fieldId}`, value);
    }
    query.set('limit', String(params.limit && params.limit > 0 ? params.limit : DEFAULT_LIMIT));
    if (params.offset) query.set('offset', String(params.offset));

    const res = await this.get(`/issues.json?${query.toString()}`, IssuesResponse);
    return { issues: res.issues, totalCount: res.total_count };
  }

  async getIssue(issueId: number): Promise<Issue> {
    return (await this.get(`/issues/${issueId}.json?include=${ISSUE_INCLUDES}`, IssueResponse)).issue;
  }

  async createIssue(params: CreateIssueParams): Promise<Issue> {
    const issue: Record<string, unknown> = {
      project_id: params.projectId,
      tracker_id: params.trackerId,
      subject: params.subject
    };
    if (params.description) issue.description = params.description;
    if (params.statusId) issue.status_id = params.statusId;
    if (params.priorityId) issue.priority_id = params.priorityId;
    if (params.assignedToId) issue.assigned_to_id = params.assignedToId;
    if (params.parentIssueId) issue.parent_issue_id = params.parentIssueId;
    if (params.startDate) issue.start_date = params.startDate;
    if (params.dueDate) issue.due_date = params.dueDate;
    if (params.isPrivate !== undefined) issue.is_private = params.isPrivate;
    if (params.customFields && Object.keys(params.customFields).length > 0) {
      issue.custom_fields = customFieldsBody(params.customFields);
    }

    const res = await this.send('POST', '/issues.json', { issue }, IssueResponse);
    return res.issue;
  }

  async updateIssue(params: UpdateIssueParams): Promise<void> {
    const issue: Record<string, unknown> = {};
    if (params.subject) issue.subject = params.subject;
    if (params.description) issue.description = params.description;
    if (params.statusId) issue.status_id = params.statusId;
    if (params.priorityId) issue.priority_id = params.priorityId;
    if (params.trackerId) issue.tracker_id = params.trackerId;
    if (params.assignedToId) issue.assigned_to_id = params.assignedToId;
    if (params.startDate) issue.start_date = params.startDate;
    if (params.dueDate) issue.due_date = params.dueDate;
    if (params.doneRatio !== undefined) issue.done_ratio = params.doneRatio;
    if (params.isPrivate !== undefined) issue.is_private = params.isPrivate;
    if (params.notes) issue.notes = params.notes;
    if (params.customFields && Object.keys(params.customFields).length > 0) {
      issue.custom_fields = customFieldsBody(params.customFields);
    }

    // Redmine answers 204 with an empty body
    await this.send('PUT', `/issues/${params.issueId}.json`, { issue });
  }

  // ==================== TIME ENTRIES ====================

  async createTimeEntry(params: CreateTimeEntryParams): Promise<TimeEntry> {
    const entry: Record<string, unknown> = { issue_id: params.issueId, hours: params.hours };
    if (params.activityId) entry.activity_id = params.activityId;
    if (params.comments) entry.comments = params.comments;
    if (params.spentOn) entry.spent_on = params.spentOn;

    const res = await this.send('POST', '/time_entries.json', { time_entry: entry }, TimeEntryResponse);
    return res.time_entry;
  }

  async updateTimeEntry(params: UpdateTimeEntryParams): Promise<void> {
    const entry: Record<string, unknown> = {};
    if (params.hours !== undefined) entry.hours = params.hours;
    if (params.activityId) entry.activity_id = params.activityId;
    if (params.comments !== undefined) entry.comments = params.comments;
    if (params.spentOn) entry.spent_on = params.spentOn;

    await this.send('PUT', `/time_entries/${params.timeEntryId}.json`, { time_entry: entry });
  }

  async deleteTimeEntry(timeEntryId: number): Promise<void> {
    await this.send('DELETE', `/time_entries/${timeEntryId}.json`, undefined);
  }

  async listTimeEntries(params: ListTimeEntriesParams): Promise<TimeEntryPage> {
    const query = new URLSearchParams();
    if (params.projectId !== undefined) query.set('project_id', String(params.projectId));
    if (params.userId) query.set('user_id', params.userId);
    if (params.issueId) query.set('issue_id', String(params.issueId));
    if (params.from) query.set('from', params.from);
    if (params.to) query.set('to', params.to);
    // Redmine defaults to the current month without a date filter
    if (!params.from && !params.to) query.set('spent_on', '*');
    query.set('limit', String(params.limit && params.limit > 0 ? params.limit : DEFAULT_LIMIT));
    if (params.offset) query.set('offset', String(params.offset));

    const res = await this.get(`/time_entries.json?${query.toString()}`, TimeEntriesResponse);
    return { timeEntries: res.time_entries, totalCount: res.total_count };
  }

  // ==================== TRANSPORT ====================

  private async get<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S>> {
    const body = await this.request('GET', path);
    return this.parse(path, body, schema);
  }

  private async send<S extends z.ZodTypeAny>(method: string, path: string, payload: unknown, schema: S): Promise<z.output<S>>;
  private async send(method: string, path: string, payload: unknown): Promise<void>;
  private async send<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    payload: unknown,
    schema?: S
  ): Promise<z.output<S> | void> {
    const body = await this.request(method, path, payload);
    if (schema) return this.parse(path, body, schema);
  }

  private async request(method: string, path: string, payload?: unknown): Promise<string> {
    const started = Date.now();
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: { 'X-Redmine-API-Key': this.apiKey, 'Content-Type': 'application/json' },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(`request failed: ${method} ${path}: ${reason}`, undefined, { cause: err });
    }

    const text = await res.text().catch((err: unknown) => {
      throw new UpstreamError(`failed to read response: ${method} ${path}`, res.status, { cause: err });
    });
    this.log.debug({ method, path, status: res.status, ms: Date.now() - started }, 'redmine.request');

    if (!res.ok) {
      throw new UpstreamError(`API error (status ${res.status}): ${text.slice(0, 500)}`, res.status);
    }
    return text;
  }

  private parse<S extends z.ZodTypeAny>(path: string, text: string, schema: S): z.output<S> {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new UpstreamError(`failed to parse response from ${path}`, undefined, { cause: err });
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new UpstreamError(`unexpected response from ${path}: ${detail}`);
    }
    return parsed.data;
  }
}

function customFieldsBody(fields: CustomFieldPayload): Array<{ id: number; value: string | string[] }> {
  return Object.entries(fields).map(([id, value]) => ({ id: Number(id), value }));
}

// user records carry firstname/lastname but no display name
function withDisplayName(user: User): User {
  const name = user.name ?? [user.firstname, user.lastname].filter(Boolean).join(' ');
  return { ...user, name };
}
