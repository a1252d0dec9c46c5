import type { Logger } from 'pino';
import type { RedmineApi } from './directory.js';
import {
  type BaseComponent,
  type CustomFieldRuleEngine,
  type CustomFieldScope,
  type FieldValue,
  type WorkflowStateMachine,
  EntityResolver,
  fromFieldValue,
  parseNumericId
} from './domain/index.js';
import {
  ConfigurationError,
  ForbiddenError,
  NotFoundError,
  TrackerError,
  UpstreamError,
  ValidationError,
  toUpstreamError
} from './errors.js';
import {
  type IssueDetail,
  type IssueSummary,
  type TimeEntrySummary,
  filledCustomFieldIds,
  mapIssueDetail,
  mapIssueSummary,
  mapTimeEntry
} from './mappers.js';
import type {
  CreateIssueParams,
  CustomFieldDefinitionFull,
  CustomFieldPayload,
  IdName,
  Issue,
  IssueCustomField,
  IssuePriority,
  IssueStatus,
  Project,
  TimeEntryActivity,
  Tracker,
  UpdateIssueParams,
  UpdateTimeEntryParams,
  User
} from './types.js';

/** Rule sets shared read-only by every session of a process. */
export interface SessionRules {
  fields: CustomFieldRuleEngine;
  workflow: WorkflowStateMachine;
}

export interface SessionOptions {
  readOnly?: boolean;
}

// ==================== INPUTS ====================

export interface SearchIssuesInput {
  project?: string;
  tracker?: string;
  /** Defaults to `open`. */
  status?: string;
  assignedTo?: string;
  subject?: string;
  parentId?: number;
  createdOn?: string;
  updatedOn?: string;
  sort?: string;
  customFields?: Record<string, string>;
  limit?: number;
  offset?: number;
}

export interface CreateIssueInput {
  project: string;
  tracker: string;
  subject: string;
  description?: string;
  status?: string;
  priority?: string;
  assignedTo?: string;
  parentIssueId?: number;
  startDate?: string;
  dueDate?: string;
  isPrivate?: boolean;
  customFields?: Record<string, FieldValue>;
}

/** Creation fields that do not pick the project or tracker. */
export type IssueFieldsInput = Omit<CreateIssueInput, 'project' | 'tracker'>;

export interface CreateSubtaskInput extends Omit<IssueFieldsInput, 'parentIssueId' | 'status'> {
  parentIssueId: number;
  /** Defaults to the parent's tracker. */
  tracker?: string;
}

export interface CopyIssueInput {
  issueId: number;
  /** Defaults to the source issue's project. */
  project?: string;
  subject?: string;
}

export interface BatchUpdateInput {
  issueIds: number[];
  status?: string;
  priority?: string;
  assignedTo?: string;
  notes?: string;
}

export interface UpdateIssueInput {
  issueId: number;
  subject?: string;
  description?: string;
  status?: string;
  priority?: string;
  tracker?: string;
  assignedTo?: string;
  startDate?: string;
  dueDate?: string;
  doneRatio?: number;
  isPrivate?: boolean;
  notes?: string;
  customFields?: Record<string, FieldValue>;
}

export interface LogTimeInput {
  issueId: number;
  hours: number;
  activity?: string;
  comments?: string;
  spentOn?: string;
}

export interface UpdateTimeEntryInput {
  timeEntryId: number;
  hours?: number;
  activity?: string;
  comments?: string;
  spentOn?: string;
}

export interface SearchUsersInput {
  name?: string;
  /** Restricts the search to the project's members; needs no admin rights. */
  project?: string;
  status?: number;
  limit?: number;
}

export interface ListTimeEntriesInput {
  project?: string;
  user?: string;
  issueId?: number;
  from?: string;
  to?: string;
  limit?: number;
  offset?: number;
}

// ==================== OUTPUTS ====================

export interface RequiredFieldsReport {
  project: IdName;
  tracker: IdName;
  required: {
    standard: string[];
    custom: Array<{ id: number; name: string; values: string[] }>;
  };
  /** Fields seen on an issue of this project and tracker. */
  available: Array<{ id: number; name: string }>;
  note?: string;
}

export interface BatchUpdateReport {
  succeeded: number[];
  failed: Array<{ issueId: number; code: string; error: string }>;
}

export interface UserSummary {
  id: number;
  name: string;
  login?: string;
  mail?: string;
}

export interface TrackerWorkflowReport {
  trackerId: number;
  trackerName: string;
  statuses: Array<IdName & { isClosed: boolean }>;
  transitions: Array<{ from: IdName; allowed: IdName[] }>;
}

/**
 * One caller identity: a client, its resolver cache and the shared rule sets.
 * Each mutating operation runs resolve → validate → mutate and stops at the
 * first error.
 */
export class RedmineSession implements BaseComponent {
  readonly resolver: EntityResolver;
  readonly readOnly: boolean;

  constructor(
    private readonly api: RedmineApi,
    readonly rules: SessionRules,
    public readonly log: Logger,
    options: SessionOptions = {}
  ) {
    this.resolver = new EntityResolver(api, log);
    this.readOnly = options.readOnly ?? false;
  }

  // ==================== DIRECTORIES ====================

  async me(): Promise<User> {
    try {
      return await this.api.getCurrentUser();
    } catch (err) {
      throw toUpstreamError(err, 'Failed to load current user');
    }
  }

  async listProjects(limit?: number): Promise<Project[]> {
    const projects = await this.resolver.projects();
    return limit && limit > 0 ? projects.slice(0, limit) : projects;
  }

  listTrackers(): Promise<Tracker[]> {
    return this.resolver.trackers();
  }

  listStatuses(): Promise<IssueStatus[]> {
    return this.resolver.statuses();
  }

  listPriorities(): Promise<IssuePriority[]> {
    return this.resolver.priorities();
  }

  listActivities(): Promise<TimeEntryActivity[]> {
    return this.resolver.activities();
  }

  /** Privileged listing, optionally narrowed to one customized type (`issue`, `project`, ...). */
  async listCustomFields(type?: string): Promise<CustomFieldDefinitionFull[]> {
    const fields = await this.resolver.customFields();
    return type ? fields.filter((f) => f.customized_type === type) : fields;
  }

  // ==================== ISSUES ====================

  async searchIssues(input: SearchIssuesInput): Promise<{ issues: IssueSummary[]; count: number; totalCount: number }> {
    const projectId = input.project ? await this.resolver.resolveProject(input.project) : undefined;
    const trackerId = input.tracker ? await this.resolver.resolveTracker(input.tracker) : undefined;
    const statusId = await this.resolver.resolveStatusFilter(input.status ?? 'open');

    let assignedToId: string | undefined;
    if (input.assignedTo) {
      // `me` is understood by the server itself
      assignedToId =
        input.assignedTo.toLowerCase() === 'me' ? 'me' : String(await this.resolver.resolveUser(input.assignedTo, projectId));
    }

    let customFieldFilter: Record<string, string> | undefined;
    if (input.customFields && Object.keys(input.customFields).length > 0) {
      customFieldFilter = {};
      const scope = { projectId, trackerId };
      const unknown: string[] = [];
      for (const [key, value] of Object.entries(input.customFields)) {
        const fieldId = await this.resolveFieldKey(key, scope);
        if (fieldId === undefined) unknown.push(key);
        else customFieldFilter[String(fieldId)] = value;
      }
      if (unknown.length > 0) throw await this.unknownFieldsError(unknown, scope);
    }

    const page = await this.api
      .searchIssues({
        projectId,
        trackerId,
        statusId,
        assignedToId,
        subject: input.subject,
        parentId: input.parentId,
        createdOn: input.createdOn,
        updatedOn: input.updatedOn,
        sort: input.sort,
        customFieldFilter,
        limit: input.limit,
        offset: input.offset
      })
      .catch((err: unknown) => {
        throw toUpstreamError(err, 'Failed to search issues');
      });

    const issues = page.issues.map(mapIssueSummary);
    return { issues, count: issues.length, totalCount: page.totalCount };
  }

  async getIssue(issueId: number): Promise<IssueDetail> {
    const issue = await this.loadIssue(issueId);
    const fallback = this.rules.workflow.allowedTargets(issue.tracker.id, issue.status.id);
    return mapIssueDetail(issue, fallback);
  }

  async createIssue(input: CreateIssueInput): Promise<IssueSummary> {
    this.assertWritable('issues_create');

    const projectId = await this.resolver.resolveProject(input.project);
    const trackerId = await this.resolver.resolveTracker(input.tracker);
    return this.submitIssue(projectId, trackerId, input);
  }

  /**
   * Create an issue under `parentIssueId`, in the parent's project. The
   * tracker defaults to the parent's.
   */
  async createSubtask(input: CreateSubtaskInput): Promise<IssueSummary> {
    this.assertWritable('issues_createSubtask');

    const parent = await this.loadIssue(input.parentIssueId);
    const trackerId = input.tracker ? await this.resolver.resolveTracker(input.tracker) : parent.tracker.id;
    return this.submitIssue(parent.project.id, trackerId, input);
  }

  /**
   * New issue from an existing one: tracker, description, priority, dates,
   * assignee and filled custom fields are carried over. Required fields of
   * the tracker are checked against what the source carries.
   */
  async copyIssue(input: CopyIssueInput): Promise<IssueSummary & { copiedFrom: number }> {
    this.assertWritable('issues_copy');

    const source = await this.loadIssue(input.issueId);
    const projectId = input.project ? await this.resolver.resolveProject(input.project) : source.project.id;

    const params: CreateIssueParams = {
      projectId,
      trackerId: source.tracker.id,
      subject: input.subject ?? source.subject,
      description: source.description ?? undefined,
      priorityId: source.priority.id,
      assignedToId: source.assigned_to?.id,
      startDate: source.start_date ?? undefined,
      dueDate: source.due_date ?? undefined
    };
    const customFields = copiedFieldValues(source.custom_fields);
    this.rules.fields.assertRequiredFields(source.tracker.id, Object.keys(customFields));
    if (Object.keys(customFields).length > 0) params.customFields = customFields;

    const issue = await this.api.createIssue(params).catch((err: unknown) => {
      throw toUpstreamError(err, `Failed to copy issue #${input.issueId}`);
    });
    this.log.info({ issueId: issue.id, copiedFrom: input.issueId, projectId }, 'issue.copied');
    return { ...mapIssueSummary(issue), copiedFrom: input.issueId };
  }

  async updateIssue(input: UpdateIssueInput): Promise<{ issueId: number; updated: string[] }> {
    this.assertWritable('issues_update');

    const issue = await this.loadIssue(input.issueId);
    const params: UpdateIssueParams = {
      issueId: input.issueId,
      subject: input.subject,
      description: input.description,
      startDate: input.startDate,
      dueDate: input.dueDate,
      doneRatio: input.doneRatio,
      isPrivate: input.isPrivate,
      notes: input.notes
    };

    if (input.priority) params.priorityId = await this.resolver.resolvePriority(input.priority);
    if (input.tracker) params.trackerId = await this.resolver.resolveTracker(input.tracker);

    if (input.status) {
      const statusId = await this.resolver.resolveStatus(input.status);
      if (statusId !== issue.status.id) {
        this.rules.workflow.validateTransition(issue.tracker.id, issue.status.id, statusId);
      }
      params.statusId = statusId;
    }

    if (input.assignedTo) params.assignedToId = await this.resolver.resolveUser(input.assignedTo, issue.project.id);

    const effectiveTracker = params.trackerId ?? issue.tracker.id;
    if (input.customFields || params.trackerId !== undefined) {
      const customFields = await this.prepareCustomFields(input.customFields ?? {}, {
        projectId: issue.project.id,
        trackerId: effectiveTracker
      });
      const supplied = [...Object.keys(customFields), ...filledCustomFieldIds(issue)];
      this.rules.fields.assertRequiredFields(effectiveTracker, supplied);
      if (Object.keys(customFields).length > 0) params.customFields = customFields;
    }

    await this.api.updateIssue(params).catch((err: unknown) => {
      throw toUpstreamError(err, 'Failed to update issue');
    });

    const updated = Object.entries(params)
      .filter(([key, value]) => key !== 'issueId' && value !== undefined)
      .map(([key]) => key);
    this.log.info({ issueId: input.issueId, updated }, 'issue.updated');
    return { issueId: input.issueId, updated };
  }

  /**
   * Apply the same change to several issues. Status and priority are resolved
   * once, up front; the transition check and the assignee lookup run per
   * issue, in that issue's tracker and project. A failing issue is reported
   * and the rest are still updated.
   */
  async batchUpdate(input: BatchUpdateInput): Promise<BatchUpdateReport> {
    this.assertWritable('issues_batchUpdate');

    const statusId = input.status ? await this.resolver.resolveStatus(input.status) : undefined;
    const priorityId = input.priority ? await this.resolver.resolvePriority(input.priority) : undefined;

    const report: BatchUpdateReport = { succeeded: [], failed: [] };
    for (const issueId of new Set(input.issueIds)) {
      try {
        const params: UpdateIssueParams = { issueId, statusId, priorityId, notes: input.notes };
        if (statusId !== undefined || input.assignedTo) {
          const issue = await this.loadIssue(issueId);
          if (statusId !== undefined && statusId !== issue.status.id) {
            this.rules.workflow.validateTransition(issue.tracker.id, issue.status.id, statusId);
          }
          if (input.assignedTo) params.assignedToId = await this.resolver.resolveUser(input.assignedTo, issue.project.id);
        }
        await this.api.updateIssue(params).catch((err: unknown) => {
          throw toUpstreamError(err, `Failed to update issue #${issueId}`);
        });
        report.succeeded.push(issueId);
      } catch (err) {
        if (!(err instanceof TrackerError)) throw err;
        report.failed.push({ issueId, code: err.code, error: err.message });
      }
    }

    this.log.info({ succeeded: report.succeeded.length, failed: report.failed.length }, 'issue.batch_updated');
    return report;
  }

  /**
   * Required custom fields for a project/tracker pair: the rule engine's view
   * plus the fields an existing issue of that scope carries.
   */
  async requiredFields(project: string, tracker: string): Promise<RequiredFieldsReport> {
    const projectId = await this.resolver.resolveProject(project);
    const trackerId = await this.resolver.resolveTracker(tracker);

    const projectName = (await this.resolver.projects()).find((p) => p.id === projectId)?.name ?? String(projectId);
    const trackerName = (await this.resolver.trackers()).find((t) => t.id === trackerId)?.name ?? String(trackerId);

    const custom = this.rules.fields
      .requiredFieldsMissing(trackerId, [])
      .map((f) => ({ id: f.fieldId, name: f.name, values: f.allowedValues }));

    const report: RequiredFieldsReport = {
      project: { id: projectId, name: projectName },
      tracker: { id: trackerId, name: trackerName },
      required: { standard: ['subject'], custom },
      available: []
    };

    try {
      const sampled = await this.resolver.scopedFields(projectId, trackerId);
      report.available = sampled.map((f) => ({ id: f.id, name: f.name }));
    } catch (err) {
      if (!(err instanceof UpstreamError)) throw err;
      report.note = `Could not retrieve custom fields: ${err.message}`;
    }
    if (custom.length === 0 && this.rules.fields.size === 0) {
      report.note ??= 'No field rules loaded; required custom fields cannot be determined without admin access.';
    }
    return report;
  }

  /** One tracker's graph, or every tracker with rules when `tracker` is omitted. */
  async workflowReference(tracker?: string): Promise<TrackerWorkflowReport[]> {
    const ids = tracker ? [await this.resolver.resolveTracker(tracker)] : this.rules.workflow.trackerIds();
    const reports: TrackerWorkflowReport[] = [];

    for (const trackerId of ids) {
      const graph = this.rules.workflow.tracker(trackerId);
      if (!graph) {
        if (tracker) throw new NotFoundError('tracker', `${tracker} (no workflow rules)`);
        continue;
      }
      const transitions = Object.keys(graph.transitions)
        .map(Number)
        .sort((a, b) => a - b)
        .map((fromId) => ({
          from: { id: fromId, name: graph.statuses[String(fromId)]?.name ?? `Unknown(${fromId})` },
          allowed: this.rules.workflow.allowedTargets(trackerId, fromId) ?? []
        }));
      reports.push({
        trackerId,
        trackerName: graph.name,
        statuses: this.rules.workflow.trackerStatuses(trackerId) ?? [],
        transitions
      });
    }
    return reports;
  }

  // ==================== USERS ====================

  /**
   * With a project: its members, matched by name substring. Without: the
   * global listing, which needs admin rights.
   */
  async searchUsers(input: SearchUsersInput): Promise<{ users: UserSummary[]; count: number; totalCount: number }> {
    if (input.project) {
      const projectId = await this.resolver.resolveProject(input.project);
      const needle = input.name?.toLowerCase();
      const matches = (await this.resolver.projectMembers(projectId)).filter(
        (m) => needle === undefined || m.name.toLowerCase().includes(needle)
      );
      const users = matches.slice(0, input.limit ?? matches.length).map((m) => ({ id: m.id, name: m.name }));
      return { users, count: users.length, totalCount: matches.length };
    }

    const page = await this.api
      .searchUsers({ name: input.name, status: input.status, limit: input.limit })
      .catch((err: unknown) => {
        const failure = toUpstreamError(err, 'Failed to search users');
        if (failure.status === 401 || failure.status === 403) {
          throw new ConfigurationError('user search requires admin privileges or a project context (provide project parameter)');
        }
        throw failure;
      });
    const users = page.users.map((u) => ({ id: u.id, name: u.name ?? String(u.id), login: u.login, mail: u.mail }));
    return { users, count: users.length, totalCount: page.totalCount };
  }

  // ==================== TIME ENTRIES ====================

  async logTime(input: LogTimeInput): Promise<TimeEntrySummary> {
    this.assertWritable('timeEntries_create');
    if (!(input.hours > 0)) {
      throw new ValidationError(`hours must be positive, got ${input.hours}`);
    }

    const activityId = input.activity ? await this.resolver.resolveActivity(input.activity) : undefined;
    const entry = await this.api
      .createTimeEntry({
        issueId: input.issueId,
        hours: input.hours,
        activityId,
        comments: input.comments,
        spentOn: input.spentOn
      })
      .catch((err: unknown) => {
        throw toUpstreamError(err, 'Failed to create time entry');
      });
    this.log.info({ timeEntryId: entry.id, issueId: input.issueId }, 'time_entry.created');
    return mapTimeEntry(entry);
  }

  async updateTimeEntry(input: UpdateTimeEntryInput): Promise<{ timeEntryId: number; updated: string[] }> {
    this.assertWritable('timeEntries_update');
    if (input.hours !== undefined && !(input.hours > 0)) {
      throw new ValidationError(`hours must be positive, got ${input.hours}`);
    }

    const params: UpdateTimeEntryParams = {
      timeEntryId: input.timeEntryId,
      hours: input.hours,
      comments: input.comments,
      spentOn: input.spentOn
    };
    if (input.activity) params.activityId = await this.resolver.resolveActivity(input.activity);

    const updated = Object.entries(params)
      .filter(([key, value]) => key !== 'timeEntryId' && value !== undefined)
      .map(([key]) => key);
    if (updated.length === 0) throw new ValidationError('nothing to update');

    await this.api.updateTimeEntry(params).catch((err: unknown) => {
      throw toUpstreamError(err, `Failed to update time entry #${input.timeEntryId}`);
    });
    this.log.info({ timeEntryId: input.timeEntryId, updated }, 'time_entry.updated');
    return { timeEntryId: input.timeEntryId, updated };
  }

  async deleteTimeEntry(timeEntryId: number): Promise<{ timeEntryId: number }> {
    this.assertWritable('timeEntries_delete');
    await this.api.deleteTimeEntry(timeEntryId).catch((err: unknown) => {
      throw toUpstreamError(err, `Failed to delete time entry #${timeEntryId}`);
    });
    this.log.info({ timeEntryId }, 'time_entry.deleted');
    return { timeEntryId };
  }

  async listTimeEntries(
    input: ListTimeEntriesInput
  ): Promise<{ timeEntries: TimeEntrySummary[]; totalHours: number; count: number; totalCount: number }> {
    const projectId = input.project ? await this.resolver.resolveProject(input.project) : undefined;

    let userId: string | undefined;
    if (input.user) {
      userId = input.user.toLowerCase() === 'me' ? 'me' : String(await this.resolver.resolveUser(input.user, projectId));
    }

    const page = await this.api
      .listTimeEntries({
        projectId,
        userId,
        issueId: input.issueId,
        from: input.from,
        to: input.to,
        limit: input.limit,
        offset: input.offset
      })
      .catch((err: unknown) => {
        throw toUpstreamError(err, 'Failed to list time entries');
      });

    const timeEntries = page.timeEntries.map(mapTimeEntry);
    const totalHours = Math.round(timeEntries.reduce((sum, e) => sum + e.hours, 0) * 100) / 100;
    return { timeEntries, totalHours, count: timeEntries.length, totalCount: page.totalCount };
  }

  // ==================== PRIVATE HELPERS ====================

  private assertWritable(operation: string): void {
    if (this.readOnly) {
      throw new ForbiddenError(`${operation} is disabled: server is in read-only mode`);
    }
  }

  /** resolve → validate → create, once the project and tracker are known. */
  private async submitIssue(projectId: number, trackerId: number, input: IssueFieldsInput): Promise<IssueSummary> {
    const params: CreateIssueParams = {
      projectId,
      trackerId,
      subject: input.subject,
      description: input.description,
      parentIssueId: input.parentIssueId,
      startDate: input.startDate,
      dueDate: input.dueDate,
      isPrivate: input.isPrivate
    };
    if (input.priority) params.priorityId = await this.resolver.resolvePriority(input.priority);
    if (input.status) params.statusId = await this.resolver.resolveStatus(input.status);
    if (input.assignedTo) params.assignedToId = await this.resolver.resolveUser(input.assignedTo, projectId);

    const customFields = await this.prepareCustomFields(input.customFields ?? {}, { projectId, trackerId });
    this.rules.fields.assertRequiredFields(trackerId, Object.keys(customFields));
    if (Object.keys(customFields).length > 0) params.customFields = customFields;

    const issue = await this.api.createIssue(params).catch((err: unknown) => {
      throw toUpstreamError(err, 'Failed to create issue');
    });
    this.log.info({ issueId: issue.id, projectId, trackerId, parentIssueId: input.parentIssueId }, 'issue.created');
    return mapIssueSummary(issue);
  }

  private async loadIssue(issueId: number): Promise<Issue> {
    try {
      return await this.api.getIssue(issueId);
    } catch (err) {
      throw toUpstreamError(err, `Failed to get issue #${issueId}`);
    }
  }

  /**
   * Resolve payload keys to field ids and validate each value. Keys are tried
   * as a numeric id, then as a rule name, then through the resolver. Two keys
   * naming the same field are rejected.
   */
  private async prepareCustomFields(
    fields: Record<string, FieldValue>,
    scope: CustomFieldScope
  ): Promise<CustomFieldPayload> {
    const payload: CustomFieldPayload = {};
    const keyFor = new Map<number, string>();
    const unknown: string[] = [];

    for (const [key, value] of Object.entries(fields)) {
      const fieldId = await this.resolveFieldKey(key, scope);
      if (fieldId === undefined) {
        unknown.push(key);
        continue;
      }
      const earlier = keyFor.get(fieldId);
      if (earlier !== undefined) {
        throw new ValidationError(`custom field ${fieldId} given twice: "${earlier}" and "${key}"`, {
          reason: 'duplicate_field',
          fieldId,
          keys: [earlier, key]
        });
      }
      keyFor.set(fieldId, key);
      payload[String(fieldId)] = fromFieldValue(this.rules.fields.validateFieldValue(fieldId, value));
    }

    if (unknown.length > 0) throw await this.unknownFieldsError(unknown, scope);
    return payload;
  }

  private async resolveFieldKey(key: string, scope: CustomFieldScope): Promise<number | undefined> {
    const numeric = parseNumericId(key);
    if (numeric !== undefined) return numeric;

    const fromRules = this.rules.fields.fieldIdByName(key);
    if (fromRules !== undefined) return fromRules;

    try {
      return await this.resolver.resolveCustomField(key, scope);
    } catch (err) {
      if (err instanceof NotFoundError) return undefined;
      throw err;
    }
  }

  private async unknownFieldsError(unknown: string[], scope: CustomFieldScope): Promise<ValidationError> {
    const names = new Set(this.rules.fields.fieldNames());
    if (scope.projectId !== undefined) {
      try {
        for (const f of await this.resolver.scopedFields(scope.projectId, scope.trackerId ?? 0)) names.add(f.name);
      } catch (err) {
        if (!(err instanceof UpstreamError)) throw err;
        this.log.debug({ err: err.message }, 'session.fields.sample_unavailable');
      }
    }
    const available = [...names].sort((a, b) => a.localeCompare(b));
    return new ValidationError(
      `custom field(s) not found: ${unknown.join(', ')}. Available fields: ${available.join(', ') || 'none known'}`,
      { reason: 'unknown_field', unknown, available }
    );
  }
}

/** Non-empty custom field values of an issue, keyed by field id. */
function copiedFieldValues(fields: readonly IssueCustomField[]): CustomFieldPayload {
  const payload: CustomFieldPayload = {};
  for (const cf of fields) {
    if (cf.value === null || cf.value === undefined) continue;
    if (cf.value.length === 0) continue;
    payload[String(cf.id)] = cf.value;
  }
  return payload;
}
