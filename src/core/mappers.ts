/**
 * Redmine records to the compact JSON shapes returned by tools.
 *
 * Wire records use snake_case and carry fields an assistant rarely needs;
 * these mappers produce camelCase summaries with absent values dropped.
 *
 * @module mappers
 */
import type { IdName, Issue, IssueCustomField, Journal, TimeEntry } from './types.js';

export interface IssueSummary {
  id: number;
  subject: string;
  project: string;
  tracker: string;
  status: string;
  priority: string;
  assignedTo?: string;
  updatedOn: string;
}

export interface JournalSummary {
  id: number;
  user?: string;
  createdOn?: string;
  notes?: string;
  changes: Array<{ property: string; name: string; from?: string; to?: string }>;
}

export interface IssueDetail extends IssueSummary {
  description?: string;
  author: string;
  parentId?: number;
  startDate?: string;
  dueDate?: string;
  doneRatio: number;
  createdOn: string;
  closedOn?: string;
  customFields: Array<{ id: number; name: string; value: string | string[] | null }>;
  allowedStatuses: IdName[];
  watchers: string[];
  journals: JournalSummary[];
}

export interface TimeEntrySummary {
  id: number;
  project: string;
  issueId?: number;
  user: string;
  activity: string;
  hours: number;
  comments?: string;
  spentOn: string;
}

// ==================== ISSUES ====================

export function mapIssueSummary(issue: Issue): IssueSummary {
  return {
    id: issue.id,
    subject: issue.subject,
    project: issue.project.name,
    tracker: issue.tracker.name,
    status: issue.status.name,
    priority: issue.priority.name,
    assignedTo: issue.assigned_to?.name,
    updatedOn: issue.updated_on
  };
}

/**
 * @param allowedStatuses - used when the server sends none (older Redmine)
 */
export function mapIssueDetail(issue: Issue, allowedStatuses?: IdName[]): IssueDetail {
  const fromServer = issue.allowed_statuses.map((s) => ({ id: s.id, name: s.name }));
  return {
    ...mapIssueSummary(issue),
    description: issue.description ?? undefined,
    author: issue.author.name,
    parentId: issue.parent?.id,
    startDate: issue.start_date ?? undefined,
    dueDate: issue.due_date ?? undefined,
    doneRatio: issue.done_ratio,
    createdOn: issue.created_on,
    closedOn: issue.closed_on ?? undefined,
    customFields: issue.custom_fields.map(mapCustomFieldValue),
    allowedStatuses: fromServer.length > 0 ? fromServer : (allowedStatuses ?? []),
    watchers: issue.watchers.map((w) => w.name),
    journals: issue.journals.map(mapJournal)
  };
}

function mapCustomFieldValue(cf: IssueCustomField): IssueDetail['customFields'][number] {
  return { id: cf.id, name: cf.name, value: cf.value ?? null };
}

function mapJournal(journal: Journal): JournalSummary {
  return {
    id: journal.id,
    user: journal.user?.name,
    createdOn: journal.created_on,
    notes: journal.notes || undefined,
    changes: journal.details.map((d) => ({
      property: d.property,
      name: d.name,
      from: d.old_value ?? undefined,
      to: d.new_value ?? undefined
    }))
  };
}

/** Custom field ids that already hold a non-empty value on the issue. */
export function filledCustomFieldIds(issue: Issue): number[] {
  return issue.custom_fields
    .filter((cf) => {
      if (cf.value === null || cf.value === undefined) return false;
      return typeof cf.value === 'string' ? cf.value !== '' : cf.value.length > 0;
    })
    .map((cf) => cf.id);
}

// ==================== TIME ENTRIES ====================

export function mapTimeEntry(entry: TimeEntry): TimeEntrySummary {
  return {
    id: entry.id,
    project: entry.project.name,
    issueId: entry.issue?.id,
    user: entry.user.name,
    activity: entry.activity.name,
    hours: entry.hours,
    comments: entry.comments || undefined,
    spentOn: entry.spent_on
  };
}
