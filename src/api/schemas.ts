import { z } from 'zod';
import { toFieldValue } from '../core/domain/field-rules.js';
import { dateFilter } from '../core/dates.js';

// Tool arguments arrive in snake_case, as Redmine names them. Each schema
// transforms them into the session's camelCase input.

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const nameOrId = z.union([z.string().min(1), z.number().int()]).transform(String);
const positiveId = z.coerce.number().int().positive();
const limit = z.coerce.number().int().min(1).max(100);
const offset = z.coerce.number().int().min(0);

const CustomFieldValues = z
  .record(z.union([z.string(), z.array(z.string())]))
  .transform((fields) => Object.fromEntries(Object.entries(fields).map(([k, v]) => [k, toFieldValue(v)])));

export const EmptySchema = z.object({}).passthrough();

export const ProjectsListSchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional()
});

export const CustomFieldsListSchema = z.object({
  type: z.string().min(1).optional()
});

export const IssuesSearchSchema = z
  .object({
    project: nameOrId.optional(),
    tracker: nameOrId.optional(),
    status: nameOrId.optional(),
    assigned_to: nameOrId.optional(),
    subject: z.string().min(1).optional(),
    parent_id: positiveId.optional(),
    created_after: isoDate.optional(),
    created_before: isoDate.optional(),
    updated_after: isoDate.optional(),
    updated_before: isoDate.optional(),
    sort: z.string().min(1).optional(),
    custom_fields: z.record(z.union([z.string(), z.number()]).transform(String)).optional(),
    limit: limit.optional(),
    offset: offset.optional()
  })
  .transform((a) => ({
    project: a.project,
    tracker: a.tracker,
    status: a.status,
    assignedTo: a.assigned_to,
    subject: a.subject,
    parentId: a.parent_id,
    createdOn: dateFilter(a.created_after, a.created_before),
    updatedOn: dateFilter(a.updated_after, a.updated_before),
    sort: a.sort,
    customFields: a.custom_fields,
    limit: a.limit,
    offset: a.offset
  }));

export const IssueGetSchema = z.object({
  issue_id: positiveId
});

export const IssueCreateSchema = z
  .object({
    project: nameOrId,
    tracker: nameOrId,
    subject: z.string().min(1).max(255),
    description: z.string().optional(),
    status: nameOrId.optional(),
    priority: nameOrId.optional(),
    assigned_to: nameOrId.optional(),
    parent_issue_id: positiveId.optional(),
    start_date: isoDate.optional(),
    due_date: isoDate.optional(),
    is_private: z.boolean().optional(),
    custom_fields: CustomFieldValues.optional()
  })
  .transform((a) => ({
    project: a.project,
    tracker: a.tracker,
    subject: a.subject,
    description: a.description,
    status: a.status,
    priority: a.priority,
    assignedTo: a.assigned_to,
    parentIssueId: a.parent_issue_id,
    startDate: a.start_date,
    dueDate: a.due_date,
    isPrivate: a.is_private,
    customFields: a.custom_fields
  }));

export const IssueUpdateSchema = z
  .object({
    issue_id: positiveId,
    subject: z.string().min(1).max(255).optional(),
    description: z.string().optional(),
    status: nameOrId.optional(),
    priority: nameOrId.optional(),
    tracker: nameOrId.optional(),
    assigned_to: nameOrId.optional(),
    start_date: isoDate.optional(),
    due_date: isoDate.optional(),
    done_ratio: z.coerce.number().int().min(0).max(100).optional(),
    is_private: z.boolean().optional(),
    notes: z.string().optional(),
    custom_fields: CustomFieldValues.optional()
  })
  .transform((a) => ({
    issueId: a.issue_id,
    subject: a.subject,
    description: a.description,
    status: a.status,
    priority: a.priority,
    tracker: a.tracker,
    assignedTo: a.assigned_to,
    startDate: a.start_date,
    dueDate: a.due_date,
    doneRatio: a.done_ratio,
    isPrivate: a.is_private,
    notes: a.notes,
    customFields: a.custom_fields
  }));

export const RequiredFieldsSchema = z.object({
  project: nameOrId,
  tracker: nameOrId
});

export const WorkflowReferenceSchema = z.object({
  tracker: nameOrId.optional()
});

export const TimeEntryCreateSchema = z
  .object({
    issue_id: positiveId,
    hours: z.coerce.number().positive().max(24),
    activity: nameOrId.optional(),
    comments: z.string().max(1024).optional(),
    spent_on: isoDate.optional()
  })
  .transform((a) => ({
    issueId: a.issue_id,
    hours: a.hours,
    activity: a.activity,
    comments: a.comments,
    spentOn: a.spent_on
  }));

export const TimeEntriesListSchema = z.object({
  project: nameOrId.optional(),
  user: nameOrId.optional(),
  issue_id: positiveId.optional(),
  period: z.enum(['this_week', 'last_week', 'this_month', 'last_month']).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  limit: limit.optional(),
  offset: offset.optional()
});
export type TimeEntriesListArgs = z.infer<typeof TimeEntriesListSchema>;

export const IssueCreateSubtaskSchema = z
  .object({
    parent_issue_id: positiveId,
    subject: z.string().min(1).max(255),
    tracker: nameOrId.optional(),
    description: z.string().optional(),
    priority: nameOrId.optional(),
    assigned_to: nameOrId.optional(),
    start_date: isoDate.optional(),
    due_date: isoDate.optional(),
    is_private: z.boolean().optional(),
    custom_fields: CustomFieldValues.optional()
  })
  .transform((a) => ({
    parentIssueId: a.parent_issue_id,
    subject: a.subject,
    tracker: a.tracker,
    description: a.description,
    priority: a.priority,
    assignedTo: a.assigned_to,
    startDate: a.start_date,
    dueDate: a.due_date,
    isPrivate: a.is_private,
    customFields: a.custom_fields
  }));

export const IssueCopySchema = z
  .object({
    issue_id: positiveId,
    project: nameOrId.optional(),
    subject: z.string().min(1).max(255).optional()
  })
  .transform((a) => ({ issueId: a.issue_id, project: a.project, subject: a.subject }));

export const IssuesBatchUpdateSchema = z
  .object({
    issue_ids: z.array(positiveId).min(1).max(100),
    status: nameOrId.optional(),
    priority: nameOrId.optional(),
    assigned_to: nameOrId.optional(),
    notes: z.string().min(1).optional()
  })
  .refine((a) => a.status ?? a.priority ?? a.assigned_to ?? a.notes, {
    message: 'at least one of status, priority, assigned_to or notes is required'
  })
  .transform((a) => ({
    issueIds: a.issue_ids,
    status: a.status,
    priority: a.priority,
    assignedTo: a.assigned_to,
    notes: a.notes
  }));

export const TimeEntryUpdateSchema = z
  .object({
    time_entry_id: positiveId,
    hours: z.coerce.number().positive().max(24).optional(),
    activity: nameOrId.optional(),
    comments: z.string().max(1024).optional(),
    spent_on: isoDate.optional()
  })
  .transform((a) => ({
    timeEntryId: a.time_entry_id,
    hours: a.hours,
    activity: a.activity,
    comments: a.comments,
    spentOn: a.spent_on
  }));

export const TimeEntryDeleteSchema = z.object({
  time_entry_id: positiveId
});

export const UsersSearchSchema = z.object({
  name: z.string().min(1).optional(),
  project: nameOrId.optional(),
  status: z.coerce.number().int().min(1).max(3).optional(),
  limit: limit.optional()
});
