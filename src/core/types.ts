import { z } from 'zod';

// Redmine JSON API records. The schemas validate responses at the client
// boundary; everything past the client works with the inferred types.

export const IdNameSchema = z.object({
  id: z.number().int(),
  name: z.string()
});
export type IdName = z.infer<typeof IdNameSchema>;

/** (id, name) pair returned with an ambiguous lookup. */
export type Candidate = IdName;

export const UserSchema = z.object({
  id: z.number().int(),
  login: z.string().optional(),
  firstname: z.string().optional(),
  lastname: z.string().optional(),
  mail: z.string().optional(),
  name: z.string().optional()
});
export type User = z.infer<typeof UserSchema>;

export const ProjectSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  identifier: z.string(),
  description: z.string().nullish(),
  status: z.number().int().optional(),
  parent: z.object({ id: z.number().int(), name: z.string().optional() }).optional()
});
export type Project = z.infer<typeof ProjectSchema>;

export const TrackerSchema = IdNameSchema;
export type Tracker = z.infer<typeof TrackerSchema>;

export const IssueStatusSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  is_closed: z.boolean().default(false)
});
export type IssueStatus = z.infer<typeof IssueStatusSchema>;

export const EnumerationSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  is_default: z.boolean().default(false),
  active: z.boolean().default(true)
});
export type IssuePriority = z.infer<typeof EnumerationSchema>;
export type TimeEntryActivity = z.infer<typeof EnumerationSchema>;

export const ProjectMembershipSchema = z.object({
  id: z.number().int(),
  project: IdNameSchema,
  user: IdNameSchema.optional(),
  group: IdNameSchema.optional(),
  roles: z.array(IdNameSchema).default([])
});
export type ProjectMembership = z.infer<typeof ProjectMembershipSchema>;

export const CustomFieldValueSchema = z.union([z.string(), z.array(z.string()), z.null()]);

export const IssueCustomFieldSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  multiple: z.boolean().optional(),
  value: CustomFieldValueSchema.optional()
});
export type IssueCustomField = z.infer<typeof IssueCustomFieldSchema>;

/** Definition derived from a sampled issue (no privilege needed). */
export interface CustomFieldDefinition {
  id: number;
  name: string;
  fieldFormat: string;
}

/** Definition from the privileged `/custom_fields.json` listing. */
export const CustomFieldDefinitionFullSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  customized_type: z.string(),
  field_format: z.string(),
  is_required: z.boolean().default(false),
  multiple: z.boolean().default(false),
  visible: z.boolean().default(true),
  default_value: z.string().nullish(),
  possible_values: z.array(z.object({ value: z.string(), label: z.string().optional() })).default([]),
  trackers: z.array(IdNameSchema).default([])
});
export type CustomFieldDefinitionFull = z.infer<typeof CustomFieldDefinitionFullSchema>;

export const JournalDetailSchema = z.object({
  property: z.string(),
  name: z.string(),
  old_value: z.string().nullish(),
  new_value: z.string().nullish()
});
export type JournalDetail = z.infer<typeof JournalDetailSchema>;

export const JournalSchema = z.object({
  id: z.number().int(),
  user: IdNameSchema.optional(),
  notes: z.string().nullish(),
  created_on: z.string().optional(),
  details: z.array(JournalDetailSchema).default([])
});
export type Journal = z.infer<typeof JournalSchema>;

export const IssueSchema = z.object({
  id: z.number().int(),
  project: IdNameSchema,
  tracker: IdNameSchema,
  status: IdNameSchema.extend({ is_closed: z.boolean().optional() }),
  priority: IdNameSchema,
  author: IdNameSchema,
  assigned_to: IdNameSchema.optional(),
  fixed_version: IdNameSchema.optional(),
  parent: z.object({ id: z.number().int() }).optional(),
  subject: z.string(),
  description: z.string().nullish(),
  start_date: z.string().nullish(),
  due_date: z.string().nullish(),
  done_ratio: z.number().default(0),
  created_on: z.string(),
  updated_on: z.string(),
  closed_on: z.string().nullish(),
  custom_fields: z.array(IssueCustomFieldSchema).default([]),
  journals: z.array(JournalSchema).default([]),
  watchers: z.array(IdNameSchema).default([]),
  allowed_statuses: z.array(IdNameSchema.extend({ is_closed: z.boolean().optional() })).default([])
});
export type Issue = z.infer<typeof IssueSchema>;

export const TimeEntrySchema = z.object({
  id: z.number().int(),
  project: IdNameSchema,
  issue: z.object({ id: z.number().int() }).optional(),
  user: IdNameSchema,
  activity: IdNameSchema,
  hours: z.number(),
  comments: z.string().nullish(),
  spent_on: z.string(),
  created_on: z.string().optional(),
  updated_on: z.string().optional()
});
export type TimeEntry = z.infer<typeof TimeEntrySchema>;

// ==================== REQUEST PARAMETERS ====================

export interface SearchIssuesParams {
  projectId?: number;
  trackerId?: number;
  /** 'open', 'closed', '*' or a numeric status id */
  statusId?: string;
  /** 'me' or a numeric user id */
  assignedToId?: string;
  subject?: string;
  parentId?: number;
  createdOn?: string;
  updatedOn?: string;
  sort?: string;
  /** field id → filter value */
  customFieldFilter?: Record<string, string>;
  limit?: number;
  offset?: number;
}

export interface IssuePage {
  issues: Issue[];
  totalCount: number;
}

/** Custom field payload as sent to Redmine: field id → value(s). */
export type CustomFieldPayload = Record<string, string | string[]>;

export interface CreateIssueParams {
  projectId: number;
  trackerId: number;
  subject: string;
  description?: string;
  statusId?: number;
  priorityId?: number;
  assignedToId?: number;
  parentIssueId?: number;
  startDate?: string;
  dueDate?: string;
  isPrivate?: boolean;
  customFields?: CustomFieldPayload;
}

export interface UpdateIssueParams {
  issueId: number;
  subject?: string;
  description?: string;
  statusId?: number;
  priorityId?: number;
  trackerId?: number;
  assignedToId?: number;
  startDate?: string;
  dueDate?: string;
  doneRatio?: number;
  isPrivate?: boolean;
  notes?: string;
  customFields?: CustomFieldPayload;
}

export interface CreateTimeEntryParams {
  issueId: number;
  hours: number;
  activityId?: number;
  comments?: string;
  spentOn?: string;
}

export interface UpdateTimeEntryParams {
  timeEntryId: number;
  hours?: number;
  activityId?: number;
  comments?: string;
  spentOn?: string;
}

export interface ListTimeEntriesParams {
  projectId?: number;
  userId?: string;
  issueId?: number;
  from?: string;
  to?: string;
  limit?: number;
  offset?: number;
}

export interface TimeEntryPage {
  timeEntries: TimeEntry[];
  totalCount: number;
}

export interface SearchUsersParams {
  /** Partial match on login, names or mail. */
  name?: string;
  /** 1 active (default), 2 registered, 3 locked */
  status?: number;
  limit?: number;
  offset?: number;
}

export interface UserPage {
  users: User[];
  totalCount: number;
}
