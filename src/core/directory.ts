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
} from './types.js';

/**
 * Read-only data source the resolver and the workflow miner consume.
 * Implementations fail with an UpstreamError on any transport or HTTP problem.
 */
export interface DirectorySource {
  listProjects(limit: number): Promise<Project[]>;
  listTrackers(): Promise<Tracker[]>;
  listIssueStatuses(): Promise<IssueStatus[]>;
  listIssuePriorities(): Promise<IssuePriority[]>;
  listTimeEntryActivities(): Promise<TimeEntryActivity[]>;
  getProjectMemberships(projectId: number, limit: number): Promise<ProjectMembership[]>;
  getCurrentUser(): Promise<User>;
  /** Field definitions sampled from one issue in the scope. */
  getProjectCustomFields(projectId: number, trackerId: number): Promise<CustomFieldDefinition[]>;
  /** Privileged global listing. */
  listAllCustomFields(): Promise<CustomFieldDefinitionFull[]>;
  searchIssues(params: SearchIssuesParams): Promise<IssuePage>;
  /** One issue with its change history. */
  getIssue(issueId: number): Promise<Issue>;
}

/** The directory plus the mutations the tool layer issues after validation. */
export interface RedmineApi extends DirectorySource {
  createIssue(params: CreateIssueParams): Promise<Issue>;
  updateIssue(params: UpdateIssueParams): Promise<void>;
  createTimeEntry(params: CreateTimeEntryParams): Promise<TimeEntry>;
  updateTimeEntry(params: UpdateTimeEntryParams): Promise<void>;
  deleteTimeEntry(timeEntryId: number): Promise<void>;
  listTimeEntries(params: ListTimeEntriesParams): Promise<TimeEntryPage>;
  /** Global user listing; requires admin privileges. */
  searchUsers(params: SearchUsersParams): Promise<UserPage>;
}
