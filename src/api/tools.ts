import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  type CallToolResult,
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
  type Tool
} from '@modelcontextprotocol/sdk/types.js';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { resolveDatePeriod } from '../core/dates.js';
import { TrackerError, ValidationError } from '../core/errors.js';
import type { RedmineSession } from '../core/session.js';
import {
  CustomFieldsListSchema,
  EmptySchema,
  IssueCopySchema,
  IssueCreateSchema,
  IssueCreateSubtaskSchema,
  IssueGetSchema,
  IssueUpdateSchema,
  IssuesBatchUpdateSchema,
  IssuesSearchSchema,
  ProjectsListSchema,
  RequiredFieldsSchema,
  TimeEntriesListSchema,
  TimeEntryCreateSchema,
  TimeEntryDeleteSchema,
  TimeEntryUpdateSchema,
  UsersSearchSchema,
  WorkflowReferenceSchema
} from './schemas.js';

export const SERVER_INFO = { name: 'redmine', version: '0.1.0' } as const;

const nameOrIdProp = (description: string) => ({ type: 'string', description });

const customFieldsProp = {
  type: 'object',
  additionalProperties: { oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }] },
  description:
    'Custom field values keyed by field name or ID. Values are matched case-insensitively against the allowed set; use an array for multi-select fields.'
};

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'me',
    description: 'Get the current user (the identity behind the API key).',
    inputSchema: { type: 'object', properties: {}, required: [] }
  },
  {
    name: 'projects_list',
    description: 'List projects visible to the current user.',
    inputSchema: {
      type: 'object',
      properties: { limit: { type: 'number', description: 'Max projects to return (1-1000)' } },
      required: []
    }
  },
  {
    name: 'trackers_list',
    description: 'List trackers (issue types such as Bug or Feature).',
    inputSchema: { type: 'object', properties: {}, required: [] }
  },
  {
    name: 'statuses_list',
    description: 'List issue statuses with their closed flag.',
    inputSchema: { type: 'object', properties: {}, required: [] }
  },
  {
    name: 'priorities_list',
    description: 'List issue priorities.',
    inputSchema: { type: 'object', properties: {}, required: [] }
  },
  {
    name: 'activities_list',
    description: 'List time entry activities.',
    inputSchema: { type: 'object', properties: {}, required: [] }
  },
  {
    name: 'users_search',
    description:
      'Search users by name. With a project, its members are searched (no admin rights needed); without one, the global user list is used, which requires admin privileges.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Part of the user name' },
        project: nameOrIdProp('Project name, identifier or ID'),
        status: { type: 'number', description: '1 active (default), 2 registered, 3 locked. Global search only.' },
        limit: { type: 'number', description: 'Max users to return (1-100, default 25)' }
      },
      required: []
    }
  },
  {
    name: 'customFields_listAll',
    description: 'List all custom field definitions with allowed values and required trackers. Requires admin privileges.',
    inputSchema: {
      type: 'object',
      properties: { type: { type: 'string', description: 'Customized type filter, e.g. "issue"' } },
      required: []
    }
  },
  {
    name: 'issues_search',
    description:
      'Search issues. Project, tracker, status and assignee accept names or IDs. Status defaults to "open"; use "closed", "all" or "*" for others.',
    inputSchema: {
      type: 'object',
      properties: {
        project: nameOrIdProp('Project name, identifier or ID'),
        tracker: nameOrIdProp('Tracker name or ID'),
        status: nameOrIdProp('Status name or ID, or open/closed/all'),
        assigned_to: nameOrIdProp('User name or ID, or "me". Names need a project.'),
        subject: { type: 'string', description: 'Keyword contained in the subject' },
        parent_id: { type: 'number', description: 'Parent issue ID' },
        created_after: { type: 'string', description: 'YYYY-MM-DD' },
        created_before: { type: 'string', description: 'YYYY-MM-DD' },
        updated_after: { type: 'string', description: 'YYYY-MM-DD' },
        updated_before: { type: 'string', description: 'YYYY-MM-DD' },
        sort: { type: 'string', description: 'e.g. "updated_on:desc"' },
        custom_fields: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Filter values keyed by custom field name or ID'
        },
        limit: { type: 'number', description: 'Page size (1-100, default 25)' },
        offset: { type: 'number', description: 'Offset for paging' }
      },
      required: []
    }
  },
  {
    name: 'issues_getById',
    description: 'Get an issue with its history, watchers and allowed next statuses.',
    inputSchema: {
      type: 'object',
      properties: { issue_id: { type: 'number', description: 'Issue ID' } },
      required: ['issue_id']
    }
  },
  {
    name: 'issues_create',
    description:
      'Create an issue. Custom field values are validated and required fields for the tracker are checked before anything is sent.',
    inputSchema: {
      type: 'object',
      properties: {
        project: nameOrIdProp('Project name, identifier or ID'),
        tracker: nameOrIdProp('Tracker name or ID'),
        subject: { type: 'string', description: 'Issue subject' },
        description: { type: 'string', description: 'Issue description' },
        status: nameOrIdProp('Initial status name or ID'),
        priority: nameOrIdProp('Priority name or ID'),
        assigned_to: nameOrIdProp('User name or ID, or "me"'),
        parent_issue_id: { type: 'number', description: 'Parent issue ID' },
        start_date: { type: 'string', description: 'YYYY-MM-DD' },
        due_date: { type: 'string', description: 'YYYY-MM-DD' },
        is_private: { type: 'boolean', description: 'Private issue' },
        custom_fields: customFieldsProp
      },
      required: ['project', 'tracker', 'subject']
    }
  },
  {
    name: 'issues_update',
    description:
      'Update an issue. A status change is checked against the tracker workflow; custom field values are validated.',
    inputSchema: {
      type: 'object',
      properties: {
        issue_id: { type: 'number', description: 'Issue ID' },
        subject: { type: 'string', description: 'New subject' },
        description: { type: 'string', description: 'New description' },
        status: nameOrIdProp('New status name or ID'),
        priority: nameOrIdProp('New priority name or ID'),
        tracker: nameOrIdProp('New tracker name or ID'),
        assigned_to: nameOrIdProp('User name or ID, or "me"'),
        start_date: { type: 'string', description: 'YYYY-MM-DD' },
        due_date: { type: 'string', description: 'YYYY-MM-DD' },
        done_ratio: { type: 'number', description: 'Percent done (0-100)' },
        is_private: { type: 'boolean', description: 'Private issue' },
        notes: { type: 'string', description: 'Comment added to the history' },
        custom_fields: customFieldsProp
      },
      required: ['issue_id']
    }
  },
  {
    name: 'issues_createSubtask',
    description:
      "Create a subtask under an existing issue, in the parent's project. The tracker defaults to the parent's; custom fields and required fields are checked as for issues_create.",
    inputSchema: {
      type: 'object',
      properties: {
        parent_issue_id: { type: 'number', description: 'Parent issue ID' },
        subject: { type: 'string', description: 'Subtask subject' },
        tracker: nameOrIdProp("Tracker name or ID (default: the parent's)"),
        description: { type: 'string', description: 'Subtask description' },
        priority: nameOrIdProp('Priority name or ID'),
        assigned_to: nameOrIdProp('User name or ID, or "me"'),
        start_date: { type: 'string', description: 'YYYY-MM-DD' },
        due_date: { type: 'string', description: 'YYYY-MM-DD' },
        is_private: { type: 'boolean', description: 'Private issue' },
        custom_fields: customFieldsProp
      },
      required: ['parent_issue_id', 'subject']
    }
  },
  {
    name: 'issues_copy',
    description:
      'Copy an issue, optionally into another project or under a new subject. Tracker, description, priority, dates, assignee and custom field values are carried over.',
    inputSchema: {
      type: 'object',
      properties: {
        issue_id: { type: 'number', description: 'Source issue ID' },
        project: nameOrIdProp('Target project name, identifier or ID (default: same project)'),
        subject: { type: 'string', description: 'Subject of the copy (default: the source subject)' }
      },
      required: ['issue_id']
    }
  },
  {
    name: 'issues_batchUpdate',
    description:
      'Apply the same status, priority, assignee or note to several issues. Each status change is checked against its tracker workflow; failures are reported per issue and do not stop the others.',
    inputSchema: {
      type: 'object',
      properties: {
        issue_ids: { type: 'array', items: { type: 'number' }, description: 'Issue IDs (1-100)' },
        status: nameOrIdProp('New status name or ID'),
        priority: nameOrIdProp('New priority name or ID'),
        assigned_to: nameOrIdProp("User name or ID, or \"me\". Resolved in each issue's project."),
        notes: { type: 'string', description: 'Comment added to each issue' }
      },
      required: ['issue_ids']
    }
  },
  {
    name: 'issues_getRequiredFields',
    description: 'Show required and available custom fields for a project and tracker.',
    inputSchema: {
      type: 'object',
      properties: {
        project: nameOrIdProp('Project name, identifier or ID'),
        tracker: nameOrIdProp('Tracker name or ID')
      },
      required: ['project', 'tracker']
    }
  },
  {
    name: 'reference_workflow',
    description: 'Show the known status transitions of one tracker, or of every tracker with rules.',
    inputSchema: {
      type: 'object',
      properties: { tracker: nameOrIdProp('Tracker name or ID') },
      required: []
    }
  },
  {
    name: 'timeEntries_create',
    description: 'Log time on an issue.',
    inputSchema: {
      type: 'object',
      properties: {
        issue_id: { type: 'number', description: 'Issue ID' },
        hours: { type: 'number', description: 'Hours spent (0-24)' },
        activity: nameOrIdProp('Activity name or ID'),
        comments: { type: 'string', description: 'Comment' },
        spent_on: { type: 'string', description: 'YYYY-MM-DD (default today)' }
      },
      required: ['issue_id', 'hours']
    }
  },
  {
    name: 'timeEntries_update',
    description: 'Update a time entry.',
    inputSchema: {
      type: 'object',
      properties: {
        time_entry_id: { type: 'number', description: 'Time entry ID' },
        hours: { type: 'number', description: 'Hours spent (0-24)' },
        activity: nameOrIdProp('Activity name or ID'),
        comments: { type: 'string', description: 'Comment' },
        spent_on: { type: 'string', description: 'YYYY-MM-DD' }
      },
      required: ['time_entry_id']
    }
  },
  {
    name: 'timeEntries_delete',
    description: 'Delete a time entry.',
    inputSchema: {
      type: 'object',
      properties: { time_entry_id: { type: 'number', description: 'Time entry ID' } },
      required: ['time_entry_id']
    }
  },
  {
    name: 'timeEntries_list',
    description: 'List time entries. Without a period or dates all entries are returned.',
    inputSchema: {
      type: 'object',
      properties: {
        project: nameOrIdProp('Project name, identifier or ID'),
        user: nameOrIdProp('User name or ID, or "me". Names need a project.'),
        issue_id: { type: 'number', description: 'Issue ID' },
        period: { type: 'string', enum: ['this_week', 'last_week', 'this_month', 'last_month'] },
        from: { type: 'string', description: 'YYYY-MM-DD, overrides period' },
        to: { type: 'string', description: 'YYYY-MM-DD, overrides period' },
        limit: { type: 'number', description: 'Page size (1-100, default 25)' },
        offset: { type: 'number', description: 'Offset for paging' }
      },
      required: []
    }
  }
];

// ==================== DISPATCH ====================

function json(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Failure as a tool result: a human line plus the structured fields (code,
 * candidates, allowed values) a caller can re-prompt from.
 */
export function errorResult(err: unknown): CallToolResult {
  let error: TrackerError;
  if (err instanceof TrackerError) {
    error = err;
  } else if (err instanceof ZodError) {
    const detail = err.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
    error = new ValidationError(`invalid arguments: ${detail.join('; ')}`);
  } else {
    const message = err instanceof Error ? err.message : String(err);
    return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
  }
  return {
    content: [
      { type: 'text', text: `Error: ${error.message}` },
      { type: 'text', text: JSON.stringify({ error: error.toJSON() }, null, 2) }
    ],
    isError: true
  };
}

/**
 * Run one tool call against a session. Never throws: every failure becomes
 * an `isError` result.
 */
export async function handleToolCall(
  session: RedmineSession,
  name: string,
  args: Record<string, unknown> | undefined,
  log: Logger
): Promise<CallToolResult> {
  const callLog = log.child({ callId: nanoid(10), tool: name });
  const started = Date.now();

  try {
    const result = await dispatch(session, name, args ?? {});
    callLog.info({ ms: Date.now() - started, isError: result.isError === true }, 'tool.call');
    return result;
  } catch (err) {
    const code = err instanceof TrackerError ? err.code : err instanceof ZodError ? 'VALIDATION_ERROR' : 'INTERNAL';
    if (code === 'INTERNAL') callLog.error({ err }, 'tool.call.failed');
    else callLog.info({ ms: Date.now() - started, code }, 'tool.call.rejected');
    return errorResult(err);
  }
}

async function dispatch(session: RedmineSession, name: string, args: Record<string, unknown>): Promise<CallToolResult> {
  switch (name) {
    case 'me': {
      EmptySchema.parse(args);
      return json(await session.me());
    }

    case 'projects_list': {
      const input = ProjectsListSchema.parse(args);
      const projects = await session.listProjects(input.limit);
      return json({
        projects: projects.map((p) => ({ id: p.id, name: p.name, identifier: p.identifier })),
        count: projects.length
      });
    }

    case 'trackers_list':
      return json({ trackers: await session.listTrackers() });

    case 'statuses_list':
      return json({ statuses: await session.listStatuses() });

    case 'priorities_list':
      return json({ priorities: await session.listPriorities() });

    case 'activities_list':
      return json({ activities: await session.listActivities() });

    case 'users_search':
      return json(await session.searchUsers(UsersSearchSchema.parse(args)));

    case 'customFields_listAll': {
      const input = CustomFieldsListSchema.parse(args);
      const fields = await session.listCustomFields(input.type);
      return json({
        custom_fields: fields.map((f) => ({
          id: f.id,
          name: f.name,
          type: f.customized_type,
          format: f.field_format,
          required: f.is_required,
          multiple: f.multiple,
          values: f.possible_values.map((pv) => pv.value),
          trackers: f.trackers
        })),
        count: fields.length
      });
    }

    case 'issues_search':
      return json(await session.searchIssues(IssuesSearchSchema.parse(args)));

    case 'issues_getById': {
      const input = IssueGetSchema.parse(args);
      return json(await session.getIssue(input.issue_id));
    }

    case 'issues_create': {
      const issue = await session.createIssue(IssueCreateSchema.parse(args));
      return json({ success: true, issue, message: `Issue #${issue.id} created` });
    }

    case 'issues_update': {
      const result = await session.updateIssue(IssueUpdateSchema.parse(args));
      return json({ success: true, ...result, message: 'Issue updated successfully' });
    }

    case 'issues_createSubtask': {
      const issue = await session.createSubtask(IssueCreateSubtaskSchema.parse(args));
      return json({ success: true, issue, message: `Subtask #${issue.id} created` });
    }

    case 'issues_copy': {
      const issue = await session.copyIssue(IssueCopySchema.parse(args));
      return json({ success: true, issue, message: `Issue #${issue.copiedFrom} copied to #${issue.id}` });
    }

    case 'issues_batchUpdate': {
      const report = await session.batchUpdate(IssuesBatchUpdateSchema.parse(args));
      return json({
        ...report,
        message: `${report.succeeded.length} updated, ${report.failed.length} failed`
      });
    }

    case 'issues_getRequiredFields': {
      const input = RequiredFieldsSchema.parse(args);
      return json(await session.requiredFields(input.project, input.tracker));
    }

    case 'reference_workflow': {
      const input = WorkflowReferenceSchema.parse(args);
      const trackers = await session.workflowReference(input.tracker);
      return json({ trackers, count: trackers.length });
    }

    case 'timeEntries_create':
      return json(await session.logTime(TimeEntryCreateSchema.parse(args)));

    case 'timeEntries_update': {
      const result = await session.updateTimeEntry(TimeEntryUpdateSchema.parse(args));
      return json({ success: true, ...result, message: 'Time entry updated successfully' });
    }

    case 'timeEntries_delete': {
      const input = TimeEntryDeleteSchema.parse(args);
      const result = await session.deleteTimeEntry(input.time_entry_id);
      return json({ success: true, ...result, message: 'Time entry deleted successfully' });
    }

    case 'timeEntries_list': {
      const input = TimeEntriesListSchema.parse(args);
      const range = input.period ? resolveDatePeriod(input.period) : undefined;
      return json(
        await session.listTimeEntries({
          project: input.project,
          user: input.user,
          issueId: input.issue_id,
          from: input.from ?? range?.from,
          to: input.to ?? range?.to,
          limit: input.limit,
          offset: input.offset
        })
      );
    }

    default:
      return { content: [{ type: 'text', text: `Unknown tool: ${name}` }], isError: true };
  }
}

// ==================== SERVER ====================

/**
 * An MCP server bound to one session. Stdio mode builds one; the SSE host
 * builds one per connection.
 */
export function createToolServer(session: RedmineSession, log: Logger): Server {
  const server = new Server(SERVER_INFO, { capabilities: { tools: {}, resources: {} } });

  // Mutating tools stay listed in read-only mode and answer with a FORBIDDEN error
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(session, name, args, log);
  });

  // Resources: the loaded rule sets, read-only
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: [
        {
          uri: 'redmine://rules/fields',
          name: 'Custom field rules',
          description: 'Allowed values and required trackers per custom field',
          mimeType: 'application/json'
        },
        {
          uri: 'redmine://rules/workflow',
          name: 'Workflow rules',
          description: 'Known status transitions per tracker',
          mimeType: 'application/json'
        }
      ]
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const rules =
      uri === 'redmine://rules/fields'
        ? session.rules.fields.toRuleSet()
        : uri === 'redmine://rules/workflow'
          ? session.rules.workflow.toRuleSet()
          : undefined;
    if (rules === undefined) throw new Error(`Unknown resource: ${uri}`);
    return { contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(rules, null, 2) }] };
  });

  return server;
}
