import type { Logger } from 'pino';
import type { DirectorySource } from '../directory.js';
import { ConfigurationError, type EntityKind, NotFoundError, UpstreamError, toUpstreamError } from '../errors.js';
import type {
  CustomFieldDefinition,
  CustomFieldDefinitionFull,
  IssuePriority,
  IssueStatus,
  Project,
  TimeEntryActivity,
  Tracker
} from '../types.js';
import { type BaseComponent, type DirectoryEntry, expectSingle, matchCandidates, parseNumericId } from './base.js';

const PROJECT_LIMIT = 1000;
const MEMBERSHIP_LIMIT = 1000;

/** Status keywords that bypass the directory. `all` normalizes to the wildcard. */
const STATUS_KEYWORDS = new Map<string, 'open' | 'closed' | '*'>([
  ['open', 'open'],
  ['closed', 'closed'],
  ['all', '*'],
  ['*', '*']
]);

export interface CustomFieldScope {
  projectId?: number;
  trackerId?: number;
}

/**
 * Entity Resolver - turns human-supplied names into numeric identifiers.
 *
 * Directories are fetched lazily, at most once per instance, and never
 * expire. The cache belongs to one caller identity: a host serving several
 * identities constructs one resolver per identity.
 */
export class EntityResolver implements BaseComponent {
  private projectList?: Project[];
  private trackerList?: Tracker[];
  private statusList?: IssueStatus[];
  private priorityList?: IssuePriority[];
  private activityList?: TimeEntryActivity[];
  private readonly memberships = new Map<number, DirectoryEntry[]>();
  private readonly sampledFields = new Map<string, CustomFieldDefinition[]>();
  private globalFields?: CustomFieldDefinitionFull[];
  // set once the server refuses the privileged listing (401/403)
  private globalFieldsRefusal?: UpstreamError;

  constructor(
    private readonly source: DirectorySource,
    public readonly log: Logger
  ) {}

  // ==================== RESOLUTION ====================

  async resolveProject(nameOrId: string): Promise<number> {
    const id = parseNumericId(nameOrId);
    if (id !== undefined) return id;

    const entries = (await this.projects()).map((p) => ({ id: p.id, name: p.name, aliases: [p.identifier] }));
    return expectSingle('project', nameOrId, matchCandidates(entries, nameOrId));
  }

  async resolveTracker(nameOrId: string): Promise<number> {
    return this.resolveIn('tracker', nameOrId, () => this.trackers());
  }

  async resolvePriority(nameOrId: string): Promise<number> {
    return this.resolveIn('priority', nameOrId, () => this.priorities());
  }

  async resolveActivity(nameOrId: string): Promise<number> {
    return this.resolveIn('activity', nameOrId, () => this.activities());
  }

  /** Status id for a mutation. Keywords are not accepted here. */
  async resolveStatus(nameOrId: string): Promise<number> {
    return this.resolveIn('status', nameOrId, () => this.statuses());
  }

  /**
   * Status value for a search filter: `open`, `closed`, `*` or a numeric id.
   */
  async resolveStatusFilter(nameOrId: string): Promise<string> {
    const keyword = STATUS_KEYWORDS.get(nameOrId.toLowerCase());
    if (keyword) return keyword;

    const id = await this.resolveStatus(nameOrId);
    return String(id);
  }

  /**
   * User id by name within a project's memberships. `me` is the current
   * identity. The global user listing needs admin rights, so a name lookup
   * without a project is a configuration error.
   */
  async resolveUser(nameOrId: string, projectId?: number): Promise<number> {
    if (nameOrId.toLowerCase() === 'me') {
      try {
        const user = await this.source.getCurrentUser();
        return user.id;
      } catch (err) {
        throw toUpstreamError(err, 'Failed to load current user');
      }
    }

    const id = parseNumericId(nameOrId);
    if (id !== undefined) return id;

    if (projectId === undefined || projectId <= 0) {
      throw new ConfigurationError('cannot search users without project context, please use a user ID');
    }

    const members = await this.projectMembers(projectId);
    return expectSingle('user', nameOrId, matchCandidates(members, nameOrId));
  }

  /**
   * Custom field id by name. The privileged global listing wins; only when it
   * is unavailable are the definitions sampled from the given scope used.
   */
  async resolveCustomField(nameOrId: string, scope: CustomFieldScope = {}): Promise<number> {
    const id = parseNumericId(nameOrId);
    if (id !== undefined) return id;

    const global = await this.loadGlobalFields();
    if (global) {
      return expectSingle('custom field', nameOrId, matchCandidates(global, nameOrId));
    }

    if (scope.projectId === undefined || scope.projectId <= 0) {
      throw new NotFoundError('custom field', nameOrId);
    }
    const sampled = await this.scopedFields(scope.projectId, scope.trackerId ?? 0);
    return expectSingle('custom field', nameOrId, matchCandidates(sampled, nameOrId));
  }

  // ==================== DIRECTORIES ====================

  async projects(): Promise<Project[]> {
    this.projectList ??= await this.fetch('project', () => this.source.listProjects(PROJECT_LIMIT));
    return this.projectList;
  }

  async trackers(): Promise<Tracker[]> {
    this.trackerList ??= await this.fetch('tracker', () => this.source.listTrackers());
    return this.trackerList;
  }

  async statuses(): Promise<IssueStatus[]> {
    this.statusList ??= await this.fetch('status', () => this.source.listIssueStatuses());
    return this.statusList;
  }

  async priorities(): Promise<IssuePriority[]> {
    this.priorityList ??= await this.fetch('priority', () => this.source.listIssuePriorities());
    return this.priorityList;
  }

  async activities(): Promise<TimeEntryActivity[]> {
    this.activityList ??= await this.fetch('activity', () => this.source.listTimeEntryActivities());
    return this.activityList;
  }

  /**
   * Privileged global field listing. A refusal (401/403) is remembered and
   * rethrown without another request; any other failure is retried on the
   * next call.
   */
  async customFields(): Promise<CustomFieldDefinitionFull[]> {
    if (this.globalFieldsRefusal) throw this.globalFieldsRefusal;
    if (this.globalFields === undefined) {
      try {
        this.globalFields = await this.source.listAllCustomFields();
      } catch (err) {
        const failure = toUpstreamError(err, 'Failed to list custom fields (requires admin privileges)');
        if (isRefusal(failure)) this.globalFieldsRefusal = failure;
        throw failure;
      }
      this.log.debug({ count: this.globalFields.length }, 'resolver.fields.global');
    }
    return this.globalFields;
  }

  /** Field definitions sampled from one issue of the project/tracker. */
  async scopedFields(projectId: number, trackerId: number): Promise<CustomFieldDefinition[]> {
    const key = `${projectId}:${trackerId}`;
    let fields = this.sampledFields.get(key);
    if (!fields) {
      fields = await this.fetch('custom field', () => this.source.getProjectCustomFields(projectId, trackerId));
      this.sampledFields.set(key, fields);
    }
    return fields;
  }

  /** Users (not groups) with a membership in the project. */
  async projectMembers(projectId: number): Promise<DirectoryEntry[]> {
    let members = this.memberships.get(projectId);
    if (!members) {
      const list = await this.fetch('user', () => this.source.getProjectMemberships(projectId, MEMBERSHIP_LIMIT));
      members = list.flatMap((m) => (m.user ? [{ id: m.user.id, name: m.user.name }] : []));
      this.memberships.set(projectId, members);
    }
    return members;
  }

  // ==================== PRIVATE HELPERS ====================

  private async resolveIn(
    entity: EntityKind,
    nameOrId: string,
    load: () => Promise<DirectoryEntry[]>
  ): Promise<number> {
    const id = parseNumericId(nameOrId);
    if (id !== undefined) return id;
    return expectSingle(entity, nameOrId, matchCandidates(await load(), nameOrId));
  }

  /** The global listing, or null when this identity may not read it. */
  private async loadGlobalFields(): Promise<CustomFieldDefinitionFull[] | null> {
    try {
      return await this.customFields();
    } catch (err) {
      if (!(err instanceof UpstreamError && isRefusal(err))) throw err;
      this.log.debug({ err: err.message }, 'resolver.fields.global_unavailable');
      return null;
    }
  }

  private async fetch<T extends unknown[]>(entity: EntityKind, load: () => Promise<T>): Promise<T> {
    try {
      const data = await load();
      this.log.debug({ entity, count: data.length }, 'resolver.directory.loaded');
      return data;
    } catch (err) {
      throw toUpstreamError(err, `Failed to load ${entity} directory`);
    }
  }
}

function isRefusal(err: UpstreamError): boolean {
  return err.status === 401 || err.status === 403;
}
