import { TransitionError } from '../errors.js';
import type { IdName, IssueStatus, Journal } from '../types.js';

export interface WorkflowStatus {
  name: string;
  isClosed: boolean;
}

/**
 * Status graph of one tracker: nodes by status id, and for each source
 * status the ordered, deduplicated list of permitted targets.
 */
export interface WorkflowTracker {
  name: string;
  statuses: Record<string, WorkflowStatus>;
  transitions: Record<string, number[]>;
}

/** Tracker id (as a string key) → graph. */
export type WorkflowRuleSet = Record<string, WorkflowTracker>;

export interface WorkflowOptions {
  /** Reject transitions for trackers or source statuses without a rule. */
  strict?: boolean;
}

/**
 * Workflow State Machine - which status changes each tracker permits.
 *
 * Lenient by default: a tracker with no graph, or a source status missing
 * from a tracker's graph, is unconstrained. Strict mode turns both into
 * TransitionErrors.
 */
export class WorkflowStateMachine {
  private readonly trackers: ReadonlyMap<string, WorkflowTracker>;
  readonly strict: boolean;

  constructor(rules: WorkflowRuleSet = {}, options: WorkflowOptions = {}) {
    this.trackers = new Map(Object.entries(rules));
    this.strict = options.strict ?? false;
  }

  get size(): number {
    return this.trackers.size;
  }

  tracker(trackerId: number): WorkflowTracker | undefined {
    return this.trackers.get(String(trackerId));
  }

  trackerIds(): number[] {
    return [...this.trackers.keys()].map(Number).sort((a, b) => a - b);
  }

  /**
   * @throws TransitionError naming both statuses and the permitted targets
   */
  validateTransition(trackerId: number, fromStatusId: number, toStatusId: number): void {
    const tracker = this.tracker(trackerId);
    if (!tracker) {
      if (!this.strict) return;
      const from = { id: fromStatusId, name: `Unknown(${fromStatusId})` };
      const to = { id: toStatusId, name: `Unknown(${toStatusId})` };
      throw new TransitionError(
        `cannot change tracker ${trackerId}: no workflow rules known for this tracker`,
        trackerId,
        from,
        to,
        []
      );
    }

    const from = { id: fromStatusId, name: statusName(tracker, fromStatusId) };
    const to = { id: toStatusId, name: statusName(tracker, toStatusId) };

    const targets = tracker.transitions[String(fromStatusId)];
    if (!targets) {
      if (!this.strict) return;
      throw new TransitionError(
        `cannot change ${tracker.name} from '${from.name}' to '${to.name}': no workflow rules known for '${from.name}'`,
        trackerId,
        from,
        to,
        []
      );
    }

    if (targets.includes(toStatusId)) return;

    const allowed = targets.map((id) => ({ id, name: statusName(tracker, id) }));
    if (allowed.length === 0) {
      throw new TransitionError(
        `cannot change ${tracker.name} from '${from.name}' to '${to.name}': no transitions allowed from '${from.name}'`,
        trackerId,
        from,
        to,
        allowed
      );
    }
    throw new TransitionError(
      `cannot change ${tracker.name} from '${from.name}' to '${to.name}'. Allowed: ${allowed.map((s) => s.name).join(', ')}`,
      trackerId,
      from,
      to,
      allowed
    );
  }

  /**
   * Permitted targets from a status. `undefined` when no rule is known for the
   * tracker or the source status; an empty list when nothing is permitted.
   */
  allowedTargets(trackerId: number, fromStatusId: number): IdName[] | undefined {
    const tracker = this.tracker(trackerId);
    const targets = tracker?.transitions[String(fromStatusId)];
    if (!tracker || !targets) return undefined;
    return targets.map((id) => ({ id, name: statusName(tracker, id) }));
  }

  /** Status nodes of a tracker ordered by id, or undefined for an unknown tracker. */
  trackerStatuses(trackerId: number): Array<IdName & { isClosed: boolean }> | undefined {
    const tracker = this.tracker(trackerId);
    if (!tracker) return undefined;
    return Object.entries(tracker.statuses)
      .map(([id, s]) => ({ id: Number(id), name: s.name, isClosed: s.isClosed }))
      .sort((a, b) => a.id - b.id);
  }

  toRuleSet(): WorkflowRuleSet {
    return Object.fromEntries(this.trackers);
  }
}

/** Tracker ids in `generated` overwrite the same ids in `curated`. */
export function mergeWorkflowRules(curated: WorkflowRuleSet, generated: WorkflowRuleSet): WorkflowRuleSet {
  return { ...curated, ...generated };
}

/** Observed transitions of one tracker: source status id → targets, in observation order. */
export interface ObservedTracker {
  name: string;
  transitions: Map<number, number[]>;
}

/**
 * `(from, to)` status pairs recorded in a change history. Details with a
 * non-numeric side are skipped.
 */
export function extractTransitions(journals: readonly Journal[]): Array<[number, number]> {
  const pairs: Array<[number, number]> = [];
  for (const journal of journals) {
    for (const detail of journal.details) {
      if (detail.property !== 'attr' || detail.name !== 'status_id') continue;
      const from = toStatusId(detail.old_value);
      const to = toStatusId(detail.new_value);
      if (from === undefined || to === undefined) continue;
      pairs.push([from, to]);
    }
  }
  return pairs;
}

/**
 * Turn observations into rule graphs. Targets are deduplicated and sorted;
 * every status referenced as a source or a target becomes a node; trackers
 * with nothing observed are left out.
 */
/** Target list deduplicated and in ascending order. */
export function normalizeTargets(targets: Iterable<number>): number[] {
  return [...new Set(targets)].sort((a, b) => a - b);
}

export function buildWorkflowRules(
  statuses: readonly IssueStatus[],
  observed: ReadonlyMap<number, ObservedTracker>
): WorkflowRuleSet {
  const lookup = new Map(statuses.map((s) => [s.id, s]));
  const rules: WorkflowRuleSet = {};

  for (const [trackerId, data] of observed) {
    if (data.transitions.size === 0) continue;

    const referenced = new Set<number>();
    const transitions: Record<string, number[]> = {};
    for (const [from, targets] of data.transitions) {
      referenced.add(from);
      const unique = normalizeTargets(targets);
      for (const t of unique) referenced.add(t);
      transitions[String(from)] = unique;
    }

    const nodes: Record<string, WorkflowStatus> = {};
    for (const id of [...referenced].sort((a, b) => a - b)) {
      const status = lookup.get(id);
      nodes[String(id)] = { name: status?.name ?? `Unknown(${id})`, isClosed: status?.is_closed ?? false };
    }

    rules[String(trackerId)] = { name: data.name, statuses: nodes, transitions };
  }

  return rules;
}

function statusName(tracker: WorkflowTracker, statusId: number): string {
  return tracker.statuses[String(statusId)]?.name ?? `Unknown(${statusId})`;
}

function toStatusId(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined || !/^\d+$/.test(value)) return undefined;
  return Number(value);
}
