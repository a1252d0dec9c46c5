import { describe, it, expect } from 'vitest';
import {
  type ObservedTracker,
  WorkflowStateMachine,
  type WorkflowRuleSet,
  buildWorkflowRules,
  extractTransitions,
  mergeWorkflowRules
} from '../src/core/domain/workflow.js';
import { TransitionError } from '../src/core/errors.js';
import type { IssueStatus, Journal } from '../src/core/types.js';
import { thrown } from './helpers/errors.js';

const RULES: WorkflowRuleSet = {
  '4': {
    name: 'Support',
    statuses: {
      '6': { name: 'Rejected', isClosed: true },
      '9': { name: 'Closed', isClosed: true },
      '20': { name: 'Pending', isClosed: false },
      '33': { name: 'Open', isClosed: false }
    },
    transitions: {
      '33': [9, 20, 6],
      '6': [9],
      '20': []
    }
  }
};

describe('WorkflowStateMachine', () => {
  const lenient = new WorkflowStateMachine(RULES);
  const strict = new WorkflowStateMachine(RULES, { strict: true });

  describe('validateTransition', () => {
    it('accepts a permitted transition', () => {
      expect(() => lenient.validateTransition(4, 33, 9)).not.toThrow();
      expect(() => lenient.validateTransition(4, 6, 9)).not.toThrow();
    });

    it('rejects a transition outside the permitted targets', () => {
      const err = thrown(TransitionError, () => lenient.validateTransition(4, 6, 20));
      expect(err.message).toBe("cannot change Support from 'Rejected' to 'Pending'. Allowed: Closed");
      expect(err.trackerId).toBe(4);
      expect(err.from).toEqual({ id: 6, name: 'Rejected' });
      expect(err.to).toEqual({ id: 20, name: 'Pending' });
      expect(err.allowed).toEqual([{ id: 9, name: 'Closed' }]);
    });

    it('lists the targets in rule order', () => {
      const err = thrown(TransitionError, () => lenient.validateTransition(4, 33, 33));
      expect(err.message).toBe("cannot change Support from 'Open' to 'Open'. Allowed: Closed, Pending, Rejected");
    });

    it('says so when a status permits nothing', () => {
      const err = thrown(TransitionError, () => lenient.validateTransition(4, 20, 33));
      expect(err.message).toBe("cannot change Support from 'Pending' to 'Open': no transitions allowed from 'Pending'");
      expect(err.allowed).toEqual([]);
    });

    it('names statuses missing from the graph as unknown', () => {
      const err = thrown(TransitionError, () => lenient.validateTransition(4, 6, 77));
      expect(err.to).toEqual({ id: 77, name: 'Unknown(77)' });
    });

    it('leaves unknown trackers and source statuses unconstrained by default', () => {
      expect(() => lenient.validateTransition(99, 1, 2)).not.toThrow();
      expect(() => lenient.validateTransition(4, 9, 33)).not.toThrow();
    });

    it('rejects an unknown tracker in strict mode', () => {
      const err = thrown(TransitionError, () => strict.validateTransition(99, 1, 2));
      expect(err.message).toBe('cannot change tracker 99: no workflow rules known for this tracker');
      expect(err.from).toEqual({ id: 1, name: 'Unknown(1)' });
      expect(err.allowed).toEqual([]);
    });

    it('rejects an unknown source status in strict mode', () => {
      const err = thrown(TransitionError, () => strict.validateTransition(4, 9, 33));
      expect(err.message).toBe("cannot change Support from 'Closed' to 'Open': no workflow rules known for 'Closed'");
    });

    it('serializes the structured fields', () => {
      const err = thrown(TransitionError, () => lenient.validateTransition(4, 6, 20));
      expect(err.toJSON()).toEqual({
        code: 'TRANSITION_ERROR',
        message: "cannot change Support from 'Rejected' to 'Pending'. Allowed: Closed",
        trackerId: 4,
        from: { id: 6, name: 'Rejected' },
        to: { id: 20, name: 'Pending' },
        allowed: [{ id: 9, name: 'Closed' }]
      });
    });
  });

  it('allowedTargets distinguishes "no rule" from "nothing permitted"', () => {
    expect(lenient.allowedTargets(4, 33)).toEqual([
      { id: 9, name: 'Closed' },
      { id: 20, name: 'Pending' },
      { id: 6, name: 'Rejected' }
    ]);
    expect(lenient.allowedTargets(4, 20)).toEqual([]);
    expect(lenient.allowedTargets(4, 9)).toBeUndefined();
    expect(lenient.allowedTargets(99, 33)).toBeUndefined();
  });

  it('trackerStatuses orders nodes by id', () => {
    expect(lenient.trackerStatuses(4)).toEqual([
      { id: 6, name: 'Rejected', isClosed: true },
      { id: 9, name: 'Closed', isClosed: true },
      { id: 20, name: 'Pending', isClosed: false },
      { id: 33, name: 'Open', isClosed: false }
    ]);
    expect(lenient.trackerStatuses(99)).toBeUndefined();
  });

  it('reports its trackers in numeric order', () => {
    const machine = new WorkflowStateMachine({ ...RULES, '10': { name: 'Task', statuses: {}, transitions: {} } });
    expect(machine.size).toBe(2);
    expect(machine.trackerIds()).toEqual([4, 10]);
  });
});

describe('mergeWorkflowRules', () => {
  it('replaces whole trackers present in the generated set', () => {
    const generated: WorkflowRuleSet = { '4': { name: 'Support v2', statuses: {}, transitions: { '1': [2] } } };
    const curated: WorkflowRuleSet = { ...RULES, '5': { name: 'Kept', statuses: {}, transitions: {} } };
    const merged = mergeWorkflowRules(curated, generated);
    expect(merged['4']).toEqual(generated['4']);
    expect(merged['5'].name).toBe('Kept');
  });
});

describe('extractTransitions', () => {
  it('keeps numeric status changes only', () => {
    const journals: Journal[] = [
      {
        id: 1,
        details: [
          { property: 'attr', name: 'status_id', old_value: '1', new_value: '2' },
          { property: 'attr', name: 'assigned_to_id', old_value: '10', new_value: '11' }
        ]
      },
      { id: 2, details: [{ property: 'cf', name: 'status_id', old_value: '2', new_value: '3' }] },
      { id: 3, details: [{ property: 'attr', name: 'status_id', old_value: null, new_value: '3' }] },
      { id: 4, details: [{ property: 'attr', name: 'status_id', old_value: '2', new_value: 'closed' }] },
      { id: 5, details: [{ property: 'attr', name: 'status_id', old_value: '2', new_value: '5' }] }
    ];
    expect(extractTransitions(journals)).toEqual([
      [1, 2],
      [2, 5]
    ]);
  });
});

describe('buildWorkflowRules', () => {
  const statuses: IssueStatus[] = [
    { id: 1, name: 'New', is_closed: false },
    { id: 2, name: 'In Progress', is_closed: false },
    { id: 3, name: 'Resolved', is_closed: false },
    { id: 5, name: 'Closed', is_closed: true }
  ];

  it('deduplicates and sorts targets and makes every referenced status a node', () => {
    const observed = new Map<number, ObservedTracker>([
      [
        1,
        {
          name: 'Bug',
          transitions: new Map([
            [1, [3, 2, 2]],
            [3, [7, 5]]
          ])
        }
      ],
      [2, { name: 'Feature', transitions: new Map() }]
    ]);

    expect(buildWorkflowRules(statuses, observed)).toEqual({
      '1': {
        name: 'Bug',
        statuses: {
          '1': { name: 'New', isClosed: false },
          '2': { name: 'In Progress', isClosed: false },
          '3': { name: 'Resolved', isClosed: false },
          '5': { name: 'Closed', isClosed: true },
          '7': { name: 'Unknown(7)', isClosed: false }
        },
        transitions: { '1': [2, 3], '3': [5, 7] }
      }
    });
  });
});
