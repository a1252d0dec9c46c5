/**
 * Domain module exports - the resolution and validation layer.
 *
 * Three components sit between loosely specified tool input and the Redmine
 * write calls: the resolver turns names into ids, the field rule engine checks
 * custom field values, and the workflow state machine checks status changes.
 *
 * @module domain
 *
 * @example
 * ```typescript
 * import { EntityResolver, WorkflowStateMachine } from './domain/index.js';
 *
 * const resolver = new EntityResolver(client, logger);
 * const trackerId = await resolver.resolveTracker('bug');
 * new WorkflowStateMachine(rules).validateTransition(trackerId, 1, 2);
 * ```
 */

// Base utilities
export { type BaseComponent, type DirectoryEntry, parseNumericId, matchCandidates, expectSingle } from './base.js';

/**
 * Name → id lookups over cached directories.
 * @see {@link EntityResolver}
 */
export { EntityResolver, type CustomFieldScope } from './resolver.js';

/**
 * Allowed values and required fields per tracker.
 * @see {@link CustomFieldRuleEngine}
 */
export {
  CustomFieldRuleEngine,
  type CustomFieldRule,
  type CustomFieldRuleSet,
  type FieldValue,
  mergeFieldRules,
  generateFieldRules,
  toFieldValue,
  fromFieldValue
} from './field-rules.js';

/**
 * Permitted status transitions per tracker.
 * @see {@link WorkflowStateMachine}
 */
export {
  WorkflowStateMachine,
  type WorkflowOptions,
  type WorkflowRuleSet,
  type WorkflowStatus,
  type WorkflowTracker,
  type ObservedTracker,
  mergeWorkflowRules,
  buildWorkflowRules,
  extractTransitions,
  normalizeTargets
} from './workflow.js';

export { WorkflowMiner, type MineOptions, DEFAULT_PER_TRACKER } from './workflow-miner.js';
