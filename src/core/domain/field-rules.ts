import { type RequiredField, ValidationError } from '../errors.js';
import type { CustomFieldDefinitionFull } from '../types.js';

/**
 * Validation rule for one custom field. An empty `values` list means free
 * text.
 */
export interface CustomFieldRule {
  name: string;
  values: string[];
  requiredByTrackers: number[];
}

/** Field id (as a string key) → rule. */
export type CustomFieldRuleSet = Record<string, CustomFieldRule>;

/** A custom field payload value: one value, or several for multi-select fields. */
export type FieldValue = { kind: 'scalar'; value: string } | { kind: 'list'; values: string[] };

/**
 * Custom Field Rule Engine - validates and auto-corrects custom field values
 * against the known value sets, and reports fields a tracker requires.
 *
 * Fields without a rule are unconstrained: "rule not known" is never an
 * error.
 */
export class CustomFieldRuleEngine {
  private readonly rules: ReadonlyMap<string, CustomFieldRule>;

  constructor(rules: CustomFieldRuleSet = {}) {
    this.rules = new Map(Object.entries(rules));
  }

  get size(): number {
    return this.rules.size;
  }

  rule(fieldId: number): CustomFieldRule | undefined {
    return this.rules.get(String(fieldId));
  }

  /**
   * Returns the canonical form of `value`: unchanged on an exact match or when
   * no constraint is known, re-cased on a case-insensitive match.
   *
   * @throws ValidationError naming the field and listing every valid value
   */
  validateValue(fieldId: number, value: string): string {
    const rule = this.rule(fieldId);
    if (!rule || rule.values.length === 0) return value;

    if (rule.values.includes(value)) return value;

    const lower = value.toLowerCase();
    const corrected = rule.values.find((v) => v.toLowerCase() === lower);
    if (corrected !== undefined) return corrected;

    throw new ValidationError(
      `invalid value "${value}" for ${rule.name} (ID: ${fieldId}). Valid values: ${rule.values.join(', ')}`,
      { reason: 'invalid_value', fieldId, fieldName: rule.name, value, allowedValues: [...rule.values] }
    );
  }

  /** Element-wise {@link validateValue}; the first invalid element fails the whole list. */
  validateValues(fieldId: number, values: readonly string[]): string[] {
    return values.map((v) => this.validateValue(fieldId, v));
  }

  validateFieldValue(fieldId: number, value: FieldValue): FieldValue {
    switch (value.kind) {
      case 'scalar':
        return { kind: 'scalar', value: this.validateValue(fieldId, value.value) };
      case 'list':
        return { kind: 'list', values: this.validateValues(fieldId, value.values) };
    }
  }

  /**
   * Fields required for `trackerId` that are absent from `suppliedFieldIds`,
   * ordered by field id. Without a tracker there is nothing to check.
   */
  requiredFieldsMissing(trackerId: number | undefined, suppliedFieldIds: Iterable<number | string>): RequiredField[] {
    if (!trackerId) return [];

    const supplied = new Set<string>();
    for (const id of suppliedFieldIds) supplied.add(String(id));

    const missing: RequiredField[] = [];
    for (const [fieldId, rule] of this.rules) {
      if (!rule.requiredByTrackers.includes(trackerId)) continue;
      if (supplied.has(fieldId)) continue;
      missing.push({ fieldId: Number(fieldId), name: rule.name, allowedValues: [...rule.values] });
    }
    return missing.sort((a, b) => a.fieldId - b.fieldId);
  }

  /**
   * @throws ValidationError listing each missing field with its id and allowed values
   */
  assertRequiredFields(trackerId: number | undefined, suppliedFieldIds: Iterable<number | string>): void {
    const missing = this.requiredFieldsMissing(trackerId, suppliedFieldIds);
    if (missing.length === 0) return;

    const described = missing.map((f) => {
      const hint = f.allowedValues.length > 0 ? f.allowedValues.join(', ') : 'free text';
      return `${f.name} (ID: ${f.fieldId}, values: ${hint})`;
    });
    throw new ValidationError(`required custom field(s) missing: ${described.join('; ')}`, {
      reason: 'required_missing',
      missing
    });
  }

  /** Field id whose rule name matches case-insensitively, if exactly one does. */
  fieldIdByName(name: string): number | undefined {
    const lower = name.toLowerCase();
    const ids = [...this.rules].filter(([, rule]) => rule.name.toLowerCase() === lower).map(([id]) => Number(id));
    return ids.length === 1 ? ids[0] : undefined;
  }

  fieldNames(): string[] {
    return [...this.rules.values()].map((r) => r.name);
  }

  toRuleSet(): CustomFieldRuleSet {
    return Object.fromEntries(this.rules);
  }
}

/**
 * Field ids present in `generated` overwrite the same ids in `curated`; ids
 * only in `curated` are kept. Value sets are replaced, never unioned.
 */
export function mergeFieldRules(curated: CustomFieldRuleSet, generated: CustomFieldRuleSet): CustomFieldRuleSet {
  return { ...curated, ...generated };
}

/**
 * Build rules from the privileged field listing. Only issue fields are kept.
 * A required field contributes required trackers only when it is scoped to
 * trackers.
 */
export function generateFieldRules(definitions: readonly CustomFieldDefinitionFull[]): CustomFieldRuleSet {
  const rules: CustomFieldRuleSet = {};
  for (const def of definitions) {
    if (def.customized_type !== 'issue') continue;
    rules[String(def.id)] = {
      name: def.name,
      values: def.possible_values.map((pv) => pv.value),
      requiredByTrackers: def.is_required ? def.trackers.map((t) => t.id) : []
    };
  }
  return rules;
}

/** Tool-argument value to its variant. */
export function toFieldValue(raw: string | readonly string[]): FieldValue {
  return typeof raw === 'string' ? { kind: 'scalar', value: raw } : { kind: 'list', values: [...raw] };
}

/** Variant back to the payload shape Redmine expects. */
export function fromFieldValue(value: FieldValue): string | string[] {
  return value.kind === 'scalar' ? value.value : value.values;
}
