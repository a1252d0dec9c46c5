import { describe, it, expect } from 'vitest';
import {
  CustomFieldRuleEngine,
  type CustomFieldRuleSet,
  fromFieldValue,
  generateFieldRules,
  mergeFieldRules,
  toFieldValue
} from '../src/core/domain/field-rules.js';
import { ValidationError } from '../src/core/errors.js';
import type { CustomFieldDefinitionFull } from '../src/core/types.js';
import { thrown } from './helpers/errors.js';

const RULES: CustomFieldRuleSet = {
  '42': { name: 'Component', values: ['SW Tool', 'HW'], requiredByTrackers: [] },
  '223': { name: 'Product', values: ['Alpha', 'Beta'], requiredByTrackers: [32] },
  '230': { name: 'Ticket Ref', values: [], requiredByTrackers: [32, 33] }
};

function definition(
  overrides: Partial<CustomFieldDefinitionFull> & Pick<CustomFieldDefinitionFull, 'id' | 'name'>
): CustomFieldDefinitionFull {
  return {
    customized_type: 'issue',
    field_format: 'list',
    is_required: false,
    multiple: false,
    visible: true,
    possible_values: [],
    trackers: [],
    ...overrides
  };
}

describe('CustomFieldRuleEngine', () => {
  const engine = new CustomFieldRuleEngine(RULES);

  describe('validateValue', () => {
    it('returns an exact match unchanged', () => {
      expect(engine.validateValue(42, 'HW')).toBe('HW');
    });

    it('corrects the casing of a case-insensitive match', () => {
      expect(engine.validateValue(42, 'sw tool')).toBe('SW Tool');
      expect(engine.validateValue(42, 'hw')).toBe('HW');
    });

    it('passes any value through for a field without a rule', () => {
      expect(engine.validateValue(999, 'anything')).toBe('anything');
    });

    it('passes any value through for a free-text rule', () => {
      expect(engine.validateValue(230, 'REF-17')).toBe('REF-17');
    });

    it.each([
      [42, 'HW', 'HW'],
      [42, 'sw TOOL', 'SW Tool'],
      [230, 'REF-17', 'REF-17'],
      [999, 'anything', 'anything']
    ])('gives the same result when applied twice (field %i, %s)', (fieldId, value, canonical) => {
      const once = engine.validateValue(fieldId, value);
      expect(once).toBe(canonical);
      expect(engine.validateValue(fieldId, once)).toBe(once);
    });

    it('rejects a value outside the set and lists every valid value', () => {
      const err = thrown(ValidationError, () => engine.validateValue(42, 'bogus'));
      expect(err.message).toBe('invalid value "bogus" for Component (ID: 42). Valid values: SW Tool, HW');
      expect(err.issue).toEqual({
        reason: 'invalid_value',
        fieldId: 42,
        fieldName: 'Component',
        value: 'bogus',
        allowedValues: ['SW Tool', 'HW']
      });
    });
  });

  describe('validateValues', () => {
    it('corrects each element', () => {
      expect(engine.validateValues(42, ['hw', 'SW TOOL'])).toEqual(['HW', 'SW Tool']);
    });

    it('fails the whole list on one invalid element', () => {
      expect(() => engine.validateValues(42, ['HW', 'nope'])).toThrow(ValidationError);
    });
  });

  it('validateFieldValue keeps the variant', () => {
    expect(engine.validateFieldValue(42, { kind: 'scalar', value: 'hw' })).toEqual({ kind: 'scalar', value: 'HW' });
    expect(engine.validateFieldValue(42, { kind: 'list', values: ['hw'] })).toEqual({ kind: 'list', values: ['HW'] });
  });

  describe('requiredFieldsMissing', () => {
    it('lists fields required by the tracker, ordered by id', () => {
      expect(engine.requiredFieldsMissing(32, [])).toEqual([
        { fieldId: 223, name: 'Product', allowedValues: ['Alpha', 'Beta'] },
        { fieldId: 230, name: 'Ticket Ref', allowedValues: [] }
      ]);
    });

    it('drops supplied fields, whether given as numbers or strings', () => {
      expect(engine.requiredFieldsMissing(32, ['223', 230])).toEqual([]);
      expect(engine.requiredFieldsMissing(33, [223])).toEqual([{ fieldId: 230, name: 'Ticket Ref', allowedValues: [] }]);
    });

    it('has nothing to check without a tracker', () => {
      expect(engine.requiredFieldsMissing(undefined, [])).toEqual([]);
      expect(engine.requiredFieldsMissing(0, [])).toEqual([]);
    });
  });

  describe('assertRequiredFields', () => {
    it('names each missing field with its id and values', () => {
      expect(() => engine.assertRequiredFields(32, [])).toThrow(
        'required custom field(s) missing: Product (ID: 223, values: Alpha, Beta); Ticket Ref (ID: 230, values: free text)'
      );
    });

    it('passes once every required field is supplied', () => {
      expect(() => engine.assertRequiredFields(32, [223, 230])).not.toThrow();
    });

    it('reports a structured issue', () => {
      const err = thrown(ValidationError, () => engine.assertRequiredFields(33, [230]));
      expect(err.toJSON()).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'required custom field(s) missing: Product (ID: 223, values: Alpha, Beta)',
        reason: 'required_missing',
        missing: [{ fieldId: 223, name: 'Product', allowedValues: ['Alpha', 'Beta'] }]
      });
    });
  });

  it('looks field ids up by rule name case-insensitively', () => {
    expect(engine.fieldIdByName('product')).toBe(223);
    expect(engine.fieldIdByName('Missing')).toBeUndefined();
  });

  it('does not guess between rules sharing a name', () => {
    const dupes = new CustomFieldRuleEngine({
      '1': { name: 'Area', values: [], requiredByTrackers: [] },
      '2': { name: 'area', values: [], requiredByTrackers: [] }
    });
    expect(dupes.fieldIdByName('Area')).toBeUndefined();
  });

  it('an empty engine constrains nothing', () => {
    const empty = new CustomFieldRuleEngine();
    expect(empty.size).toBe(0);
    expect(empty.validateValue(42, 'bogus')).toBe('bogus');
    expect(empty.requiredFieldsMissing(32, [])).toEqual([]);
  });
});

describe('mergeFieldRules', () => {
  it('replaces curated ids with generated ones and keeps the rest', () => {
    const curated: CustomFieldRuleSet = {
      '1': { name: 'Old', values: ['a', 'b'], requiredByTrackers: [] },
      '2': { name: 'Kept', values: ['x'], requiredByTrackers: [4] }
    };
    const generated: CustomFieldRuleSet = {
      '1': { name: 'New', values: ['c'], requiredByTrackers: [1] }
    };
    expect(mergeFieldRules(curated, generated)).toEqual({
      '1': { name: 'New', values: ['c'], requiredByTrackers: [1] },
      '2': { name: 'Kept', values: ['x'], requiredByTrackers: [4] }
    });
  });
});

describe('generateFieldRules', () => {
  it('keeps issue fields only and takes required trackers from required fields', () => {
    const rules = generateFieldRules([
      definition({
        id: 223,
        name: 'Product',
        is_required: true,
        possible_values: [{ value: 'Alpha' }, { value: 'Beta', label: 'Beta release' }],
        trackers: [{ id: 32, name: 'Request' }]
      }),
      definition({ id: 42, name: 'Component', trackers: [{ id: 1, name: 'Bug' }] }),
      definition({ id: 7, name: 'Budget', customized_type: 'project' })
    ]);

    expect(rules).toEqual({
      '223': { name: 'Product', values: ['Alpha', 'Beta'], requiredByTrackers: [32] },
      '42': { name: 'Component', values: [], requiredByTrackers: [] }
    });
  });
});

describe('field values', () => {
  it('converts tool arguments to variants and back', () => {
    expect(toFieldValue('HW')).toEqual({ kind: 'scalar', value: 'HW' });
    expect(toFieldValue(['HW', 'SW Tool'])).toEqual({ kind: 'list', values: ['HW', 'SW Tool'] });
    expect(fromFieldValue({ kind: 'list', values: ['HW'] })).toEqual(['HW']);
    expect(fromFieldValue({ kind: 'scalar', value: 'HW' })).toBe('HW');
  });
});
