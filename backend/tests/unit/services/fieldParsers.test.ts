import { describe, it, expect } from 'vitest';
import { FieldValidationError } from '../../../src/errors.js';
import {
  parseBoolean,
  parseCategory,
  parseInteger,
  parseIsoDate,
  parseMealType,
  parseOptionalCuisine,
  parseOptionalWholeNumber,
  parseQuantity,
  parseStringArray,
  parseUnit,
} from '../../../src/services/fieldParsers.js';

describe('parseUnit', () => {
  it('accepts canonical units in any case', () => {
    expect(parseUnit('cup')).toBe('cup');
    expect(parseUnit(' Gram ')).toBe('gram');
  });

  it('maps common abbreviations and plurals', () => {
    expect(parseUnit('g')).toBe('gram');
    expect(parseUnit('Tablespoons')).toBe('tablespoon');
    expect(parseUnit('tsp')).toBe('teaspoon');
    expect(parseUnit('lbs')).toBe('pound');
  });

  it('normalizes spaces and hyphens', () => {
    expect(parseUnit('to taste')).toBe('to_taste');
    expect(parseUnit('as-needed')).toBe('as_needed');
  });

  it('rejects unknown units with the field name', () => {
    expect(() => parseUnit('handful', 'ingredients[0].unit')).toThrow(FieldValidationError);
    expect(() => parseUnit('handful', 'ingredients[0].unit')).toThrow("Invalid value for 'ingredients[0].unit'");
  });

  it('rejects non-strings', () => {
    expect(() => parseUnit(5)).toThrow(FieldValidationError);
  });
});

describe('parseCategory', () => {
  it('defaults a missing category to other', () => {
    expect(parseCategory(undefined)).toBe('other');
    expect(parseCategory(null)).toBe('other');
  });

  it('maps grocery-aisle synonyms', () => {
    expect(parseCategory('Grains')).toBe('pantry');
    expect(parseCategory('condiments')).toBe('pantry');
    expect(parseCategory('vegetables')).toBe('produce');
  });

  it('rejects categories it does not know', () => {
    expect(() => parseCategory('kitchenware')).toThrow(FieldValidationError);
  });
});

describe('parseQuantity', () => {
  it('accepts numbers and numeric strings', () => {
    expect(parseQuantity(2)).toBe(2);
    expect(parseQuantity('0.25')).toBe(0.25);
  });

  it.each([0, -1, '-1', 'abc', '', null, undefined, Number.POSITIVE_INFINITY])(
    'rejects %s',
    (value) => {
      expect(() => parseQuantity(value)).toThrow(FieldValidationError);
    }
  );
});

describe('parseOptionalWholeNumber', () => {
  it('rounds and allows absence', () => {
    expect(parseOptionalWholeNumber(450.4, 'calories')).toBe(450);
    expect(parseOptionalWholeNumber('20', 'minutes')).toBe(20);
    expect(parseOptionalWholeNumber(undefined, 'minutes')).toBeNull();
  });

  it('rejects negatives', () => {
    expect(() => parseOptionalWholeNumber(-5, 'minutes')).toThrow(FieldValidationError);
  });
});

describe('other field parsers', () => {
  it('parses meal types strictly', () => {
    expect(parseMealType('Dinner')).toBe('dinner');
    expect(() => parseMealType('brunch')).toThrow(FieldValidationError);
  });

  it('parses optional cuisines', () => {
    expect(parseOptionalCuisine('Middle Eastern')).toBe('middle_eastern');
    expect(parseOptionalCuisine(null)).toBeNull();
  });

  it('parses booleans with a fallback', () => {
    expect(parseBoolean(undefined, 'flag', true)).toBe(true);
    expect(parseBoolean('false', 'flag', true)).toBe(false);
    expect(() => parseBoolean('yes', 'flag', true)).toThrow(FieldValidationError);
  });

  it('trims string lists and drops blanks', () => {
    expect(parseStringArray(['rice', ' beans ', ''], 'names')).toEqual(['rice', 'beans']);
    expect(parseStringArray(undefined, 'names')).toEqual([]);
    expect(() => parseStringArray('rice', 'names')).toThrow(FieldValidationError);
    expect(() => parseStringArray(['rice', 3], 'names')).toThrow("Invalid value for 'names[1]'");
  });

  it('enforces integer ranges', () => {
    expect(parseInteger('3', 'days', { min: 1, max: 30 })).toBe(3);
    expect(() => parseInteger(31, 'days', { min: 1, max: 30 })).toThrow(FieldValidationError);
    expect(() => parseInteger(1.5, 'days', { min: 1, max: 30 })).toThrow(FieldValidationError);
  });

  it('accepts only real calendar dates', () => {
    expect(parseIsoDate('2026-02-28', 'date')).toBe('2026-02-28');
    expect(() => parseIsoDate('2026-02-30', 'date')).toThrow(FieldValidationError);
    expect(() => parseIsoDate('02/28/2026', 'date')).toThrow(FieldValidationError);
  });
});
