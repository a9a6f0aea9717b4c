import { DEFAULT_INPUTS } from '../constants';
import type { HydropowerInputs } from '../types';
import { assertValidInputs, InvalidInputError, validateHydropowerInputs } from '../validation';

const base: HydropowerInputs = { ...DEFAULT_INPUTS };

type NumericField = Exclude<keyof HydropowerInputs, 'turbineType' | 'siteType'>;

function withValue(field: NumericField, value: number): HydropowerInputs {
  const inputs = { ...base };
  inputs[field] = value;
  return inputs;
}

describe('Input Validation', () => {
  test('defaults are valid with no warnings', () => {
    expect(validateHydropowerInputs(base)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  test.each<[NumericField, number, string]>([
    ['head', 0, 'must be > 0'],
    ['head', -5, 'must be > 0'],
    ['flow', 0, 'must be > 0'],
    ['efficiency', 0, 'must be in (0, 1]'],
    ['efficiency', 1.01, 'must be in (0, 1]'],
    ['electricityPrice', -1, 'must be >= 0'],
    ['projectLifetimeYears', 0, 'must be a positive integer'],
    ['projectLifetimeYears', 2.5, 'must be a positive integer'],
    ['discountRate', -0.01, 'must be in [0, 1)'],
    ['discountRate', 1, 'must be in [0, 1)'],
    ['capacityFactor', 0, 'must be in (0, 1]'],
    ['capacityFactor', 1.5, 'must be in (0, 1]'],
    ['capexPerKw', 0, 'must be > 0'],
    ['omFraction', -0.01, 'must be >= 0'],
  ])('%s = %p is rejected (%s)', (field, value, constraint) => {
    const result = validateHydropowerInputs(withValue(field, value));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{ field, constraint, value }]);
  });

  test('non-finite numbers are rejected', () => {
    for (const value of [NaN, Infinity, -Infinity]) {
      const result = validateHydropowerInputs({ ...base, flow: value });
      expect(result.errors).toEqual([{ field: 'flow', constraint: 'must be a finite number', value }]);
    }
  });

  test('boundaries that are allowed', () => {
    const result = validateHydropowerInputs({
      ...base,
      efficiency: 1,
      capacityFactor: 1,
      discountRate: 0,
      electricityPrice: 0,
      omFraction: 0,
    });
    expect(result.valid).toBe(true);
  });

  test('empty or unknown turbine type is only a warning', () => {
    const blank = validateHydropowerInputs({ ...base, turbineType: '  ' });
    expect(blank.valid).toBe(true);
    expect(blank.warnings).toEqual([
      'turbineType "  " is not recognized; default efficiency factor applies',
    ]);

    const unknown = validateHydropowerInputs({ ...base, turbineType: 'turgo' });
    expect(unknown.valid).toBe(true);
    expect(unknown.warnings).toEqual([
      'turbineType "turgo" is not recognized; default efficiency factor applies',
    ]);
  });

  test('site type outside the known set is rejected', () => {
    expect(validateHydropowerInputs({ ...base, siteType: 'pumped_storage' }).errors).toEqual([
      {
        field: 'siteType',
        constraint: 'must be one of run_of_river, diversion, impoundment',
        value: 'pumped_storage',
      },
    ]);
    expect(validateHydropowerInputs({ ...base, siteType: 'diversion' }).valid).toBe(true);
    expect(() => assertValidInputs({ ...base, siteType: '' })).toThrow(
      '[INPUT] Invalid hydropower inputs: siteType= (must be one of run_of_river, diversion, impoundment)'
    );
  });

  test('values outside the recommended range are warnings', () => {
    const result = validateHydropowerInputs({ ...base, head: 600, discountRate: 0.02 });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'head=600 is outside the recommended range [1, 500] m',
      'discountRate=0.02 is outside the recommended range [0.03, 0.1] fraction',
    ]);
  });

  test('every violation is reported, in field order', () => {
    const result = validateHydropowerInputs({ ...base, head: 0, capexPerKw: -1, efficiency: 2 });
    expect(result.errors.map((e) => e.field)).toEqual(['head', 'efficiency', 'capexPerKw']);
  });

  describe('assertValidInputs', () => {
    test('passes valid inputs', () => {
      expect(() => assertValidInputs(base)).not.toThrow();
    });

    test('throws InvalidInputError naming field and constraint', () => {
      let caught: unknown;
      try {
        assertValidInputs({ ...base, head: 0, discountRate: 1 });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(InvalidInputError);
      if (!(caught instanceof InvalidInputError)) return;
      expect(caught.name).toBe('InvalidInputError');
      expect(caught.violations).toHaveLength(2);
      expect(caught.message).toBe(
        '[INPUT] Invalid hydropower inputs: head=0 (must be > 0); discountRate=1 (must be in [0, 1))'
      );
    });

    test('warns in development only', () => {
      const previous = process.env.NODE_ENV;
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
      try {
        process.env.NODE_ENV = 'development';
        assertValidInputs({ ...base, head: 600 });
        expect(warn).toHaveBeenCalledWith('[INPUT] head=600 is outside the recommended range [1, 500] m');

        warn.mockClear();
        process.env.NODE_ENV = 'test';
        assertValidInputs({ ...base, head: 600 });
        expect(warn).not.toHaveBeenCalled();
      } finally {
        if (previous === undefined) {
          delete process.env.NODE_ENV;
        } else {
          process.env.NODE_ENV = previous;
        }
        warn.mockRestore();
      }
    });
  });
});
