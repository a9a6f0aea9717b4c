/**
 * Input Validation
 *
 * Every calculation must start from inputs that satisfy:
 * - head, flow, capexPerKw finite and > 0
 * - efficiency, capacityFactor in (0, 1]
 * - discountRate in [0, 1)
 * - electricityPrice, omFraction finite and >= 0
 * - projectLifetimeYears a positive integer
 * - turbineType a string; an unrecognized one only warns
 * - siteType, when given, one of SITE_TYPES
 *
 * Violations are errors. Values inside the domain but outside the
 * recommended ranges are warnings only.
 */

import { INPUT_RANGES, SITE_TYPES } from './constants';
import { isKnownTurbineType } from './turbine_efficiency';
import type { HydropowerInputs, InputField, InputViolation, ValidationResult } from './types';

export class InvalidInputError extends Error {
  readonly violations: InputViolation[];

  constructor(violations: InputViolation[]) {
    super(
      `[INPUT] Invalid hydropower inputs: ` +
        violations.map((v) => `${v.field}=${String(v.value)} (${v.constraint})`).join('; ')
    );
    this.name = 'InvalidInputError';
    this.violations = violations;
  }
}

type NumericField = Exclude<InputField, 'turbineType' | 'siteType'>;

interface DomainRule {
  constraint: string;
  test: (x: number) => boolean;
}

const DOMAIN_RULES: Record<NumericField, DomainRule> = {
  head: { constraint: 'must be > 0', test: (x) => x > 0 },
  flow: { constraint: 'must be > 0', test: (x) => x > 0 },
  efficiency: { constraint: 'must be in (0, 1]', test: (x) => x > 0 && x <= 1 },
  electricityPrice: { constraint: 'must be >= 0', test: (x) => x >= 0 },
  projectLifetimeYears: {
    constraint: 'must be a positive integer',
    test: (x) => Number.isInteger(x) && x > 0,
  },
  discountRate: { constraint: 'must be in [0, 1)', test: (x) => x >= 0 && x < 1 },
  capacityFactor: { constraint: 'must be in (0, 1]', test: (x) => x > 0 && x <= 1 },
  capexPerKw: { constraint: 'must be > 0', test: (x) => x > 0 },
  omFraction: { constraint: 'must be >= 0', test: (x) => x >= 0 },
};

const NUMERIC_FIELDS: NumericField[] = [
  'head',
  'flow',
  'efficiency',
  'electricityPrice',
  'projectLifetimeYears',
  'discountRate',
  'capacityFactor',
  'capexPerKw',
  'omFraction',
];

/**
 * Check inputs without throwing.
 */
export function validateHydropowerInputs(inputs: HydropowerInputs): ValidationResult {
  const errors: InputViolation[] = [];
  const warnings: string[] = [];

  for (const field of NUMERIC_FIELDS) {
    const value = inputs[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push({ field, constraint: 'must be a finite number', value });
      continue;
    }

    const rule = DOMAIN_RULES[field];
    if (!rule.test(value)) {
      errors.push({ field, constraint: rule.constraint, value });
      continue;
    }

    const range = INPUT_RANGES[field];
    if (value < range.min || value > range.max) {
      warnings.push(
        `${field}=${value} is outside the recommended range [${range.min}, ${range.max}] ${range.unit}`
      );
    }
  }

  if (typeof inputs.turbineType !== 'string') {
    errors.push({ field: 'turbineType', constraint: 'must be a string', value: inputs.turbineType });
  } else if (!isKnownTurbineType(inputs.turbineType)) {
    warnings.push(`turbineType "${inputs.turbineType}" is not recognized; default efficiency factor applies`);
  }

  const { siteType } = inputs;
  if (siteType !== undefined && !SITE_TYPES.some((t) => t === siteType)) {
    errors.push({ field: 'siteType', constraint: `must be one of ${SITE_TYPES.join(', ')}`, value: siteType });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Throw InvalidInputError if any input is outside its domain.
 * Warnings are logged in development and otherwise ignored.
 */
export function assertValidInputs(inputs: HydropowerInputs): void {
  const { valid, errors, warnings } = validateHydropowerInputs(inputs);

  if (!valid) {
    throw new InvalidInputError(errors);
  }

  if (process.env.NODE_ENV === 'development' && warnings.length > 0) {
    console.warn(`[INPUT] ${warnings.join('; ')}`);
  }
}
