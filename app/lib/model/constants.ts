// app/lib/model/constants.ts

export const WATER_DENSITY_KG_M3 = 1000;

export const GRAVITY_M_S2 = 9.81;

export const HOURS_PER_YEAR = 8760;

export const KW_PER_MW = 1000;

export const W_PER_KW = 1000;

export const TURBINE_TYPES = ['kaplan', 'francis', 'pelton', 'cross_flow', 'propeller'] as const;

export const SITE_TYPES = ['run_of_river', 'diversion', 'impoundment'] as const;

// Nominal factor used when the turbine type is not in the table
export const DEFAULT_TURBINE_EFFICIENCY = 0.85;

/**
 * Recommended input ranges (inclusive). Values outside these are still
 * computed but flagged as warnings by validation.
 */
export interface InputRange {
  min: number;
  max: number;
  unit: string;
}

export const INPUT_RANGES = {
  head: { min: 1, max: 500, unit: 'm' },
  flow: { min: 0.1, max: 1000, unit: 'm³/s' },
  efficiency: { min: 0.8, max: 0.95, unit: 'fraction' },
  electricityPrice: { min: 20, max: 200, unit: '$/MWh' },
  projectLifetimeYears: { min: 20, max: 50, unit: 'years' },
  discountRate: { min: 0.03, max: 0.1, unit: 'fraction' },
  capacityFactor: { min: 0.3, max: 0.9, unit: 'fraction' },
  capexPerKw: { min: 1000, max: 8000, unit: '$/kW' },
  omFraction: { min: 0.01, max: 0.05, unit: 'fraction/yr' },
} as const satisfies Record<string, InputRange>;

export const DEFAULT_INPUTS = {
  head: 50,
  flow: 100,
  turbineType: 'kaplan',
  efficiency: 0.9,
  electricityPrice: 80,
  projectLifetimeYears: 30,
  discountRate: 0.06,
  capacityFactor: 0.5,
  capexPerKw: 3000,
  omFraction: 0.025,
} as const;

// Checked top to bottom, first match wins. Anything left over is CHALLENGING.
export interface ViabilityThreshold {
  status: 'HIGHLY_VIABLE' | 'VIABLE' | 'MARGINAL';
  label: string;
  description: string;
  maxLcoe: number;
  maxPaybackYears: number;
  requirePositiveNpv: boolean;
}

export const VIABILITY_THRESHOLDS: readonly ViabilityThreshold[] = [
  {
    status: 'HIGHLY_VIABLE',
    label: 'HIGHLY VIABLE',
    description: 'Excellent economic potential',
    maxLcoe: 80,
    maxPaybackYears: 15,
    requirePositiveNpv: true,
  },
  {
    status: 'VIABLE',
    label: 'VIABLE',
    description: 'Good economic potential',
    maxLcoe: 120,
    maxPaybackYears: 20,
    requirePositiveNpv: true,
  },
  {
    status: 'MARGINAL',
    label: 'MARGINAL',
    description: 'Consider optimization',
    maxLcoe: 150,
    maxPaybackYears: 25,
    requirePositiveNpv: false,
  },
];

export const CHALLENGING_VIABILITY = {
  status: 'CHALLENGING',
  label: 'CHALLENGING',
  description: 'Detailed study recommended',
} as const;

// Illustrative spring-peaking shape, Jan..Dec. Not normalised to 12.
export const SEASONAL_FACTORS = [0.8, 0.9, 1.2, 1.3, 1.1, 0.9, 0.7, 0.6, 0.8, 0.9, 1.0, 0.9] as const;

export const MONTH_LABELS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

export const DEFAULT_SCENARIO_NAME = 'Scenario 1';
