import { TURBINE_TYPES, SITE_TYPES } from './constants';

export type TurbineType = (typeof TURBINE_TYPES)[number];

export type SiteType = (typeof SITE_TYPES)[number];

// --- Inputs ---
export interface HydropowerInputs {
  head: number;                  // m
  flow: number;                  // m³/s
  /** Known types drive the efficiency table; anything else falls back to the default factor. */
  turbineType: TurbineType | (string & {});
  efficiency: number;            // 0-1 overall (turbine + generator + transformer)
  electricityPrice: number;      // $/MWh
  projectLifetimeYears: number;  // integer years
  discountRate: number;          // 0-1
  capacityFactor: number;        // 0-1
  capexPerKw: number;            // $/kW
  omFraction: number;            // fraction of CAPEX per year
  /** Descriptive only; validation rejects anything outside SITE_TYPES. */
  siteType?: SiteType | (string & {});
}

// --- Result ---
export interface BasicParameters {
  head: number;
  flow: number;
  turbineType: string;
  efficiencyPercent: number;
  capacityFactorPercent: number;
  siteType?: SiteType;
}

export interface PowerGeneration {
  theoreticalPowerKw: number;
  actualPowerKw: number;
  annualEnergyMwh: number;
  capacityFactorPercent: number;
}

export interface EconomicMetrics {
  totalCapex: number;            // $
  annualRevenue: number;         // $/yr
  annualOm: number;              // $/yr
  lcoe: number;                  // $/MWh, Infinity when no discounted energy
  simplePaybackYears: number;    // Infinity when net cash flow <= 0
  npv: number;                   // $
  electricityPrice: number;      // $/MWh
}

export interface TechnicalSpecs {
  waterDensity: number;          // kg/m³
  gravity: number;               // m/s²
  projectLifetimeYears: number;
  discountRatePercent: number;
}

export interface HydropowerResult {
  readonly basicParameters: Readonly<BasicParameters>;
  readonly powerGeneration: Readonly<PowerGeneration>;
  readonly economicMetrics: Readonly<EconomicMetrics>;
  readonly technicalSpecs: Readonly<TechnicalSpecs>;
}

// --- Validation ---
export type InputField = keyof HydropowerInputs;

export interface InputViolation {
  field: InputField;
  constraint: string;
  value: unknown;
}

export interface ValidationResult {
  valid: boolean;
  errors: InputViolation[];
  warnings: string[];
}

// --- Viability ---
export type ViabilityStatus = 'HIGHLY_VIABLE' | 'VIABLE' | 'MARGINAL' | 'CHALLENGING';

export interface ViabilityAssessment {
  status: ViabilityStatus;
  label: string;
  description: string;
}
