import { DEFAULT_INPUTS } from '../constants';
import type { HydropowerInputs, HydropowerResult } from '../types';

/** 50 m head, 100 m³/s Francis site at default economics */
export const FRANCIS_SITE: HydropowerInputs = {
  ...DEFAULT_INPUTS,
  turbineType: 'francis',
};

/** Revenue and O&M both exactly zero */
export const ZERO_NET_CASH_FLOW: HydropowerInputs = {
  ...FRANCIS_SITE,
  electricityPrice: 0,
  omFraction: 0,
};

/**
 * Result carrying only the metrics viability looks at; everything else is
 * filler.
 */
export function resultWithMetrics(lcoe: number, simplePaybackYears: number, npv: number): HydropowerResult {
  return {
    basicParameters: { head: 50, flow: 100, turbineType: 'francis', efficiencyPercent: 90, capacityFactorPercent: 50 },
    powerGeneration: { theoreticalPowerKw: 1, actualPowerKw: 1, annualEnergyMwh: 1, capacityFactorPercent: 50 },
    economicMetrics: {
      totalCapex: 1,
      annualRevenue: 1,
      annualOm: 0,
      lcoe,
      simplePaybackYears,
      npv,
      electricityPrice: 80,
    },
    technicalSpecs: { waterDensity: 1000, gravity: 9.81, projectLifetimeYears: 30, discountRatePercent: 6 },
  };
}
