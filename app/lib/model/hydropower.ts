/**
 * Hydropower Potential Calculator
 *
 * P = ρ · g · Q · H · η, then annual energy from capacity factor, then
 * CAPEX / O&M / revenue and the discounted metrics.
 *
 * Pure and deterministic: no state is kept between calls and the returned
 * result is frozen.
 */

import { GRAVITY_M_S2, HOURS_PER_YEAR, KW_PER_MW, SITE_TYPES, W_PER_KW, WATER_DENSITY_KG_M3 } from './constants';
import { levelizedCost, netPresentValue, simplePayback } from './finance';
import { getTurbineEfficiency } from './turbine_efficiency';
import type { HydropowerInputs, HydropowerResult } from './types';
import { assertValidInputs } from './validation';

/**
 * Hydraulic power of the flow before any conversion losses, kW.
 */
export function theoreticalPowerKw(flow: number, head: number): number {
  return (WATER_DENSITY_KG_M3 * GRAVITY_M_S2 * flow * head) / W_PER_KW;
}

export function annualEnergyMwh(powerKw: number, capacityFactor: number): number {
  return (powerKw * capacityFactor * HOURS_PER_YEAR) / KW_PER_MW;
}

/**
 * @throws InvalidInputError when any input is outside its domain
 */
export function calculateHydropowerPotential(inputs: HydropowerInputs): HydropowerResult {
  assertValidInputs(inputs);

  const {
    head,
    flow,
    turbineType,
    efficiency,
    electricityPrice,
    projectLifetimeYears,
    discountRate,
    capacityFactor,
    capexPerKw,
    omFraction,
  } = inputs;

  // 1. Power
  const adjustedEfficiency = efficiency * getTurbineEfficiency(turbineType, head);
  const theoreticalKw = theoreticalPowerKw(flow, head);
  const actualKw = theoreticalKw * adjustedEfficiency;

  // 2. Energy
  const energyMwh = annualEnergyMwh(actualKw, capacityFactor);

  // 3. Costs and revenue
  const totalCapex = actualKw * capexPerKw;
  const annualOm = totalCapex * omFraction;
  const annualRevenue = energyMwh * electricityPrice;

  // 4. Discounted metrics
  const lcoe = levelizedCost(totalCapex, annualOm, energyMwh, discountRate, projectLifetimeYears);
  const netAnnualCashFlow = annualRevenue - annualOm;
  const simplePaybackYears = simplePayback(totalCapex, netAnnualCashFlow);
  const npv = netPresentValue(totalCapex, netAnnualCashFlow, discountRate, projectLifetimeYears);

  // Validated above, so a given site type always matches
  const siteType = SITE_TYPES.find((t) => t === inputs.siteType);

  return Object.freeze({
    basicParameters: Object.freeze({
      head,
      flow,
      turbineType,
      efficiencyPercent: efficiency * 100,
      capacityFactorPercent: capacityFactor * 100,
      ...(siteType !== undefined ? { siteType } : {}),
    }),
    powerGeneration: Object.freeze({
      theoreticalPowerKw: theoreticalKw,
      actualPowerKw: actualKw,
      annualEnergyMwh: energyMwh,
      capacityFactorPercent: capacityFactor * 100,
    }),
    economicMetrics: Object.freeze({
      totalCapex,
      annualRevenue,
      annualOm,
      lcoe,
      simplePaybackYears,
      npv,
      electricityPrice,
    }),
    technicalSpecs: Object.freeze({
      waterDensity: WATER_DENSITY_KG_M3,
      gravity: GRAVITY_M_S2,
      projectLifetimeYears,
      discountRatePercent: discountRate * 100,
    }),
  });
}

export { calculateHydropowerPotential as calculate };
