/**
 * Analysis Series
 *
 * Chart-ready data derived from a single result: power losses, a simulated
 * monthly profile, lifetime cash flow and cost breakdown.
 */

import { cumsum, sum } from 'd3-array';
import { MONTH_LABELS, SEASONAL_FACTORS } from './constants';
import { cashFlowSchedule } from './finance';
import type { HydropowerResult } from './types';

export interface PowerDistribution {
  actualPowerKw: number;
  systemLossesKw: number;
  lossFraction: number;          // 0-1 of theoretical
}

export function powerDistribution(result: HydropowerResult): PowerDistribution {
  const { theoreticalPowerKw, actualPowerKw } = result.powerGeneration;
  const systemLossesKw = theoreticalPowerKw - actualPowerKw;
  return {
    actualPowerKw,
    systemLossesKw,
    lossFraction: theoreticalPowerKw > 0 ? systemLossesKw / theoreticalPowerKw : 0,
  };
}

export interface MonthlyGeneration {
  month: (typeof MONTH_LABELS)[number];
  energyMwh: number;
}

/**
 * Simulated seasonal profile: annual energy / 12 scaled by a fixed
 * spring-peaking factor per month. Not a hydrology model and not
 * reconciled to the annual total.
 */
export function monthlyGenerationProfile(result: HydropowerResult): MonthlyGeneration[] {
  const { annualEnergyMwh } = result.powerGeneration;
  return MONTH_LABELS.map((month, i) => ({
    month,
    energyMwh: (annualEnergyMwh * SEASONAL_FACTORS[i]) / 12,
  }));
}

export interface CumulativeCashFlowPoint {
  year: number;
  cashFlow: number;
  cumulativeCashFlow: number;
  cumulativeDiscountedCashFlow: number;
}

export function cumulativeCashFlow(result: HydropowerResult): CumulativeCashFlowPoint[] {
  const { totalCapex, annualRevenue, annualOm } = result.economicMetrics;
  const { projectLifetimeYears, discountRatePercent } = result.technicalSpecs;

  const schedule = cashFlowSchedule(
    totalCapex,
    annualRevenue - annualOm,
    discountRatePercent / 100,
    projectLifetimeYears
  );
  const cumulative = cumsum(schedule, (d) => d.cashFlow);
  const cumulativeDiscounted = cumsum(schedule, (d) => d.discountedCashFlow);

  return schedule.map((d, i) => ({
    year: d.year,
    cashFlow: d.cashFlow,
    cumulativeCashFlow: cumulative[i],
    cumulativeDiscountedCashFlow: cumulativeDiscounted[i],
  }));
}

export interface CostBreakdown {
  capex: number;
  lifetimeOm: number;            // undiscounted
  total: number;
}

export function costBreakdown(result: HydropowerResult): CostBreakdown {
  const capex = result.economicMetrics.totalCapex;
  const lifetimeOm = result.economicMetrics.annualOm * result.technicalSpecs.projectLifetimeYears;
  return {
    capex,
    lifetimeOm,
    total: sum([capex, lifetimeOm]),
  };
}
