import { CHALLENGING_VIABILITY, VIABILITY_THRESHOLDS } from './constants';
import type { HydropowerResult, ViabilityAssessment } from './types';

/**
 * Classify project viability from LCOE, simple payback and NPV.
 * Tiers are checked in order; the first match wins.
 */
export function classifyViability(result: HydropowerResult): ViabilityAssessment {
  const { lcoe, simplePaybackYears, npv } = result.economicMetrics;

  for (const tier of VIABILITY_THRESHOLDS) {
    if (
      lcoe < tier.maxLcoe &&
      simplePaybackYears < tier.maxPaybackYears &&
      (!tier.requirePositiveNpv || npv > 0)
    ) {
      return { status: tier.status, label: tier.label, description: tier.description };
    }
  }

  return { ...CHALLENGING_VIABILITY };
}
