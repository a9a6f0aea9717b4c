/**
 * Turbine Efficiency Lookup
 *
 * Nominal efficiency factor per turbine family, banded by net head.
 * Factors are typical values, not manufacturer performance curves.
 */

import { DEFAULT_TURBINE_EFFICIENCY, TURBINE_TYPES } from './constants';
import type { TurbineType } from './types';

const TURBINE_EFFICIENCY: Record<TurbineType, (head: number) => number> = {
  kaplan: (head) => (head < 40 ? 0.9 : 0.85),
  francis: (head) => (head >= 10 && head <= 350 ? 0.92 : 0.88),
  pelton: (head) => (head > 150 ? 0.88 : 0.82),
  cross_flow: () => 0.8,
  propeller: (head) => (head < 15 ? 0.85 : 0.8),
};

export function isKnownTurbineType(value: string): value is TurbineType {
  return TURBINE_TYPES.some((type) => type === value);
}

/**
 * Efficiency factor in (0, 1] for a turbine type at the given head.
 *
 * Unrecognized types return DEFAULT_TURBINE_EFFICIENCY instead of throwing.
 * Whether that fallback should become an error is still open; callers that
 * care can check isKnownTurbineType first.
 */
export function getTurbineEfficiency(turbineType: string, head: number): number {
  if (!isKnownTurbineType(turbineType)) {
    if (process.env.NODE_ENV === 'development') {
      console.warn(
        `[TURBINE] Unknown turbine type "${turbineType}", using default factor ${DEFAULT_TURBINE_EFFICIENCY}`
      );
    }
    return DEFAULT_TURBINE_EFFICIENCY;
  }
  return TURBINE_EFFICIENCY[turbineType](head);
}
