/**
 * Project Finance Helpers
 *
 * Constant annual cash flows, end-of-year convention, no escalation or
 * degradation. Sentinels: Infinity for LCOE with no discounted energy and
 * for payback with non-positive net cash flow.
 */

/**
 * Present value of 1 per year for `years` years at `rate`.
 * r = 0 is its own branch: the closed form divides by zero there.
 */
export function annuityFactor(rate: number, years: number): number {
  if (rate === 0) {
    return years;
  }
  return (1 - Math.pow(1 + rate, -years)) / rate;
}

export function discountFactor(rate: number, year: number): number {
  return 1 / Math.pow(1 + rate, year);
}

/**
 * Levelized cost: (CAPEX + PV of O&M) / PV of energy.
 */
export function levelizedCost(
  totalCapex: number,
  annualOm: number,
  annualEnergy: number,
  rate: number,
  years: number
): number {
  const annuity = annuityFactor(rate, years);
  const pvOm = annualOm * annuity;
  const pvEnergy = annualEnergy * annuity;

  if (pvEnergy <= 0) {
    return Infinity;
  }
  return (totalCapex + pvOm) / pvEnergy;
}

export function simplePayback(totalCapex: number, netAnnualCashFlow: number): number {
  return netAnnualCashFlow > 0 ? totalCapex / netAnnualCashFlow : Infinity;
}

/**
 * NPV of an up-front investment followed by a constant cash flow in
 * years 1..years.
 */
export function netPresentValue(
  initialInvestment: number,
  annualCashFlow: number,
  rate: number,
  years: number
): number {
  let npv = -initialInvestment;
  for (let year = 1; year <= years; year++) {
    npv += annualCashFlow * discountFactor(rate, year);
  }
  return npv;
}

export interface CashFlowYear {
  year: number;
  cashFlow: number;
  discountedCashFlow: number;
}

/**
 * Year 0 investment (negative) followed by `years` constant cash flows.
 */
export function cashFlowSchedule(
  initialInvestment: number,
  annualCashFlow: number,
  rate: number,
  years: number
): CashFlowYear[] {
  const schedule: CashFlowYear[] = [
    { year: 0, cashFlow: -initialInvestment, discountedCashFlow: -initialInvestment },
  ];
  for (let year = 1; year <= years; year++) {
    schedule.push({
      year,
      cashFlow: annualCashFlow,
      discountedCashFlow: annualCashFlow * discountFactor(rate, year),
    });
  }
  return schedule;
}
