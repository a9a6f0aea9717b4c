import {
  annuityFactor,
  cashFlowSchedule,
  discountFactor,
  levelizedCost,
  netPresentValue,
  simplePayback,
} from '../finance';

describe('Finance Helpers', () => {
  describe('annuityFactor', () => {
    test('zero rate is exactly the number of years', () => {
      expect(annuityFactor(0, 30)).toBe(30);
      expect(annuityFactor(0, 1)).toBe(1);
    });

    test('converges to n as the rate approaches zero', () => {
      expect(annuityFactor(1e-9, 30)).toBeCloseTo(30, 4);
      expect(annuityFactor(1e-6, 30)).toBeCloseTo(30, 2);
    });

    test('6% over 30 years', () => {
      expect(annuityFactor(0.06, 30)).toBeCloseTo(13.764831, 5);
    });

    test('one year is a single discount factor', () => {
      expect(annuityFactor(0.1, 1)).toBeCloseTo(1 / 1.1, 12);
    });
  });

  test('discountFactor', () => {
    expect(discountFactor(0, 10)).toBe(1);
    expect(discountFactor(0.1, 2)).toBeCloseTo(1 / 1.21, 12);
  });

  describe('levelizedCost', () => {
    test('zero rate reduces to lifetime cost over lifetime energy', () => {
      // (1000 + 10 * 100) / (10 * 50)
      expect(levelizedCost(1000, 100, 50, 0, 10)).toBe(4);
    });

    test('no energy gives Infinity instead of throwing', () => {
      expect(levelizedCost(1000, 100, 0, 0.06, 30)).toBe(Infinity);
      expect(levelizedCost(1000, 100, 0, 0, 30)).toBe(Infinity);
    });
  });

  describe('simplePayback', () => {
    test('capex over net cash flow', () => {
      expect(simplePayback(100, 25)).toBe(4);
    });

    test('non-positive cash flow never pays back', () => {
      expect(simplePayback(100, 0)).toBe(Infinity);
      expect(simplePayback(100, -5)).toBe(Infinity);
    });
  });

  describe('netPresentValue', () => {
    test('zero rate is plain sum', () => {
      expect(netPresentValue(100, 30, 0, 5)).toBe(50);
    });

    test('no cash flow loses the investment', () => {
      expect(netPresentValue(100, 0, 0.05, 10)).toBe(-100);
    });

    test('matches the annuity closed form', () => {
      const npv = netPresentValue(1_000_000, 120_000, 0.07, 25);
      expect(npv).toBeCloseTo(-1_000_000 + 120_000 * annuityFactor(0.07, 25), 4);
    });

    test('decreases with discount rate for positive cash flow', () => {
      const rates = [0, 0.02, 0.04, 0.06, 0.08, 0.1];
      const npvs = rates.map((r) => netPresentValue(1_000_000, 100_000, r, 30));
      for (let i = 1; i < npvs.length; i++) {
        expect(npvs[i]).toBeLessThan(npvs[i - 1]);
      }
    });
  });

  describe('cashFlowSchedule', () => {
    const schedule = cashFlowSchedule(500, 100, 0.05, 8);

    test('year 0 investment then constant flows', () => {
      expect(schedule).toHaveLength(9);
      expect(schedule[0]).toEqual({ year: 0, cashFlow: -500, discountedCashFlow: -500 });
      expect(schedule.slice(1).every((y) => y.cashFlow === 100)).toBe(true);
      expect(schedule[8].year).toBe(8);
    });

    test('discounted flows sum to NPV', () => {
      const total = schedule.reduce((sum, y) => sum + y.discountedCashFlow, 0);
      expect(total).toBeCloseTo(netPresentValue(500, 100, 0.05, 8), 9);
    });
  });
});
