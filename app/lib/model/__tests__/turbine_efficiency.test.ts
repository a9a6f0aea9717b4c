import { getTurbineEfficiency, isKnownTurbineType } from '../turbine_efficiency';
import { DEFAULT_TURBINE_EFFICIENCY } from '../constants';

describe('Turbine Efficiency Lookup', () => {
  test('kaplan favours low head', () => {
    expect(getTurbineEfficiency('kaplan', 39.9)).toBe(0.9);
    expect(getTurbineEfficiency('kaplan', 40)).toBe(0.85);
    expect(getTurbineEfficiency('kaplan', 200)).toBe(0.85);
  });

  test('francis band is inclusive at 10 m and 350 m', () => {
    expect(getTurbineEfficiency('francis', 9.99)).toBe(0.88);
    expect(getTurbineEfficiency('francis', 10)).toBe(0.92);
    expect(getTurbineEfficiency('francis', 50)).toBe(0.92);
    expect(getTurbineEfficiency('francis', 350)).toBe(0.92);
    expect(getTurbineEfficiency('francis', 350.1)).toBe(0.88);
  });

  test('pelton needs more than 150 m', () => {
    expect(getTurbineEfficiency('pelton', 150)).toBe(0.82);
    expect(getTurbineEfficiency('pelton', 150.1)).toBe(0.88);
  });

  test('cross_flow is flat', () => {
    expect(getTurbineEfficiency('cross_flow', 1)).toBe(0.8);
    expect(getTurbineEfficiency('cross_flow', 499)).toBe(0.8);
  });

  test('propeller drops at 15 m', () => {
    expect(getTurbineEfficiency('propeller', 14.9)).toBe(0.85);
    expect(getTurbineEfficiency('propeller', 15)).toBe(0.8);
  });

  // Silent fallback: a misspelled turbine name still yields a result.
  // Kept as-is until a decision is made; this test pins the behavior.
  test('unknown turbine type falls back to the default factor without throwing', () => {
    expect(() => getTurbineEfficiency('turgo', 100)).not.toThrow();
    expect(getTurbineEfficiency('turgo', 100)).toBe(DEFAULT_TURBINE_EFFICIENCY);
    expect(getTurbineEfficiency('Kaplan', 10)).toBe(0.85);
    expect(getTurbineEfficiency('', 10)).toBe(0.85);
  });

  test('every factor is in (0, 1]', () => {
    for (const type of ['kaplan', 'francis', 'pelton', 'cross_flow', 'propeller', 'other']) {
      for (const head of [1, 9, 10, 14, 15, 39, 40, 150, 151, 350, 351, 500]) {
        const factor = getTurbineEfficiency(type, head);
        expect(factor).toBeGreaterThan(0);
        expect(factor).toBeLessThanOrEqual(1);
      }
    }
  });

  test('isKnownTurbineType matches the table exactly', () => {
    expect(isKnownTurbineType('cross_flow')).toBe(true);
    expect(isKnownTurbineType('crossflow')).toBe(false);
    expect(isKnownTurbineType('PELTON')).toBe(false);
  });
});
