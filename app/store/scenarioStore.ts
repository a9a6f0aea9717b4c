/**
 * Scenario Comparison Store
 * Named calculation runs kept in insertion order for side-by-side comparison.
 *
 * Each call to createScenarioStore returns an independent store; nothing is
 * shared at module level.
 */

import { createStore } from "zustand/vanilla";
import { DEFAULT_SCENARIO_NAME } from "../lib/model/constants";
import { calculateHydropowerPotential } from "../lib/model/hydropower";
import type { HydropowerInputs, HydropowerResult, ViabilityStatus } from "../lib/model/types";
import { classifyViability } from "../lib/model/viability";

export interface ScenarioEntry {
  name: string;
  inputs: Readonly<HydropowerInputs>;
  result: HydropowerResult;
}

export interface ScenarioComparisonRow {
  name: string;
  actualPowerKw: number;
  annualEnergyMwh: number;
  totalCapex: number;
  lcoe: number;
  simplePaybackYears: number;
  npv: number;
  viability: ViabilityStatus;
}

export interface ScenarioState {
  scenarios: ScenarioEntry[];
  currentScenario: string;

  runScenario: (name: string, inputs: HydropowerInputs) => HydropowerResult;
  removeScenario: (name: string) => void;
  selectScenario: (name: string) => void;
  getScenario: (name: string) => ScenarioEntry | undefined;
  getCurrentResult: () => HydropowerResult | undefined;
  compareScenarios: () => ScenarioComparisonRow[];
  clear: () => void;
}

export const createScenarioStore = () =>
  createStore<ScenarioState>((set, get) => ({
    scenarios: [],
    currentScenario: DEFAULT_SCENARIO_NAME,

    runScenario: (name, inputs) => {
      // Throws before touching state if the inputs are invalid
      const result = calculateHydropowerPotential(inputs);
      const entry: ScenarioEntry = { name, inputs: Object.freeze({ ...inputs }), result };

      const { scenarios } = get();
      const index = scenarios.findIndex((s) => s.name === name);
      const next = index >= 0
        ? scenarios.map((s, i) => (i === index ? entry : s))
        : [...scenarios, entry];

      set({ scenarios: next, currentScenario: name });
      return result;
    },

    removeScenario: (name) => {
      const { scenarios, currentScenario } = get();
      if (!scenarios.some((s) => s.name === name)) {
        throw new Error(`[SCENARIO] No scenario named "${name}"`);
      }

      const remaining = scenarios.filter((s) => s.name !== name);
      // Current falls back to the last remaining run
      const nextCurrent = name === currentScenario
        ? remaining[remaining.length - 1]?.name ?? DEFAULT_SCENARIO_NAME
        : currentScenario;
      set({ scenarios: remaining, currentScenario: nextCurrent });
    },

    selectScenario: (name) => {
      if (!get().scenarios.some((s) => s.name === name)) {
        throw new Error(`[SCENARIO] No scenario named "${name}"`);
      }
      set({ currentScenario: name });
    },

    getScenario: (name) => {
      return get().scenarios.find((s) => s.name === name);
    },

    getCurrentResult: () => {
      const { currentScenario, getScenario } = get();
      return getScenario(currentScenario)?.result;
    },

    compareScenarios: () => {
      return get().scenarios.map(({ name, result }) => ({
        name,
        actualPowerKw: result.powerGeneration.actualPowerKw,
        annualEnergyMwh: result.powerGeneration.annualEnergyMwh,
        totalCapex: result.economicMetrics.totalCapex,
        lcoe: result.economicMetrics.lcoe,
        simplePaybackYears: result.economicMetrics.simplePaybackYears,
        npv: result.economicMetrics.npv,
        viability: classifyViability(result).status,
      }));
    },

    clear: () => {
      set({ scenarios: [], currentScenario: DEFAULT_SCENARIO_NAME });
    },
  }));

export type ScenarioStore = ReturnType<typeof createScenarioStore>;
