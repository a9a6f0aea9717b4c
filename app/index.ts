export * from './lib/model/types';
export {
  DEFAULT_INPUTS,
  INPUT_RANGES,
  TURBINE_TYPES,
  SITE_TYPES,
  VIABILITY_THRESHOLDS,
} from './lib/model/constants';
export { getTurbineEfficiency, isKnownTurbineType } from './lib/model/turbine_efficiency';
export { InvalidInputError, validateHydropowerInputs, assertValidInputs } from './lib/model/validation';
export {
  annuityFactor,
  levelizedCost,
  netPresentValue,
  simplePayback,
  cashFlowSchedule,
} from './lib/model/finance';
export { calculateHydropowerPotential, calculate } from './lib/model/hydropower';
export { classifyViability } from './lib/model/viability';
export {
  powerDistribution,
  monthlyGenerationProfile,
  cumulativeCashFlow,
  costBreakdown,
} from './lib/model/analysis';
export { buildMetricCards } from './lib/model/metricCards';
export {
  ExportFormatError,
  toExportTable,
  fromExportTable,
  toCsv,
  parseCsv,
} from './lib/export/exportTable';
export { toJson, fromJson } from './lib/export/jsonExport';
export { generateSummaryReport } from './lib/export/summaryReport';
export { buildExportBundle, exportFileNames } from './lib/export/exportBundle';
export { createScenarioStore } from './store/scenarioStore';
export type { ScenarioEntry, ScenarioComparisonRow, ScenarioState, ScenarioStore } from './store/scenarioStore';
