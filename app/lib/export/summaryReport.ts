/**
 * Fixed-format plain-text summary of a result, ending in the viability
 * status line.
 */

import { timeFormat } from 'd3-time-format';
import { classifyViability } from '../model/viability';
import type { HydropowerResult } from '../model/types';
import { formatCurrency, formatDecimal, formatGrouped, formatYears } from '../utils/formatNumber';

const RULE = '='.repeat(37);
const LABEL_WIDTH = 23;

export const formatReportTimestamp = timeFormat('%Y-%m-%d %H:%M:%S');

export function formatReportLine(label: string, value: string): string {
  return `${label}:`.padEnd(LABEL_WIDTH) + value;
}

/**
 * "cross_flow" -> "Cross Flow"
 */
export function titleCase(value: string): string {
  return value
    .split(/[_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function section(title: string): string[] {
  return [RULE, title, RULE];
}

export function generateSummaryReport(result: HydropowerResult, generatedAt: Date): string {
  const b = result.basicParameters;
  const p = result.powerGeneration;
  const e = result.economicMetrics;
  const viability = classifyViability(result);

  const lcoe = isFinite(e.lcoe) ? `${formatCurrency(e.lcoe, 2)}/MWh` : 'n/a';

  const lines: string[] = [
    'HYDROPOWER GENERATION ANALYSIS REPORT',
    `Generated: ${formatReportTimestamp(generatedAt)}`,
    '',
    ...section('SITE PARAMETERS'),
    formatReportLine('Net Head', `${formatDecimal(b.head)} m`),
    formatReportLine('Design Flow Rate', `${formatDecimal(b.flow)} m³/s`),
    formatReportLine('Turbine Type', titleCase(b.turbineType)),
    ...(b.siteType !== undefined ? [formatReportLine('Site Type', titleCase(b.siteType))] : []),
    formatReportLine('Overall Efficiency', `${formatDecimal(b.efficiencyPercent)}%`),
    '',
    ...section('POWER GENERATION ANALYSIS'),
    formatReportLine('Theoretical Power', `${formatGrouped(p.theoreticalPowerKw)} kW`),
    formatReportLine('Actual Power Output', `${formatGrouped(p.actualPowerKw)} kW`),
    formatReportLine('Annual Energy', `${formatGrouped(p.annualEnergyMwh)} MWh/year`),
    formatReportLine('Capacity Factor', `${formatDecimal(p.capacityFactorPercent)}%`),
    '',
    ...section('ECONOMIC ANALYSIS'),
    formatReportLine('Total CAPEX', formatCurrency(e.totalCapex)),
    formatReportLine('Unit Cost', `${formatCurrency(e.totalCapex / p.actualPowerKw)}/kW`),
    formatReportLine('Annual Revenue', `${formatCurrency(e.annualRevenue)}/year`),
    formatReportLine('Annual O&M Costs', `${formatCurrency(e.annualOm)}/year`),
    formatReportLine('LCOE', lcoe),
    formatReportLine('Simple Payback', formatYears(e.simplePaybackYears, 1, 'Never')),
    formatReportLine('Net Present Value', formatCurrency(e.npv)),
    '',
    ...section('PROJECT VIABILITY'),
    `Status: ${viability.label} - ${viability.description}`,
    '',
    ...section('DISCLAIMER'),
    'This analysis provides preliminary estimates based on simplified calculations.',
    'Detailed engineering studies, environmental assessments, and site-specific',
    'analyses are required for actual project development.',
    '',
    'Report created by Hydropower Generation Calculator',
  ];

  return lines.join('\n') + '\n';
}
