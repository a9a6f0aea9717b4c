/**
 * Result panel cards: label + formatted value, grouped the way the
 * results view lays them out.
 */

import { formatCurrency, formatDecimal, formatSigFigs, formatYears } from '../utils/formatNumber';
import type { HydropowerResult } from './types';

export type MetricTone = 'neutral' | 'positive' | 'negative';

export interface MetricCard {
  label: string;
  value: string;
  compact: string;
  tone: MetricTone;
}

export interface MetricCardGroups {
  power: MetricCard[];
  economics: MetricCard[];
  additional: MetricCard[];
}

function card(label: string, value: string, raw: number, unit: string, tone: MetricTone = 'neutral'): MetricCard {
  return {
    label,
    value,
    compact: unit ? `${formatSigFigs(raw)} ${unit}` : formatSigFigs(raw),
    tone,
  };
}

export function buildMetricCards(result: HydropowerResult): MetricCardGroups {
  const p = result.powerGeneration;
  const e = result.economicMetrics;
  const unitCost = e.totalCapex / p.actualPowerKw;

  return {
    power: [
      card('Theoretical Power', `${formatDecimal(p.theoreticalPowerKw)} kW`, p.theoreticalPowerKw, 'kW'),
      card('Actual Power', `${formatDecimal(p.actualPowerKw)} kW`, p.actualPowerKw, 'kW'),
      card('Annual Energy', `${formatDecimal(p.annualEnergyMwh)} MWh/year`, p.annualEnergyMwh, 'MWh/year'),
      card('Capacity Factor', `${formatDecimal(p.capacityFactorPercent)}%`, p.capacityFactorPercent, '%'),
    ],
    economics: [
      card('Total CAPEX', formatCurrency(e.totalCapex), e.totalCapex, '$'),
      card('Annual Revenue', `${formatCurrency(e.annualRevenue)}/year`, e.annualRevenue, '$/year'),
      card('LCOE', isFinite(e.lcoe) ? `$${formatDecimal(e.lcoe, 2)}/MWh` : '∞', e.lcoe, '$/MWh'),
      card('Payback Period', formatYears(e.simplePaybackYears), e.simplePaybackYears, 'years'),
    ],
    additional: [
      card('Annual O&M', `${formatCurrency(e.annualOm)}/year`, e.annualOm, '$/year'),
      card(
        'Net Present Value',
        formatCurrency(e.npv),
        e.npv,
        '$',
        e.npv > 0 ? 'positive' : 'negative'
      ),
      card('Unit Cost', `${formatCurrency(unitCost)}/kW`, unitCost, '$/kW'),
      card('Energy Price', `${formatCurrency(e.electricityPrice)}/MWh`, e.electricityPrice, '$/MWh'),
    ],
  };
}
