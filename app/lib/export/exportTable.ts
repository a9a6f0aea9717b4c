/**
 * Flat Export Table
 *
 * Parameter / Value / Unit rows mirroring every field of a result, grouped
 * under section heading rows and separated by blank rows. The table can be
 * written to CSV and read back into an identical result.
 */

import { csvFormatRows, csvParseRows } from 'd3-dsv';
import type { HydropowerResult, SiteType } from '../model/types';
import { SITE_TYPES } from '../model/constants';

export class ExportFormatError extends Error {
  constructor(message: string) {
    super(`[EXPORT] ${message}`);
    this.name = 'ExportFormatError';
  }
}

export interface ExportRow {
  parameter: string;
  value: number | string;
  unit: string;
}

type FieldId =
  | 'head'
  | 'flow'
  | 'turbineType'
  | 'efficiencyPercent'
  | 'basicCapacityFactorPercent'
  | 'siteType'
  | 'theoreticalPowerKw'
  | 'actualPowerKw'
  | 'annualEnergyMwh'
  | 'capacityFactorPercent'
  | 'totalCapex'
  | 'annualRevenue'
  | 'annualOm'
  | 'lcoe'
  | 'simplePaybackYears'
  | 'npv'
  | 'electricityPrice'
  | 'waterDensity'
  | 'gravity'
  | 'projectLifetimeYears'
  | 'discountRatePercent';

interface FieldLayout {
  id: FieldId;
  key: string;                   // property name inside the result section
  label: string;
  unit: string;
  read: (r: HydropowerResult) => number | string | undefined;
}

interface SectionLayout {
  title: string;
  group: keyof HydropowerResult;
  fields: FieldLayout[];
}

const TABLE_LAYOUT: SectionLayout[] = [
  {
    title: 'Site Parameters',
    group: 'basicParameters',
    fields: [
      { key: 'head', id: 'head', label: 'Head', unit: 'm', read: (r) => r.basicParameters.head },
      { key: 'flow', id: 'flow', label: 'Flow Rate', unit: 'm³/s', read: (r) => r.basicParameters.flow },
      { key: 'turbineType', id: 'turbineType', label: 'Turbine Type', unit: '-', read: (r) => r.basicParameters.turbineType },
      { key: 'efficiencyPercent', id: 'efficiencyPercent', label: 'Overall Efficiency', unit: '%', read: (r) => r.basicParameters.efficiencyPercent },
      { key: 'capacityFactorPercent', id: 'basicCapacityFactorPercent', label: 'Capacity Factor', unit: '%', read: (r) => r.basicParameters.capacityFactorPercent },
      { key: 'siteType', id: 'siteType', label: 'Site Type', unit: '-', read: (r) => r.basicParameters.siteType },
    ],
  },
  {
    title: 'Power Generation',
    group: 'powerGeneration',
    fields: [
      { key: 'theoreticalPowerKw', id: 'theoreticalPowerKw', label: 'Theoretical Power', unit: 'kW', read: (r) => r.powerGeneration.theoreticalPowerKw },
      { key: 'actualPowerKw', id: 'actualPowerKw', label: 'Actual Power', unit: 'kW', read: (r) => r.powerGeneration.actualPowerKw },
      { key: 'annualEnergyMwh', id: 'annualEnergyMwh', label: 'Annual Energy', unit: 'MWh/year', read: (r) => r.powerGeneration.annualEnergyMwh },
      { key: 'capacityFactorPercent', id: 'capacityFactorPercent', label: 'Capacity Factor', unit: '%', read: (r) => r.powerGeneration.capacityFactorPercent },
    ],
  },
  {
    title: 'Economic Metrics',
    group: 'economicMetrics',
    fields: [
      { key: 'totalCapex', id: 'totalCapex', label: 'Total CAPEX', unit: '$', read: (r) => r.economicMetrics.totalCapex },
      { key: 'annualRevenue', id: 'annualRevenue', label: 'Annual Revenue', unit: '$/year', read: (r) => r.economicMetrics.annualRevenue },
      { key: 'annualOm', id: 'annualOm', label: 'Annual O&M', unit: '$/year', read: (r) => r.economicMetrics.annualOm },
      { key: 'lcoe', id: 'lcoe', label: 'LCOE', unit: '$/MWh', read: (r) => r.economicMetrics.lcoe },
      { key: 'simplePaybackYears', id: 'simplePaybackYears', label: 'Simple Payback', unit: 'years', read: (r) => r.economicMetrics.simplePaybackYears },
      { key: 'npv', id: 'npv', label: 'NPV', unit: '$', read: (r) => r.economicMetrics.npv },
      { key: 'electricityPrice', id: 'electricityPrice', label: 'Electricity Price', unit: '$/MWh', read: (r) => r.economicMetrics.electricityPrice },
    ],
  },
  {
    title: 'Technical Specifications',
    group: 'technicalSpecs',
    fields: [
      { key: 'waterDensity', id: 'waterDensity', label: 'Water Density', unit: 'kg/m³', read: (r) => r.technicalSpecs.waterDensity },
      { key: 'gravity', id: 'gravity', label: 'Gravity', unit: 'm/s²', read: (r) => r.technicalSpecs.gravity },
      { key: 'projectLifetimeYears', id: 'projectLifetimeYears', label: 'Project Lifetime', unit: 'years', read: (r) => r.technicalSpecs.projectLifetimeYears },
      { key: 'discountRatePercent', id: 'discountRatePercent', label: 'Discount Rate', unit: '%', read: (r) => r.technicalSpecs.discountRatePercent },
    ],
  },
];

const BLANK_ROW: ExportRow = { parameter: '', value: '', unit: '' };

export function toExportTable(result: HydropowerResult): ExportRow[] {
  const rows: ExportRow[] = [];

  TABLE_LAYOUT.forEach((section, i) => {
    if (i > 0) rows.push({ ...BLANK_ROW });
    rows.push({ parameter: section.title, value: '', unit: '' });

    for (const field of section.fields) {
      const value = field.read(result);
      // Optional fields are omitted rather than written empty
      if (value === undefined) continue;
      rows.push({ parameter: field.label, value, unit: field.unit });
    }
  });

  return rows;
}

/**
 * Table rows from a loosely typed result-shaped object, e.g. parsed JSON.
 * Absent fields are skipped; fromExportTable reports the required ones.
 */
export function exportTableFromRecord(record: Record<string, unknown>): ExportRow[] {
  const rows: ExportRow[] = [];

  for (const section of TABLE_LAYOUT) {
    rows.push({ parameter: section.title, value: '', unit: '' });
    const group = record[section.group];
    if (typeof group !== 'object' || group === null) continue;

    for (const field of section.fields) {
      const value: unknown = Reflect.get(group, field.key);
      if (value === undefined) continue;
      if (typeof value !== 'number' && typeof value !== 'string') {
        throw new ExportFormatError(`Field "${section.group}.${field.key}" must be a number or string`);
      }
      rows.push({ parameter: field.label, value, unit: field.unit });
    }
  }

  return rows;
}

function isHeadingOrBlank(row: ExportRow): boolean {
  return row.value === '' && row.unit === '';
}

/**
 * Rebuild a result from table rows (as produced by toExportTable, or read
 * back from CSV with string values).
 *
 * @throws ExportFormatError on a missing field or a non-numeric value
 */
export function fromExportTable(rows: ExportRow[]): HydropowerResult {
  const values = new Map<FieldId, number | string>();
  let section: SectionLayout | undefined;

  for (const row of rows) {
    if (isHeadingOrBlank(row)) {
      if (row.parameter !== '') {
        section = TABLE_LAYOUT.find((s) => s.title === row.parameter);
        if (!section) {
          throw new ExportFormatError(`Unknown section "${row.parameter}"`);
        }
      }
      continue;
    }

    if (!section) {
      throw new ExportFormatError(`Row "${row.parameter}" appears before any section heading`);
    }
    const field = section.fields.find((f) => f.label === row.parameter);
    if (!field) {
      throw new ExportFormatError(`Unknown parameter "${row.parameter}" in section "${section.title}"`);
    }
    values.set(field.id, row.value);
  }

  const num = (id: FieldId): number => {
    const raw = values.get(id);
    if (raw === undefined) {
      throw new ExportFormatError(`Missing field "${id}"`);
    }
    const parsed = typeof raw === 'number' ? raw : Number(raw);
    if (Number.isNaN(parsed) || (typeof raw === 'string' && raw.trim() === '')) {
      throw new ExportFormatError(`Field "${id}" is not numeric: "${String(raw)}"`);
    }
    return parsed;
  };

  const text = (id: FieldId): string => {
    const raw = values.get(id);
    if (raw === undefined) {
      throw new ExportFormatError(`Missing field "${id}"`);
    }
    return String(raw);
  };

  const siteType = parseSiteType(values.get('siteType'));

  return Object.freeze({
    basicParameters: Object.freeze({
      head: num('head'),
      flow: num('flow'),
      turbineType: text('turbineType'),
      efficiencyPercent: num('efficiencyPercent'),
      capacityFactorPercent: num('basicCapacityFactorPercent'),
      ...(siteType !== undefined ? { siteType } : {}),
    }),
    powerGeneration: Object.freeze({
      theoreticalPowerKw: num('theoreticalPowerKw'),
      actualPowerKw: num('actualPowerKw'),
      annualEnergyMwh: num('annualEnergyMwh'),
      capacityFactorPercent: num('capacityFactorPercent'),
    }),
    economicMetrics: Object.freeze({
      totalCapex: num('totalCapex'),
      annualRevenue: num('annualRevenue'),
      annualOm: num('annualOm'),
      lcoe: num('lcoe'),
      simplePaybackYears: num('simplePaybackYears'),
      npv: num('npv'),
      electricityPrice: num('electricityPrice'),
    }),
    technicalSpecs: Object.freeze({
      waterDensity: num('waterDensity'),
      gravity: num('gravity'),
      projectLifetimeYears: num('projectLifetimeYears'),
      discountRatePercent: num('discountRatePercent'),
    }),
  });
}

function parseSiteType(raw: number | string | undefined): SiteType | undefined {
  if (raw === undefined) return undefined;
  const match = SITE_TYPES.find((t) => t === raw);
  if (!match) {
    throw new ExportFormatError(`Unknown site type "${String(raw)}"`);
  }
  return match;
}

// --- CSV ---

const CSV_HEADER = ['Parameter', 'Value', 'Unit'];

/**
 * Numbers are written with String(), the shortest text that parses back to
 * the same double ("Infinity" included).
 */
export function toCsv(rows: ExportRow[]): string {
  return csvFormatRows([CSV_HEADER, ...rows.map((row) => [row.parameter, String(row.value), row.unit])]);
}

/**
 * Read CSV written by toCsv. Values come back as strings; fromExportTable
 * converts the numeric ones.
 */
export function parseCsv(text: string): ExportRow[] {
  // csvParseRows reads an open quote to the end of input
  if ((text.match(/"/g) ?? []).length % 2 !== 0) {
    throw new ExportFormatError('Unterminated quoted field');
  }

  const [header, ...records] = csvParseRows(text);
  if (!header || header.join(',') !== CSV_HEADER.join(',')) {
    throw new ExportFormatError(`Expected header "${CSV_HEADER.join(',')}"`);
  }

  return records.map((record, i) => {
    if (record.length !== CSV_HEADER.length) {
      throw new ExportFormatError(`Line ${i + 2}: expected 3 fields, got ${record.length}`);
    }
    const [parameter, value, unit] = record;
    return { parameter, value, unit };
  });
}
