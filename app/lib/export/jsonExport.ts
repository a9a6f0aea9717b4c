import type { HydropowerResult } from '../model/types';
import { ExportFormatError, exportTableFromRecord, fromExportTable } from './exportTable';

// JSON has no Infinity/NaN; they travel as these strings instead of null
const NON_FINITE_TOKENS: Record<string, number> = {
  Infinity: Infinity,
  '-Infinity': -Infinity,
  NaN: NaN,
};

function encodeNonFinite(_key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value);
  }
  return value;
}

function decodeNonFinite(_key: string, value: unknown): unknown {
  if (typeof value === 'string' && Object.prototype.hasOwnProperty.call(NON_FINITE_TOKENS, value)) {
    return NON_FINITE_TOKENS[value];
  }
  return value;
}

export function toJson(result: HydropowerResult): string {
  return JSON.stringify(result, encodeNonFinite, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON written by toJson.
 *
 * The parsed object goes through the export table layout, so a missing or
 * non-numeric field fails the same way as a bad CSV.
 */
export function fromJson(text: string): HydropowerResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text, decodeNonFinite);
  } catch (err) {
    throw new ExportFormatError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isRecord(parsed)) {
    throw new ExportFormatError('Expected a JSON object');
  }
  for (const section of ['basicParameters', 'powerGeneration', 'economicMetrics', 'technicalSpecs']) {
    if (!isRecord(parsed[section])) {
      throw new ExportFormatError(`Missing section "${section}"`);
    }
  }

  return fromExportTable(exportTableFromRecord(parsed));
}
