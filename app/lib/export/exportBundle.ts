/**
 * Export All
 * Zip archive with the CSV table, the JSON result and the text report.
 */

import JSZip from 'jszip';
import { timeFormat } from 'd3-time-format';
import type { HydropowerResult } from '../model/types';
import { toCsv, toExportTable } from './exportTable';
import { toJson } from './jsonExport';
import { generateSummaryReport } from './summaryReport';

export const formatFileStamp = timeFormat('%Y%m%d_%H%M%S');

export interface ExportFileNames {
  csv: string;
  json: string;
  report: string;
}

export function exportFileNames(generatedAt: Date): ExportFileNames {
  const stamp = formatFileStamp(generatedAt);
  return {
    csv: `hydropower_analysis_${stamp}.csv`,
    json: `hydropower_results_${stamp}.json`,
    report: `hydropower_summary_${stamp}.txt`,
  };
}

export async function buildExportBundle(result: HydropowerResult, generatedAt: Date): Promise<Buffer> {
  const names = exportFileNames(generatedAt);
  const zip = new JSZip();

  zip.file(names.csv, toCsv(toExportTable(result)));
  zip.file(names.json, toJson(result));
  zip.file(names.report, generateSummaryReport(result, generatedAt));

  return zip.generateAsync({ type: 'nodebuffer' });
}
