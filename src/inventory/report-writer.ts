/**
 * Report Writer
 * Writes the fleet report as one JSON file per table, plus CSV for flat rows
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import { createLogger } from '../utils/logger.js';
import { sortCounter } from './counter.js';
import type { FleetReport, MissingPatchRow } from './types.js';

const logger = createLogger('report-writer');

export const MISSING_PATCH_COLUMNS: ReadonlyArray<keyof MissingPatchRow> = [
  'computerId',
  'username',
  'name',
  'email',
  'serialNumber',
  'patchId',
  'application',
  'installedVersion',
];

export interface RunSummary {
  generatedAt: string;
  computersProcessed: number;
  patchTitles: number;
  users: number;
  stale: number[];
  failures: FleetReport['failures'];
}

export interface WrittenReport {
  outputDir: string;
  files: string[];
  summary: RunSummary;
}

/**
 * File name -> content, in the order the files are written
 */
export function buildReportFiles(report: FleetReport): Array<[string, unknown]> {
  return [
    ['user_chrome_extensions.json', report.chromeExtensions],
    ['user_patches.json', report.appliedPatches],
    ['user_applications.json', report.applications],
    ['user_plugins.json', report.plugins],
    ['user_available_software_updates.json', report.availableSoftwareUpdates],
    ['user_available_updates.json', report.availableUpdates],
    ['user_services.json', report.services],
    ['user_assets.json', report.assets],
    ['user_virtual_machines.json', report.virtualMachines],
    ['user_missing_patches.json', report.missingPatches],
    ['services_counter.json', sortCounter(report.counters.services)],
    ['chrome_extensions_counter.json', sortCounter(report.counters.chromeExtensions)],
    ['virtual_machines_counter.json', sortCounter(report.counters.virtualMachines)],
    ['applications_counter.json', sortCounter(report.counters.applications)],
    ['plugins_counter.json', sortCounter(report.counters.plugins)],
    ['ip_to_user_object.json', report.ipToUser],
    ['ip_to_username.json', report.ipToUsername],
    ['ip_to_computer.json', report.ipToComputer],
    ['xattr_stats.json', report.extensionAttributeStats],
    ['crash_reports.json', report.crashReports],
  ];
}

export function summarizeReport(report: FleetReport): RunSummary {
  return {
    generatedAt: report.generatedAt,
    computersProcessed: report.computersProcessed,
    patchTitles: report.patchTitles.length,
    users: Object.keys(report.appliedPatches).length,
    stale: report.stale,
    failures: report.failures,
  };
}

export function missingPatchesCsv(rows: readonly MissingPatchRow[]): string {
  return stringify([...rows], {
    header: true,
    columns: [...MISSING_PATCH_COLUMNS],
  });
}

export async function writeReport(outputDir: string, report: FleetReport): Promise<WrittenReport> {
  await fs.mkdir(outputDir, { recursive: true });
  const files: string[] = [];

  for (const [fileName, content] of buildReportFiles(report)) {
    const filePath = path.join(outputDir, fileName);
    await fs.writeFile(filePath, JSON.stringify(content, null, 2), 'utf8');
    files.push(filePath);
  }

  const csvPath = path.join(outputDir, 'user_missing_patches.csv');
  await fs.writeFile(csvPath, missingPatchesCsv(report.missingPatchRows), 'utf8');
  files.push(csvPath);

  const summary = summarizeReport(report);
  const summaryPath = path.join(outputDir, 'run_summary.json');
  await fs.writeFile(summaryPath, JSON.stringify(summary, null, 2), 'utf8');
  files.push(summaryPath);

  logger.info({ outputDir, files: files.length }, 'Report written');
  return { outputDir, files, summary };
}
