/**
 * CSV, JSON and text exporters for decoded plugins.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { extname, basename, join } from 'node:path';
import {
  analyzeAmmo,
  analyzeArmor,
  analyzeKeywords,
  analyzeOverrides,
  analyzePerks,
  analyzeWeapons,
  recordRows,
} from './analysis.js';
import type { AnalysisRow, OverrideEntry, OverrideReport } from './analysis.js';
import type { DecodedPlugin } from './plugin-reader.js';
import { formatSummary, pluginKind } from './summary.js';
import logger from './utils/logger.js';

const RULE = '='.repeat(60);
const SUB_RULE = '-'.repeat(50);

function csvCell(value: unknown): string {
  let text: string;
  if (value === undefined || value === null) {
    text = '';
  } else if (Array.isArray(value)) {
    text = value.map((item: unknown) => String(item)).join(' | ');
  } else if (typeof value === 'object') {
    text = JSON.stringify(value);
  } else {
    text = String(value);
  }
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Renders rows as CSV. Columns are the union of row keys in first-seen order;
 * arrays are joined with ` | ` and nested objects JSON-encoded.
 */
export function toCsv(rows: readonly object[]): string {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const lines: string[] = [columns.map(csvCell).join(',')];
  for (const row of rows) {
    const values = new Map<string, unknown>(Object.entries(row));
    lines.push(columns.map((column: string) => csvCell(values.get(column))).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

/**
 * Writes rows to a CSV file. Returns false (and writes nothing) for no rows.
 */
export async function writeCsv(rows: readonly object[], filePath: string): Promise<boolean> {
  if (rows.length === 0) {
    logger.info(`No data to export to ${filePath}`);
    return false;
  }
  await writeFile(filePath, toCsv(rows), 'utf8');
  logger.info(`Exported ${rows.length} records to ${filePath}`);
  return true;
}

/**
 * JSON document for a plugin: header facts plus the analysis rows per type.
 */
export function toJsonDocument(decoded: DecodedPlugin, analyses: ReadonlyMap<string, readonly AnalysisRow[]>): object {
  return {
    file: decoded.header.fileName,
    kind: pluginKind(decoded.header),
    masters: decoded.header.masters,
    isEsm: decoded.header.isMaster,
    isEsl: decoded.header.isLightMaster,
    complete: decoded.complete,
    warnings: decoded.warnings,
    records: Object.fromEntries(analyses),
  };
}

export async function writeJson(document: object, filePath: string): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
  logger.info(`Exported to ${filePath}`);
}

function entryLines(entry: OverrideEntry, indent: string, withType: boolean): string[] {
  const lines: string[] = [
    `${indent}${withType ? `[${entry.type}] ` : ''}${entry.formId} | ${entry.editorId}`,
  ];
  if (entry.fullName) {
    lines.push(`${indent}  Name: ${entry.fullName}`);
  }
  if (entry.keywords.length > 0) {
    lines.push(`${indent}  Keywords: ${entry.keywords.join(', ')}`);
  }
  return lines;
}

function sortedKeys<V>(map: ReadonlyMap<string, V>): string[] {
  return Array.from(map.keys()).sort();
}

/**
 * Text report of overridden masters and records new to this plugin.
 */
export function formatOverrideReport(fileName: string, report: OverrideReport): string {
  const lines: string[] = [`Override Analysis: ${fileName}`, RULE, ''];

  for (const master of sortedKeys(report.overrides)) {
    const entries: readonly OverrideEntry[] = report.overrides.get(master) ?? [];
    lines.push('', `Overrides from ${master} (${entries.length} records):`, SUB_RULE);
    entries.forEach((entry: OverrideEntry) => lines.push(...entryLines(entry, '  ', true)));
  }

  lines.push('', '', `New Records in ${fileName}:`, RULE);
  for (const type of sortedKeys(report.newRecords)) {
    const entries: readonly OverrideEntry[] = report.newRecords.get(type) ?? [];
    lines.push('', `  ${type} (${entries.length} new records):`);
    entries.forEach((entry: OverrideEntry) => lines.push(...entryLines(entry, '    ', false)));
  }

  if (report.foreign.length > 0) {
    lines.push('', '', `Records from undeclared masters (${report.foreign.length}):`, RULE);
    report.foreign.forEach((entry: OverrideEntry) => lines.push(...entryLines(entry, '  ', true)));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Writes summary, per-type CSVs, override report and an all-records CSV into `outputDir`.
 *
 * @returns Paths of the files written
 */
export async function writeFullDump(decoded: DecodedPlugin, outputDir: string): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });
  const { fileName } = decoded.header;
  const base: string = basename(fileName, extname(fileName));
  const written: string[] = [];

  const summaryPath: string = join(outputDir, `${base}_summary.txt`);
  await writeFile(summaryPath, formatSummary(decoded), 'utf8');
  written.push(summaryPath);
  logger.info(`Summary written to ${summaryPath}`);

  const perType: readonly [string, string, (d: DecodedPlugin) => readonly object[]][] = [
    ['KYWD', 'keywords', analyzeKeywords],
    ['WEAP', 'weapons', analyzeWeapons],
    ['AMMO', 'ammo', analyzeAmmo],
    ['ARMO', 'armor', analyzeArmor],
    ['PERK', 'perks', analyzePerks],
  ];
  for (const [type, suffix, analyze] of perType) {
    if (decoded.index.byType(type).length === 0) {
      continue;
    }
    const path: string = join(outputDir, `${base}_${suffix}.csv`);
    if (await writeCsv(analyze(decoded), path)) {
      written.push(path);
    }
  }

  const overridePath: string = join(outputDir, `${base}_overrides.txt`);
  await writeFile(overridePath, formatOverrideReport(fileName, analyzeOverrides(decoded)), 'utf8');
  written.push(overridePath);
  logger.info(`Override analysis written to ${overridePath}`);

  const allPath: string = join(outputDir, `${base}_all_records.csv`);
  if (await writeCsv(recordRows(decoded), allPath)) {
    written.push(allPath);
  }

  return written;
}
