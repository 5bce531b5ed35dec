/**
 * Batch scan: decodes every plugin under a directory tree.
 *
 * Files are decoded independently and concurrently; one file failing to decode
 * becomes an error row rather than aborting the scan.
 */

import { mkdir, readdir } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { writeCsv } from './export.js';
import { PluginReader } from './plugin-reader.js';
import type { DecodedPlugin } from './plugin-reader.js';
import logger from './utils/logger.js';

export const PLUGIN_EXTENSIONS: ReadonlySet<string> = new Set(['.esp', '.esm', '.esl']);

export const BATCH_RESULTS_FILE = 'batch_scan_results.csv';

export interface BatchScanOptions {
  readonly directory: string;
  readonly outputDir: string;
  readonly recordTypes?: Iterable<string> | null;
}

export interface BatchScanRow {
  readonly file: string;
  readonly path: string;
  readonly masters?: string;
  readonly masterCount?: number;
  readonly recordCount?: number;
  readonly types?: string;
  readonly isEsm?: boolean;
  readonly isEsl?: boolean;
  readonly complete?: boolean;
  readonly warnings?: number;
  readonly error?: string;
}

/**
 * Lists plugin files below `directoryPath`, recursively, sorted by path.
 */
export async function enumeratePluginFiles(directoryPath: string): Promise<string[]> {
  const entries = await readdir(directoryPath, { withFileTypes: true });
  const pluginFiles: string[] = [];

  for (const entry of entries) {
    const entryPath: string = resolve(directoryPath, entry.name);
    if (entry.isDirectory()) {
      pluginFiles.push(...await enumeratePluginFiles(entryPath));
    } else if (entry.isFile() && PLUGIN_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
      pluginFiles.push(entryPath);
    }
  }

  return pluginFiles.sort();
}

function scanRow(filePath: string, decoded: DecodedPlugin): BatchScanRow {
  const { header } = decoded;
  const types: string = Array.from(decoded.stats.typeCounts)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([type, count]) => `${type}:${count}`)
    .join(', ');
  return {
    file: basename(filePath),
    path: filePath,
    masters: header.masters.join(', '),
    masterCount: header.masters.length,
    recordCount: decoded.stats.recordCount,
    types,
    isEsm: header.isMaster,
    isEsl: header.isLightMaster,
    complete: decoded.complete,
    warnings: decoded.warnings.length,
  };
}

async function scanFile(filePath: string, recordTypes: readonly string[] | null): Promise<BatchScanRow> {
  try {
    const decoded: DecodedPlugin = await PluginReader.read({ filePath, recordTypes });
    logger.info(`Scanned: ${basename(filePath)} (${decoded.stats.recordCount} records)`);
    return scanRow(filePath, decoded);
  } catch (error) {
    const message: string = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to scan ${basename(filePath)}: ${message}`);
    return { file: basename(filePath), path: filePath, error: message };
  }
}

/**
 * Scans every plugin in `directory` and writes {@link BATCH_RESULTS_FILE} to `outputDir`.
 */
export async function batchScan(options: BatchScanOptions): Promise<BatchScanRow[]> {
  const directory: string = resolve(options.directory);
  const recordTypes: readonly string[] | null = options.recordTypes ? Array.from(options.recordTypes) : null;
  const pluginFiles: string[] = await enumeratePluginFiles(directory);
  logger.info(`Found ${pluginFiles.length} plugin files in ${directory}`);

  const rows: BatchScanRow[] = await Promise.all(
    pluginFiles.map((filePath: string) => scanFile(filePath, recordTypes))
  );

  await mkdir(options.outputDir, { recursive: true });
  await writeCsv(rows, join(options.outputDir, BATCH_RESULTS_FILE));
  return rows;
}
