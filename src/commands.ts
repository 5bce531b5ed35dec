/**
 * Command implementations behind the CLI.
 */

import { resolve } from 'node:path';
import { analysisFor, hasSpecializedAnalysis } from './analysis.js';
import type { AnalysisRow } from './analysis.js';
import { batchScan } from './batch.js';
import type { BatchScanRow } from './batch.js';
import { KEYWORD_CONSUMER_TYPES } from './constants/known-form-ids.js';
import { toJsonDocument, writeCsv, writeFullDump, writeJson } from './export.js';
import { PluginReader } from './plugin-reader.js';
import type { DecodedPlugin } from './plugin-reader.js';
import { formatSummary } from './summary.js';
import { DECODER_CONFIG } from './utils/config.js';
import logger, { setLogLevel } from './utils/logger.js';

export interface DecodeCommandOptions {
  readonly type?: readonly string[];
  readonly csv?: string;
  readonly json?: string;
  readonly dump?: string;
  readonly summary?: boolean;
  readonly verbose?: boolean;
}

export interface BatchCommandOptions {
  readonly type?: readonly string[];
  readonly dump?: string;
}

/**
 * Interest set for a decode: the requested types, plus KYWD whenever a
 * requested type carries keywords that should resolve to names.
 */
export function expandRecordTypes(types: readonly string[] | undefined): Set<string> | null {
  if (!types || types.length === 0) {
    return null;
  }
  const expanded = new Set<string>(types);
  if (types.some((type: string) => KEYWORD_CONSUMER_TYPES.has(type))) {
    expanded.add('KYWD');
  }
  return expanded;
}

/**
 * Decodes one plugin and produces the requested output. Returns the text to
 * print, or null when the output went to files.
 */
export async function decodeCommand(file: string, options: DecodeCommandOptions): Promise<string | null> {
  if (options.verbose) {
    setLogLevel('debug');
  }

  const decoded: DecodedPlugin = await PluginReader.read({
    filePath: resolve(file),
    recordTypes: expandRecordTypes(options.type),
  });

  if (decoded.warnings.length > 0) {
    logger.warn(`${decoded.header.fileName}: ${decoded.warnings.length} records or groups could not be fully decoded`);
  }

  if (options.summary) {
    return formatSummary(decoded);
  }

  if (options.dump) {
    await writeFullDump(decoded, resolve(options.dump));
    return null;
  }

  const requested: readonly string[] = options.type ?? [];

  if (options.csv && requested.length > 0) {
    const rows: AnalysisRow[] = requested.flatMap((type: string) => analysisFor(decoded, type));
    await writeCsv(rows, resolve(options.csv));
    return null;
  }

  if (options.json) {
    const types: readonly string[] = requested.length > 0
      ? requested
      : decoded.index.types().filter(hasSpecializedAnalysis);
    const analyses = new Map<string, AnalysisRow[]>(
      types.map((type: string): [string, AnalysisRow[]] => [type, analysisFor(decoded, type)])
    );
    await writeJson(toJsonDocument(decoded, analyses), resolve(options.json));
    return null;
  }

  return formatSummary(decoded);
}

export async function batchCommand(directory: string, options: BatchCommandOptions): Promise<BatchScanRow[]> {
  return batchScan({
    directory,
    outputDir: resolve(options.dump ?? DECODER_CONFIG.batchOutputDir),
    recordTypes: options.type && options.type.length > 0 ? options.type : null,
  });
}
