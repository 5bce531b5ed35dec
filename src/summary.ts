/**
 * Human-readable plugin summary.
 */

import type { DecodedPlugin } from './plugin-reader.js';
import type { PluginHeader } from './types/plugin.js';
import { toHex } from './utils/hex.js';

const RULE = '='.repeat(60);
const DESCRIPTION_LIMIT = 100;

export type PluginKind = 'ESM' | 'ESL' | 'ESP';

export function pluginKind(header: PluginHeader): PluginKind {
  if (header.isMaster) {
    return 'ESM';
  }
  return header.isLightMaster ? 'ESL' : 'ESP';
}

export function formatVersion(version: number): string {
  return version.toFixed(2);
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Multi-line summary: header fields, master list with addressing indexes,
 * decode statistics and record counts by type (most frequent first).
 */
export function formatSummary(decoded: DecodedPlugin): string {
  const { header, stats } = decoded;
  const lines: string[] = [
    RULE,
    `Plugin Summary: ${header.fileName}`,
    RULE,
    `File type: ${pluginKind(header)}`,
    `Version: ${formatVersion(header.version)}`,
    `Localized: ${header.isLocalized}`,
    `Author: ${header.author}`,
    `Description: ${truncate(header.description, DESCRIPTION_LIMIT)}`,
    '',
    `Masters (${header.masters.length}):`,
    ...header.masters.map((master: string, i: number) => `  [${toHex(i, 2)}] ${master}`),
    `  [${toHex(header.masters.length, 2)}] ${header.fileName} (this file)`,
    '',
    'Record Statistics:',
    `  Total groups: ${stats.groupCount}`,
    `  Total records: ${stats.recordCount}`,
    `  Compressed records: ${stats.compressedCount}`,
    '',
    'Records by type:',
  ];

  const counts: [string, number][] = Array.from(stats.typeCounts).sort((a, b) => b[1] - a[1]);
  for (const [type, count] of counts) {
    lines.push(`  ${type}: ${count}`);
  }

  if (decoded.warnings.length > 0) {
    lines.push('', `Warnings: ${decoded.warnings.length}`);
  }
  if (!decoded.complete) {
    lines.push('Incomplete: the file ended inside a group or record');
  }

  return lines.join('\n');
}
