/**
 * Plugin file reader: decodes an .esp/.esm/.esl without loading its masters.
 */
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { DecoderError, MalformedHeaderError } from './errors.js';
import { FormIdResolver } from './form-id.js';
import { decodeHeader } from './header.js';
import { walkGroups } from './group-walker.js';
import type { WalkResult } from './group-walker.js';
import { PluginIndex } from './plugin-index.js';
import type { DecodeStats, DecodeWarning } from './types/decode.js';
import type { PluginHeader } from './types/plugin.js';
import type { PluginRecord } from './types/record.js';
import { ByteCursor } from './utils/byte-cursor.js';
import logger from './utils/logger.js';

/**
 * Result of decoding one plugin. Always a best-effort tree: anomalies confined
 * to single records or groups are reported in `warnings`.
 */
export interface DecodedPlugin {
  readonly header: PluginHeader;
  readonly index: PluginIndex;
  readonly resolver: FormIdResolver;
  readonly stats: DecodeStats;
  readonly warnings: readonly DecodeWarning[];
  /** False when the file ended inside a group or record. */
  readonly complete: boolean;
}

export interface DecodeOptions {
  readonly buffer: Buffer;
  readonly fileName: string;
  /** Record types to keep; others' top-level groups are skipped unparsed. */
  readonly recordTypes?: Iterable<string> | null;
}

function toTypeSet(recordTypes: Iterable<string> | null | undefined): ReadonlySet<string> | null {
  if (!recordTypes) {
    return null;
  }
  const set = new Set<string>(recordTypes);
  return set.size > 0 ? set : null;
}

/**
 * Plugin decoding entry points.
 */
export class PluginReader {
  /** Error raised when the TES4 header is unusable. */
  static readonly Error: typeof MalformedHeaderError = MalformedHeaderError;

  /**
   * Reads a whole plugin file from disk and decodes it.
   *
   * @throws {MalformedHeaderError} If the file does not start with a valid TES4 header
   * @throws {DecoderError} If the file cannot be read
   */
  static async read({ filePath, recordTypes }: { readonly filePath: string; readonly recordTypes?: Iterable<string> | null }): Promise<DecodedPlugin> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new DecoderError(
        `Failed to read plugin "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    return PluginReader.decode({ buffer, fileName: basename(filePath), recordTypes });
  }

  /**
   * Decodes a plugin already held in memory. Synchronous; the buffer is never modified.
   *
   * @throws {MalformedHeaderError} If the buffer does not start with a valid TES4 header
   */
  static decode({ buffer, fileName, recordTypes }: DecodeOptions): DecodedPlugin {
    const cursor = new ByteCursor(buffer);
    const header: PluginHeader = decodeHeader(cursor, fileName);
    const index = new PluginIndex();
    const warnings: DecodeWarning[] = [];

    logger.debug(`Decoding ${fileName}`, { version: header.version, masters: header.masters.length });

    const result: WalkResult = walkGroups(cursor, { recordTypes: toTypeSet(recordTypes) }, {
      onRecord: (record: PluginRecord) => index.add(record),
      onWarning: (warning: DecodeWarning) => {
        warnings.push(warning);
        logger.debug(`${fileName}: ${warning.message}`, { kind: warning.kind, offset: warning.offset });
      },
    });

    if (!result.complete) {
      logger.warn(`${fileName} is truncated; decoded ${index.size} records before the end of the file`);
    }

    return {
      header,
      index,
      resolver: new FormIdResolver(header, index),
      stats: {
        groupCount: result.groupCount,
        recordCount: result.recordCount,
        compressedCount: result.compressedCount,
        typeCounts: result.typeCounts,
      },
      warnings,
      complete: result.complete,
    };
  }
}
