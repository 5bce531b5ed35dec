/**
 * GRUP container traversal.
 *
 * Walks nested groups with an explicit stack of content ends, so nesting depth
 * is bounded only by the buffer. Each group's declared size is authoritative:
 * the walker never reads past a group's content end.
 */

import {
  ENVELOPE_SIZE,
  GROUP_SIGNATURE,
  TOP_LEVEL_GROUP,
} from './constants/record-flags.js';
import { decodeRecord } from './record.js';
import type { RecordDecodeResult } from './record.js';
import type { DecodeStats, DecodeWarning } from './types/decode.js';
import type { PluginRecord } from './types/record.js';
import type { ByteCursor } from './utils/byte-cursor.js';
import { decodeSignature } from './utils/byte-cursor.js';

export type WalkerState = 'descending' | 'at-boundary' | 'done';

export interface WalkOptions {
  /**
   * Record types to keep. Top-level groups labelled with any other type are
   * skipped without being parsed. Null or empty keeps everything.
   */
  readonly recordTypes?: ReadonlySet<string> | null;
}

export interface WalkSink {
  onRecord(record: PluginRecord): void;
  onWarning(warning: DecodeWarning): void;
}

export interface WalkResult extends DecodeStats {
  /** False when the buffer ended inside a group or record. */
  readonly complete: boolean;
}

/**
 * Envelope of a GRUP container, as read from the file.
 */
export interface GroupEnvelope {
  readonly offset: number;
  readonly size: number;
  readonly label: string;
  readonly groupType: number;
  readonly timestamp: number;
  readonly versionInfo: number;
  /** `offset + size`: the first byte after the group's content. */
  readonly contentEnd: number;
}

interface OpenGroup {
  readonly end: number;
  /** Inside a top-level group the interest set accepted. */
  readonly accepted: boolean;
}

/**
 * Reads a GRUP envelope at the cursor. The caller checks that 24 bytes remain.
 */
export function readGroupEnvelope(cursor: ByteCursor): GroupEnvelope {
  const offset: number = cursor.position;
  cursor.skip(4); // GRUP
  const size: number = cursor.readU32();
  const label: string = decodeSignature(cursor.readBytes(4));
  const groupType: number = cursor.readI32();
  const timestamp: number = cursor.readU32();
  const versionInfo: number = cursor.readU32();
  return { offset, size, label, groupType, timestamp, versionInfo, contentEnd: offset + size };
}

/**
 * Decodes every group and record from the cursor position to the end of the
 * buffer, handing kept records and isolated anomalies to `sink`.
 */
export function walkGroups(cursor: ByteCursor, options: WalkOptions, sink: WalkSink): WalkResult {
  const filter: ReadonlySet<string> | null = options.recordTypes && options.recordTypes.size > 0 ? options.recordTypes : null;
  const stack: OpenGroup[] = [];
  let groupCount = 0;
  let recordCount = 0;
  let compressedCount = 0;
  const typeCounts = new Map<string, number>();
  let complete = true;

  for (;;) {
    const parent: OpenGroup | undefined = stack[stack.length - 1];
    const limit: number = parent ? parent.end : cursor.length;
    const state: WalkerState = cursor.position < limit ? 'descending' : parent ? 'at-boundary' : 'done';

    if (state === 'done') {
      break;
    }
    if (state === 'at-boundary') {
      stack.pop();
      continue;
    }

    const available: number = limit - cursor.position;
    if (available < 4) {
      // Padding too short to hold a signature.
      cursor.seek(limit);
      continue;
    }

    if (cursor.peekSignature() !== GROUP_SIGNATURE) {
      const result: RecordDecodeResult = decodeRecord(cursor, limit);
      result.warnings.forEach((warning: DecodeWarning) => sink.onWarning(warning));
      if (result.envelopeRead) {
        recordCount += 1;
      }
      if (result.type !== null) {
        typeCounts.set(result.type, (typeCounts.get(result.type) ?? 0) + 1);
      }
      if (result.truncated) {
        complete = false;
      }
      if (result.record) {
        if (result.record.isCompressed) {
          compressedCount += 1;
        }
        const keep: boolean = !filter || (parent?.accepted ?? false) || filter.has(result.record.type);
        if (keep) {
          sink.onRecord(result.record);
        }
      }
      continue;
    }

    if (available < ENVELOPE_SIZE) {
      const truncated: boolean = limit >= cursor.length;
      sink.onWarning({
        kind: truncated ? 'truncated-file' : 'malformed-group',
        message: `${available} trailing bytes are too short for a ${GROUP_SIGNATURE} envelope`,
        offset: cursor.position,
        signature: GROUP_SIGNATURE,
      });
      if (truncated) {
        complete = false;
      }
      cursor.seek(limit);
      continue;
    }

    const group: GroupEnvelope = readGroupEnvelope(cursor);
    groupCount += 1;
    let end: number = group.contentEnd;

    if (group.size < ENVELOPE_SIZE) {
      sink.onWarning({
        kind: 'malformed-group',
        message: `${GROUP_SIGNATURE} ${group.label} declares size ${group.size}, smaller than its envelope`,
        offset: group.offset,
        signature: GROUP_SIGNATURE,
      });
      end = cursor.position;
    } else if (end > limit) {
      const truncated: boolean = end > cursor.length;
      sink.onWarning({
        kind: truncated ? 'truncated-file' : 'container-overrun',
        message: `${GROUP_SIGNATURE} ${group.label} declares ${group.size} bytes, past ${truncated ? 'the end of the file' : 'its parent group'}`,
        offset: group.offset,
        signature: GROUP_SIGNATURE,
      });
      if (truncated) {
        complete = false;
      }
      end = limit;
    }

    const isTopLevel: boolean = group.groupType === TOP_LEVEL_GROUP;
    if (filter && isTopLevel && !filter.has(group.label)) {
      cursor.skip(end - cursor.position);
      continue;
    }

    stack.push({
      end,
      accepted: (parent?.accepted ?? false) || (filter !== null && isTopLevel),
    });
  }

  return { groupCount, recordCount, compressedCount, typeCounts, complete };
}
