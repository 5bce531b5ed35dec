/**
 * Record decoding: envelope, optional payload decompression, subrecord split
 * and interpretation of the common subrecords.
 */

import { inflateRawSync, inflateSync } from 'node:zlib';
import { DecoderError } from './errors.js';
import {
  ENVELOPE_SIZE,
  FLAG_COMPRESSED,
  OVERSIZE_SIGNATURE,
  SUBRECORD_HEADER_SIZE,
} from './constants/record-flags.js';
import type { DecodeWarning } from './types/decode.js';
import type { DisplayName, PluginRecord, Subrecord } from './types/record.js';
import type { ByteCursor } from './utils/byte-cursor.js';
import { decodeSignature, decodeText, stripNul } from './utils/byte-cursor.js';
import { hex8 } from './utils/hex.js';

const LOCALIZED_NAME_SIZE = 4;

export interface SubrecordSplit {
  readonly subrecords: Subrecord[];
  /** True when a declared size ran past the payload and splitting stopped early. */
  readonly overrun: boolean;
}

export interface RecordDecodeResult {
  /** Null when the record could not be read at all. */
  readonly record: PluginRecord | null;
  readonly warnings: DecodeWarning[];
  /** The buffer ended inside this record; nothing after it can be decoded. */
  readonly truncated: boolean;
  /** A full 24-byte envelope was read. */
  readonly envelopeRead: boolean;
  /** Signature from the envelope, when one was read. */
  readonly type: string | null;
}

/**
 * Fields derived from the common subrecords.
 */
export interface InterpretedFields {
  readonly fields: Map<string, Buffer[]>;
  readonly editorId: string;
  readonly fullName: string;
  readonly displayName: DisplayName | null;
  readonly keywordCount: number | null;
  readonly keywords: number[];
}

function hasZlibHeader(stream: Buffer): boolean {
  if (stream.length < 2) {
    return false;
  }
  const cmf: number = stream[0];
  const flg: number = stream[1];
  return (cmf & 0x0f) === 8 && ((cmf << 8) | flg) % 31 === 0;
}

/**
 * Inflates a compressed record payload: u32 uncompressed size followed by the
 * DEFLATE stream. The result must be exactly the declared size.
 *
 * @throws {DecoderError} If the stream is corrupt or inflates to a different size
 */
export function inflatePayload(payload: Buffer): Buffer {
  if (payload.length < 4) {
    throw new DecoderError(`Compressed payload is ${payload.length} bytes, too short for a size prefix`);
  }
  const expectedSize: number = payload.readUInt32LE(0);
  const stream: Buffer = payload.subarray(4);
  const options = { maxOutputLength: Math.max(expectedSize, 1) };

  const inflaters = hasZlibHeader(stream) ? [inflateSync, inflateRawSync] : [inflateRawSync, inflateSync];
  let inflated: Buffer | null = null;
  let failure: unknown = null;
  for (const inflate of inflaters) {
    try {
      inflated = inflate(stream, options);
      break;
    } catch (error) {
      // Raw streams can pass the header check; try the other format.
      if (failure === null) {
        failure = error;
      }
    }
  }

  if (inflated === null) {
    throw new DecoderError(
      `Inflate failed (expected ${expectedSize} bytes): ${failure instanceof Error ? failure.message : String(failure)}`,
      failure
    );
  }

  if (inflated.length !== expectedSize) {
    throw new DecoderError(`Inflated ${inflated.length} bytes, expected ${expectedSize}`);
  }
  return inflated;
}

/**
 * Splits a (decompressed) record payload into subrecords.
 * An XXXX field carries a u32 size for the next subrecord only.
 */
export function splitSubrecords(payload: Buffer): SubrecordSplit {
  const subrecords: Subrecord[] = [];
  let offset = 0;
  let oversize: number | null = null;

  while (payload.length - offset >= SUBRECORD_HEADER_SIZE) {
    const type: string = decodeSignature(payload.subarray(offset, offset + 4));
    let size: number = payload.readUInt16LE(offset + 4);
    offset += SUBRECORD_HEADER_SIZE;

    if (type === OVERSIZE_SIGNATURE) {
      if (payload.length - offset < 4) {
        return { subrecords, overrun: true };
      }
      oversize = payload.readUInt32LE(offset);
      offset += 4;
      continue;
    }

    if (oversize !== null) {
      size = oversize;
      oversize = null;
    }

    if (size > payload.length - offset) {
      return { subrecords, overrun: true };
    }

    subrecords.push({ type, data: payload.subarray(offset, offset + size) });
    offset += size;
  }

  return { subrecords, overrun: false };
}

/**
 * Interprets EDID, FULL, KSIZ and KWDA and files every subrecord by type.
 */
export function interpretSubrecords(subrecords: readonly Subrecord[]): InterpretedFields {
  const fields = new Map<string, Buffer[]>();
  let editorId = '';
  let displayName: DisplayName | null = null;
  let keywordCount: number | null = null;
  let keywords: number[] = [];

  for (const { type, data } of subrecords) {
    switch (type) {
      case 'EDID':
        editorId = decodeText(stripNul(data));
        break;
      case 'FULL':
        displayName = data.length === LOCALIZED_NAME_SIZE
          ? { kind: 'localized', stringId: data.readUInt32LE(0) }
          : { kind: 'text', text: decodeText(stripNul(data)) };
        break;
      case 'KSIZ':
        if (data.length >= 4) {
          keywordCount = data.readUInt32LE(0);
        }
        break;
      case 'KWDA':
        keywords = [];
        for (let i = 0; i + 4 <= data.length; i += 4) {
          keywords.push(data.readUInt32LE(i));
        }
        break;
      default:
        break;
    }

    const existing: Buffer[] | undefined = fields.get(type);
    if (existing) {
      existing.push(data);
    } else {
      fields.set(type, [data]);
    }
  }

  return { fields, editorId, fullName: renderDisplayName(displayName), displayName, keywordCount, keywords };
}

export function renderDisplayName(name: DisplayName | null): string {
  if (!name) {
    return '';
  }
  return name.kind === 'localized' ? `[LSTRING:${hex8(name.stringId)}]` : name.text;
}

/**
 * Reads one record starting at the cursor, never consuming past `limit`
 * (the innermost container end, or the buffer end at top level).
 */
export function decodeRecord(cursor: ByteCursor, limit: number): RecordDecodeResult {
  const offset: number = cursor.position;
  const available: number = limit - offset;
  const atBufferEnd: boolean = limit >= cursor.length;

  if (available < ENVELOPE_SIZE) {
    cursor.seek(limit);
    return {
      record: null,
      truncated: atBufferEnd,
      envelopeRead: false,
      type: null,
      warnings: [{
        kind: atBufferEnd ? 'truncated-file' : 'container-overrun',
        message: `${available} trailing bytes are too short for a record envelope`,
        offset,
      }],
    };
  }

  const type: string = cursor.readSignature();
  const dataSize: number = cursor.readU32();
  const flags: number = cursor.readU32();
  const formId: number = cursor.readU32();
  const timestamp: number = cursor.readU32();
  const versionInfo: number = cursor.readU32();

  if (dataSize > cursor.remaining()) {
    cursor.seek(cursor.length);
    return {
      record: null,
      truncated: true,
      envelopeRead: true,
      type,
      warnings: [{
        kind: 'truncated-file',
        message: `${type} ${hex8(formId)} declares ${dataSize} bytes but only ${cursor.length - offset - ENVELOPE_SIZE} remain`,
        offset,
        signature: type,
        formId,
      }],
    };
  }

  if (dataSize > limit - cursor.position) {
    cursor.seek(limit);
    return {
      record: null,
      truncated: false,
      envelopeRead: true,
      type,
      warnings: [{
        kind: 'container-overrun',
        message: `${type} ${hex8(formId)} declares ${dataSize} bytes, past the end of its group`,
        offset,
        signature: type,
        formId,
      }],
    };
  }

  let payload: Buffer = cursor.readBytes(dataSize);
  const isCompressed: boolean = (flags & FLAG_COMPRESSED) !== 0;
  const warnings: DecodeWarning[] = [];
  let error: string | undefined;

  if (isCompressed) {
    try {
      payload = inflatePayload(payload);
    } catch (inflateError) {
      error = inflateError instanceof Error ? inflateError.message : String(inflateError);
      payload = Buffer.alloc(0);
      warnings.push({
        kind: 'decompression-failure',
        message: `${type} ${hex8(formId)}: ${error}`,
        offset,
        signature: type,
        formId,
      });
    }
  }

  const split: SubrecordSplit = splitSubrecords(payload);
  if (split.overrun) {
    warnings.push({
      kind: 'subrecord-overrun',
      message: `${type} ${hex8(formId)}: subrecord data runs past the payload after ${split.subrecords.length} fields`,
      offset,
      signature: type,
      formId,
    });
  }

  const interpreted: InterpretedFields = interpretSubrecords(split.subrecords);
  const record: PluginRecord = {
    type,
    dataSize,
    flags,
    formId,
    timestamp,
    versionInfo,
    isCompressed,
    offset,
    subrecords: split.subrecords,
    ...interpreted,
    ...(error !== undefined ? { error } : {}),
  };

  return { record, warnings, truncated: false, envelopeRead: true, type };
}
