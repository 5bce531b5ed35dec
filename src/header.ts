/**
 * TES4 file header decoding.
 */

import { MalformedHeaderError } from './errors.js';
import {
  ENVELOPE_SIZE,
  FLAG_LIGHT_MASTER,
  FLAG_LOCALIZED,
  FLAG_MASTER,
  HEADER_SIGNATURE,
} from './constants/record-flags.js';
import { splitSubrecords } from './record.js';
import type { SubrecordSplit } from './record.js';
import type { PluginHeader } from './types/plugin.js';
import type { ByteCursor } from './utils/byte-cursor.js';
import { decodeText, stripNul } from './utils/byte-cursor.js';

const HEDR_SIZE = 12;

interface HedrFields {
  readonly version: number;
  readonly recordCount: number;
  readonly nextObjectId: number;
}

function readHedr(data: Buffer): HedrFields {
  if (data.length < HEDR_SIZE) {
    throw new MalformedHeaderError(`HEDR field is ${data.length} bytes, expected ${HEDR_SIZE}`);
  }
  return {
    version: data.readFloatLE(0),
    recordCount: data.readInt32LE(4),
    nextObjectId: data.readUInt32LE(8),
  };
}

/**
 * Consumes the leading TES4 record and returns the plugin header.
 * The cursor is left at the first byte after the header record.
 *
 * @throws {MalformedHeaderError} If the file does not start with a usable TES4 record
 */
export function decodeHeader(cursor: ByteCursor, fileName: string): PluginHeader {
  if (cursor.remaining() < ENVELOPE_SIZE) {
    throw new MalformedHeaderError(`File too small to hold a ${HEADER_SIGNATURE} header: ${fileName}`);
  }

  const signature: string = cursor.readSignature();
  if (signature !== HEADER_SIGNATURE) {
    throw new MalformedHeaderError(`Expected ${HEADER_SIGNATURE} header in ${fileName}, got ${signature}`);
  }

  const dataSize: number = cursor.readU32();
  const flags: number = cursor.readU32();
  cursor.skip(12); // form id, timestamp, version info

  if (dataSize > cursor.remaining()) {
    throw new MalformedHeaderError(`${HEADER_SIGNATURE} data (${dataSize} bytes) extends beyond end of ${fileName}`);
  }

  const split: SubrecordSplit = splitSubrecords(cursor.readBytes(dataSize));
  if (split.overrun) {
    throw new MalformedHeaderError(`${HEADER_SIGNATURE} field data in ${fileName} overruns the header`);
  }

  const masters: string[] = [];
  let hedr: HedrFields | null = null;
  let author = '';
  let description = '';

  for (const { type, data } of split.subrecords) {
    switch (type) {
      case 'HEDR':
        hedr = readHedr(data);
        break;
      case 'MAST':
        masters.push(decodeText(stripNul(data)));
        break;
      case 'CNAM':
        author = decodeText(stripNul(data));
        break;
      case 'SNAM':
        description = decodeText(stripNul(data));
        break;
      default:
        // DATA (master file size), ONAM and anything newer are skipped by length.
        break;
    }
  }

  if (!hedr) {
    throw new MalformedHeaderError(`${HEADER_SIGNATURE} header in ${fileName} has no HEDR field`);
  }

  return {
    fileName,
    version: hedr.version,
    recordCount: hedr.recordCount,
    nextObjectId: hedr.nextObjectId,
    masters,
    isMaster: (flags & FLAG_MASTER) !== 0,
    isLightMaster: (flags & FLAG_LIGHT_MASTER) !== 0,
    isLocalized: (flags & FLAG_LOCALIZED) !== 0,
    author,
    description,
    flags,
  };
}
