/**
 * Sequential little-endian reader over an immutable plugin buffer.
 */

import { TextDecoder } from 'node:util';
import { OutOfBoundsError } from '../errors.js';

const SIGNATURE_SIZE = 4;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

function createLegacyDecoder(): TextDecoder | null {
  try {
    return new TextDecoder('windows-1252', { fatal: true });
  } catch {
    // Node builds without ICU data only know utf-8/utf-16le.
    return null;
  }
}

const legacyDecoder: TextDecoder | null = createLegacyDecoder();

/**
 * Decodes plugin text: UTF-8 first, then Windows-1252, then a hex dump.
 * Never throws.
 */
export function decodeText(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    if (legacyDecoder) {
      try {
        return legacyDecoder.decode(bytes);
      } catch {
        // Fall through to hex.
      }
    }
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
  }
}

/**
 * Trims a NUL-terminated field at its first NUL byte.
 */
export function stripNul(bytes: Uint8Array): Uint8Array {
  const end: number = bytes.indexOf(0);
  return end === -1 ? bytes : bytes.subarray(0, end);
}

/**
 * Renders a 4-byte signature. Non-ASCII bytes make it a hex string instead.
 */
export function decodeSignature(bytes: Uint8Array): string {
  for (const byte of bytes) {
    if (byte > 0x7f) {
      return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
    }
  }
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

/**
 * Bounds-checked cursor. All reads past the end throw {@link OutOfBoundsError};
 * callers check {@link ByteCursor.remaining} before reads sized by file data.
 */
export class ByteCursor {
  private readonly buffer: Buffer;
  private offset: number;

  constructor(buffer: Buffer, offset: number = 0) {
    this.buffer = buffer;
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.buffer.length;
  }

  remaining(): number {
    return this.buffer.length - this.offset;
  }

  hasData(): boolean {
    return this.offset < this.buffer.length;
  }

  readU8(): number {
    this.ensure(1);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readU16(): number {
    this.ensure(2);
    const value = this.buffer.readUInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  readU32(): number {
    this.ensure(4);
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readI32(): number {
    this.ensure(4);
    const value = this.buffer.readInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readF32(): number {
    this.ensure(4);
    const value = this.buffer.readFloatLE(this.offset);
    this.offset += 4;
    return value;
  }

  /**
   * Returns a view (not a copy) of the next `length` bytes.
   */
  readBytes(length: number): Buffer {
    this.ensure(length);
    const view = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return view;
  }

  /**
   * Reads a fixed-width text field, stopping at the first embedded NUL.
   */
  readFixedString(length: number): string {
    return decodeText(stripNul(this.readBytes(length)));
  }

  readSignature(): string {
    return decodeSignature(this.readBytes(SIGNATURE_SIZE));
  }

  /**
   * The next signature without consuming it, or null when fewer than 4 bytes remain.
   */
  peekSignature(): string | null {
    if (this.remaining() < SIGNATURE_SIZE) {
      return null;
    }
    return decodeSignature(this.buffer.subarray(this.offset, this.offset + SIGNATURE_SIZE));
  }

  skip(length: number): void {
    this.ensure(length);
    this.offset += length;
  }

  seek(position: number): void {
    if (position < 0 || position > this.buffer.length) {
      throw new OutOfBoundsError(this.offset, position - this.offset, this.remaining());
    }
    this.offset = position;
  }

  private ensure(length: number): void {
    if (length < 0 || length > this.remaining()) {
      throw new OutOfBoundsError(this.offset, length, this.remaining());
    }
  }
}
