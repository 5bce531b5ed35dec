import { describe, expect, it } from 'vitest';
import { OutOfBoundsError } from '../src/errors.js';
import { ByteCursor, decodeSignature, decodeText } from '../src/utils/byte-cursor.js';

describe('ByteCursor primitives', () => {
  it('reads little-endian integers in sequence', () => {
    const cursor = new ByteCursor(Buffer.from([0x01, 0x02, 0x01, 0x04, 0x03, 0x02, 0x01, 0xff, 0xff, 0xff, 0xff]));
    expect(cursor.readU8()).toBe(1);
    expect(cursor.readU16()).toBe(0x0102);
    expect(cursor.readU32()).toBe(0x01020304);
    expect(cursor.readI32()).toBe(-1);
    expect(cursor.remaining()).toBe(0);
    expect(cursor.hasData()).toBe(false);
  });

  it('reads floats', () => {
    const buffer = Buffer.alloc(4);
    buffer.writeFloatLE(1.5, 0);
    expect(new ByteCursor(buffer).readF32()).toBe(1.5);
  });

  it('throws OutOfBoundsError without moving on an over-long read', () => {
    const cursor = new ByteCursor(Buffer.from([1, 2]));
    expect(() => cursor.readU32()).toThrow(OutOfBoundsError);
    expect(cursor.position).toBe(0);
    expect(() => cursor.skip(3)).toThrow(OutOfBoundsError);
    expect(() => cursor.readBytes(-1)).toThrow(OutOfBoundsError);
  });

  it('returns views without copying or mutating the buffer', () => {
    const buffer = Buffer.from([9, 8, 7, 6]);
    const cursor = new ByteCursor(buffer);
    cursor.skip(1);
    const view = cursor.readBytes(2);
    expect(Array.from(view)).toEqual([8, 7]);
    expect(view.buffer).toBe(buffer.buffer);
    expect(cursor.position).toBe(3);
  });

  it('stops fixed strings at the first NUL but consumes the full width', () => {
    const cursor = new ByteCursor(Buffer.from('Hello\0World', 'latin1'));
    expect(cursor.readFixedString(11)).toBe('Hello');
    expect(cursor.position).toBe(11);
  });

  it('peeks signatures without consuming them', () => {
    const cursor = new ByteCursor(Buffer.from('GRUPxyz', 'latin1'));
    expect(cursor.peekSignature()).toBe('GRUP');
    expect(cursor.position).toBe(0);
    expect(cursor.readSignature()).toBe('GRUP');
    expect(cursor.peekSignature()).toBeNull();
  });

  it('seeks within bounds only', () => {
    const cursor = new ByteCursor(Buffer.alloc(8));
    cursor.seek(8);
    expect(cursor.remaining()).toBe(0);
    expect(() => cursor.seek(9)).toThrow(OutOfBoundsError);
  });
});

describe('text decoding', () => {
  it('decodes UTF-8', () => {
    expect(decodeText(Buffer.from('Épée', 'utf8'))).toBe('Épée');
  });

  it('falls back to Windows-1252 for invalid UTF-8', () => {
    expect(decodeText(Buffer.from([0x43, 0x61, 0x66, 0xe9]))).toBe('Café');
    expect(decodeText(Buffer.from([0x93, 0x48, 0x69, 0x94]))).toBe('“Hi”');
  });

  it('renders non-ASCII signatures as hex', () => {
    expect(decodeSignature(Buffer.from([0xff, 0x00, 0x41, 0x42]))).toBe('ff004142');
    expect(decodeSignature(Buffer.from('NPC_', 'latin1'))).toBe('NPC_');
  });
});
