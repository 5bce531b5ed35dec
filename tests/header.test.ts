import { describe, expect, it } from 'vitest';
import { MalformedHeaderError } from '../src/errors.js';
import { decodeHeader } from '../src/header.js';
import { PluginReader } from '../src/plugin-reader.js';
import { ByteCursor } from '../src/utils/byte-cursor.js';
import { edid, field, group, header, plugin, record, sig, u16, u32 } from './helpers/plugin-builder.js';

function oversizedOnam(size: number): Buffer {
  return Buffer.concat([field('XXXX', u32(size)), sig('ONAM'), u16(0), Buffer.alloc(size, 0xff)]);
}

describe('decodeHeader', () => {
  it('reads HEDR, masters in order, author, description and flags', () => {
    const bytes = header({
      masters: ['Fallout4.esm', 'DLCRobot.esm'],
      version: 1.0,
      recordCount: 42,
      nextObjectId: 0x1234,
      flags: 0x1 | 0x40,
      author: 'Tester',
      description: 'Weapon tweaks',
    });
    const cursor = new ByteCursor(bytes);
    const decoded = decodeHeader(cursor, 'Tweaks.esp');

    expect(decoded).toEqual({
      fileName: 'Tweaks.esp',
      version: 1,
      recordCount: 42,
      nextObjectId: 0x1234,
      masters: ['Fallout4.esm', 'DLCRobot.esm'],
      isMaster: true,
      isLightMaster: false,
      isLocalized: true,
      author: 'Tester',
      description: 'Weapon tweaks',
      flags: 0x41,
    });
    expect(cursor.position).toBe(bytes.length);
  });

  it('flags light masters', () => {
    const decoded = decodeHeader(new ByteCursor(header({ flags: 0x200 })), 'Light.esl');
    expect(decoded.isLightMaster).toBe(true);
    expect(decoded.isMaster).toBe(false);
    expect(decoded.masters).toEqual([]);
  });

  it('skips unknown header fields by length', () => {
    const bytes = header({ masters: ['A.esm'], extraFields: [field('INTV', u32(7)), field('ONAM', Buffer.alloc(12))] });
    const cursor = new ByteCursor(bytes);
    expect(decodeHeader(cursor, 'x.esp').masters).toEqual(['A.esm']);
    expect(cursor.position).toBe(bytes.length);
  });

  it('applies an XXXX size to the following header field', () => {
    const bytes = header({ masters: ['Fallout4.esm'], extraFields: [oversizedOnam(70000)] });
    const cursor = new ByteCursor(bytes);
    expect(decodeHeader(cursor, 'Big.esm').masters).toEqual(['Fallout4.esm']);
    expect(cursor.position).toBe(bytes.length);
  });

  it('decodes the records after a header with an oversized field', () => {
    const bytes = plugin(
      header({ masters: ['Fallout4.esm'], extraFields: [oversizedOnam(70000)] }),
      group('KYWD', [record('KYWD', 0x01000800, [edid('Kw')])]),
    );
    const decoded = PluginReader.decode({ buffer: bytes, fileName: 'Big.esm' });
    expect(decoded.header.masters).toEqual(['Fallout4.esm']);
    expect(decoded.index.records.map((r) => r.editorId)).toEqual(['Kw']);
    expect(decoded.warnings).toEqual([]);
  });

  it('rejects a header field that runs past the header data', () => {
    const bytes = header({ extraFields: [Buffer.concat([sig('ONAM'), u16(50), Buffer.alloc(10)])] });
    expect(() => decodeHeader(new ByteCursor(bytes), 'bad.esp')).toThrow(/overruns the header/);
  });

  it('rejects files that do not start with TES4', () => {
    const bytes = record('GRUP', 0, []);
    expect(() => decodeHeader(new ByteCursor(bytes), 'bad.esp')).toThrow(MalformedHeaderError);
    expect(() => decodeHeader(new ByteCursor(Buffer.from('TES4')), 'tiny.esp')).toThrow(MalformedHeaderError);
  });

  it('rejects a header without HEDR', () => {
    expect(() => decodeHeader(new ByteCursor(header({ omitHedr: true })), 'nohedr.esp')).toThrow(/no HEDR/);
  });

  it('rejects a header whose data runs past the file', () => {
    const bytes = header().subarray(0, 30);
    expect(() => decodeHeader(new ByteCursor(bytes), 'cut.esp')).toThrow(MalformedHeaderError);
  });
});
