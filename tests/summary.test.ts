import { describe, expect, it } from 'vitest';
import { FLAG_LIGHT_MASTER, FLAG_MASTER } from '../src/constants/record-flags.js';
import { PluginReader } from '../src/plugin-reader.js';
import { formatSummary, formatVersion, pluginKind } from '../src/summary.js';
import { edid, group, header, plugin, record } from './helpers/plugin-builder.js';

const RULE = '='.repeat(60);

function decodeFile(bytes: Buffer) {
  return PluginReader.decode({ buffer: bytes, fileName: 'Mod.esp' });
}

describe('pluginKind', () => {
  it('prefers ESM over ESL when both flags are set', () => {
    const both = decodeFile(header({ flags: FLAG_MASTER | FLAG_LIGHT_MASTER })).header;
    const light = decodeFile(header({ flags: FLAG_LIGHT_MASTER })).header;
    const plain = decodeFile(header()).header;
    expect([pluginKind(both), pluginKind(light), pluginKind(plain)]).toEqual(['ESM', 'ESL', 'ESP']);
  });
});

describe('formatVersion', () => {
  it('renders two decimals', () => {
    expect(formatVersion(1)).toBe('1.00');
    expect(formatVersion(0.95)).toBe('0.95');
  });
});

describe('formatSummary', () => {
  it('lists header facts, masters and records by type', () => {
    const decoded = decodeFile(plugin(
      header({ masters: ['Fallout4.esm'], author: 'Tester', description: 'x'.repeat(120) }),
      group('WEAP', [record('WEAP', 0x01000900, [edid('Gun')], { compress: true })]),
      group('KYWD', [
        record('KYWD', 0x01000800, [edid('First')]),
        record('KYWD', 0x01000801, [edid('Second')]),
      ]),
    ));

    expect(formatSummary(decoded)).toBe([
      RULE,
      'Plugin Summary: Mod.esp',
      RULE,
      'File type: ESP',
      'Version: 1.00',
      'Localized: false',
      'Author: Tester',
      `Description: ${'x'.repeat(100)}...`,
      '',
      'Masters (1):',
      '  [00] Fallout4.esm',
      '  [01] Mod.esp (this file)',
      '',
      'Record Statistics:',
      '  Total groups: 2',
      '  Total records: 3',
      '  Compressed records: 1',
      '',
      'Records by type:',
      '  KYWD: 2',
      '  WEAP: 1',
    ].join('\n'));
  });

  it('counts every record envelope by type, including filtered-out records', () => {
    const bytes = plugin(
      header(),
      record('GLOB', 0x00000800, [edid('Loose')]),
      group('KYWD', [record('KYWD', 0x00000801, [edid('Kw')])]),
    );
    const decoded = PluginReader.decode({ buffer: bytes, fileName: 'Mod.esp', recordTypes: ['KYWD'] });
    const lines = formatSummary(decoded).split('\n');
    expect(lines.slice(-5)).toEqual(['  Compressed records: 0', '', 'Records by type:', '  GLOB: 1', '  KYWD: 1']);
    expect(lines).toContain('  Total records: 2');
  });

  it('reports warnings and an incomplete decode at the end', () => {
    const full = plugin(header(), group('KYWD', [record('KYWD', 0x00000800, [edid('Only')])]));
    const lines = formatSummary(decodeFile(full.subarray(0, full.length - 2))).split('\n');
    expect(lines.slice(-3)).toEqual(['', 'Warnings: 2', 'Incomplete: the file ended inside a group or record']);
  });
});
