import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BATCH_RESULTS_FILE } from '../src/batch.js';
import { batchCommand, decodeCommand, expandRecordTypes } from '../src/commands.js';
import { PluginReader } from '../src/plugin-reader.js';
import { formatSummary } from '../src/summary.js';
import { edid, group, header, keywords, plugin, record } from './helpers/plugin-builder.js';

const bytes = plugin(
  header(),
  group('KYWD', [record('KYWD', 0x00000800, [edid('ModKeyword')])]),
  group('GLOB', [record('GLOB', 0x00000801, [edid('Setting')])]),
  group('WEAP', [record('WEAP', 0x00000900, [edid('Gun'), ...keywords([0x00000800])])]),
);

describe('expandRecordTypes', () => {
  it('returns null when nothing is requested', () => {
    expect(expandRecordTypes(undefined)).toBeNull();
    expect(expandRecordTypes([])).toBeNull();
  });

  it('adds KYWD for types that carry keywords', () => {
    expect(Array.from(expandRecordTypes(['WEAP']) ?? [])).toEqual(['WEAP', 'KYWD']);
    expect(Array.from(expandRecordTypes(['GLOB']) ?? [])).toEqual(['GLOB']);
  });
});

describe('commands', () => {
  let dir = '';
  let file = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'esp-decoder-commands-'));
    file = join(dir, 'Mod.esp');
    await writeFile(file, bytes);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the summary by default', async () => {
    const expected = formatSummary(PluginReader.decode({ buffer: bytes, fileName: 'Mod.esp' }));
    expect(await decodeCommand(file, {})).toBe(expected);
    expect(await decodeCommand(file, { summary: true })).toBe(expected);
  });

  it('writes the analysis of the requested types as CSV with keyword names resolved', async () => {
    const csvPath = join(dir, 'weapons.csv');
    expect(await decodeCommand(file, { type: ['WEAP'], csv: csvPath })).toBeNull();
    expect(await readFile(csvPath, 'utf8')).toBe([
      'formId,formIdResolved,editorId,fullName,masterIndex,isOverride,overridesMaster,keywords,keywordFormIds,flags',
      '00000900,Mod.esp|000900,Gun,,0,false,Mod.esp,ModKeyword,00000800,00000000',
      '',
    ].join('\r\n'));
  });

  it('writes JSON for every type with a specialized analysis when no type is given', async () => {
    const jsonPath = join(dir, 'mod.json');
    expect(await decodeCommand(file, { json: jsonPath })).toBeNull();
    const document: unknown = JSON.parse(await readFile(jsonPath, 'utf8'));
    expect(document).toMatchObject({ file: 'Mod.esp', kind: 'ESP', complete: true });
    expect(document).toHaveProperty('records.KYWD');
    expect(document).toHaveProperty('records.WEAP');
    expect(document).not.toHaveProperty('records.GLOB');
  });

  it('writes the batch results into the dump directory', async () => {
    const outputDir = join(dir, 'results');
    const rows = await batchCommand(dir, { dump: outputDir });
    expect(rows.map((row) => row.file)).toEqual(['Mod.esp']);
    const csv = await readFile(join(outputDir, BATCH_RESULTS_FILE), 'utf8');
    expect(csv.split('\r\n')[1].startsWith('Mod.esp,')).toBe(true);
  });
});
