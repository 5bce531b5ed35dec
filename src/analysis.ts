/**
 * Per-record-type analyses. Pure functions of a decoded plugin.
 */

import type { DecodedPlugin } from './plugin-reader.js';
import type { PluginRecord } from './types/record.js';
import { hex8 } from './utils/hex.js';

/** Fields every item-like analysis row starts with. */
export interface RecordIdentity {
  readonly formId: string;
  readonly formIdResolved: string;
  readonly editorId: string;
  readonly fullName: string;
  readonly masterIndex: number;
  readonly isOverride: boolean;
  /** The master the record overrides, or this plugin for new records. */
  readonly overridesMaster: string;
  readonly keywords: readonly string[];
  readonly keywordFormIds: readonly string[];
}

export interface WeaponStats {
  readonly animationType?: number;
  readonly speed?: number;
  readonly reach?: number;
  readonly flags?: number;
  readonly sightFov?: number;
  readonly vatsHitChance?: number;
  readonly minRange?: number;
  readonly maxRange?: number;
  readonly stagger?: number;
}

export interface ValueWeight {
  readonly value?: number;
  readonly weight?: number;
}

export interface WeaponRow extends RecordIdentity {
  readonly flags: string;
  readonly dnam?: WeaponStats;
  readonly data?: ValueWeight;
  readonly instanceNaming?: string;
  readonly template?: string;
}

export interface AmmoData {
  readonly projectile?: string;
  readonly flags?: number;
  readonly damage?: number;
  readonly value?: number;
  readonly weight?: number;
}

export interface AmmoRow extends RecordIdentity {
  readonly data?: AmmoData;
}

export interface ArmorRow extends RecordIdentity {
  readonly armorRating?: number;
  readonly value?: number;
  readonly weight?: number;
}

export interface KeywordRow {
  readonly formId: string;
  readonly formIdResolved: string;
  readonly editorId: string;
  readonly masterIndex: number;
  readonly isNew: boolean;
  readonly source: string;
}

export interface PerkRow extends Omit<RecordIdentity, 'keywords' | 'keywordFormIds'> {
  readonly isTrait?: number;
  readonly level?: number;
  readonly numRanks?: number;
  readonly playable?: number;
  readonly hidden?: number;
}

export interface OverrideEntry {
  readonly type: string;
  readonly formId: string;
  readonly editorId: string;
  readonly fullName: string;
  readonly keywords: readonly string[];
}

export interface OverrideReport {
  /** Keyed by master file name. */
  readonly overrides: ReadonlyMap<string, readonly OverrideEntry[]>;
  /** Keyed by record type. */
  readonly newRecords: ReadonlyMap<string, readonly OverrideEntry[]>;
  /** Records addressed to a master this plugin does not declare. */
  readonly foreign: readonly OverrideEntry[];
}

export interface RecordRow {
  readonly type: string;
  readonly formId: string;
  readonly formIdResolved: string;
  readonly editorId: string;
  readonly fullName: string;
  readonly isOverride: boolean;
  readonly sourceMaster: string;
  readonly keywords: string;
  readonly flags: string;
  readonly compressed: boolean;
  readonly subrecordCount: number;
}

export type AnalysisRow = WeaponRow | AmmoRow | ArmorRow | KeywordRow | PerkRow | RecordRow;

/** First payload of a subrecord type, if any. */
export function firstField(record: PluginRecord, type: string): Buffer | undefined {
  return record.fields.get(type)?.[0];
}

function keywordNames(decoded: DecodedPlugin, record: PluginRecord): string[] {
  return record.keywords.map((keyword: number) => decoded.resolver.resolveName(keyword));
}

type BaseIdentity = Omit<RecordIdentity, 'keywords' | 'keywordFormIds'>;

function baseIdentity(decoded: DecodedPlugin, record: PluginRecord): BaseIdentity {
  const { resolver } = decoded;
  const resolved = resolver.resolve(record.formId);
  return {
    formId: hex8(record.formId),
    formIdResolved: resolver.format(record.formId),
    editorId: record.editorId,
    fullName: record.fullName,
    masterIndex: resolved.masterIndex,
    isOverride: resolved.origin === 'master',
    overridesMaster: resolver.sourceFile(record.formId),
  };
}

function identity(decoded: DecodedPlugin, record: PluginRecord): RecordIdentity {
  return {
    ...baseIdentity(decoded, record),
    keywords: keywordNames(decoded, record),
    keywordFormIds: record.keywords.map((keyword: number) => hex8(keyword)),
  };
}

function formIdReference(decoded: DecodedPlugin, data: Buffer | undefined): string | undefined {
  return data && data.length >= 4 ? decoded.resolver.format(data.readUInt32LE(0)) : undefined;
}

/**
 * Decodes a WEAP DNAM block. Each stat is present only when the payload is long enough.
 */
export function parseWeaponStats(data: Buffer): WeaponStats {
  return {
    ...(data.length >= 4 ? { animationType: data.readUInt32LE(0) } : {}),
    ...(data.length >= 8 ? { speed: data.readFloatLE(4) } : {}),
    ...(data.length >= 12 ? { reach: data.readFloatLE(8) } : {}),
    ...(data.length >= 16 ? { flags: data.readUInt16LE(12) } : {}),
    ...(data.length >= 28 ? { sightFov: data.readFloatLE(16) } : {}),
    ...(data.length >= 36 ? { vatsHitChance: data.readFloatLE(24) } : {}),
    ...(data.length >= 48 ? { minRange: data.readFloatLE(36) } : {}),
    ...(data.length >= 52 ? { maxRange: data.readFloatLE(40) } : {}),
    ...(data.length >= 60 ? { stagger: data.readFloatLE(56) } : {}),
  };
}

/** i32 value followed by f32 weight, as in WEAP and ARMO DATA. */
export function parseValueWeight(data: Buffer): ValueWeight {
  return {
    ...(data.length >= 4 ? { value: data.readInt32LE(0) } : {}),
    ...(data.length >= 8 ? { weight: data.readFloatLE(4) } : {}),
  };
}

export function parseAmmoData(data: Buffer): AmmoData {
  return {
    ...(data.length >= 4 ? { projectile: hex8(data.readUInt32LE(0)) } : {}),
    ...(data.length >= 8 ? { flags: data.readUInt32LE(4) } : {}),
    ...(data.length >= 12 ? { damage: data.readFloatLE(8) } : {}),
    ...(data.length >= 16 ? { value: data.readInt32LE(12) } : {}),
    ...(data.length >= 20 ? { weight: data.readFloatLE(16) } : {}),
  };
}

export function analyzeWeapons(decoded: DecodedPlugin): WeaponRow[] {
  return decoded.index.byType('WEAP').map((record: PluginRecord): WeaponRow => {
    const dnam: Buffer | undefined = firstField(record, 'DNAM');
    const data: Buffer | undefined = firstField(record, 'DATA');
    const instanceNaming: string | undefined = formIdReference(decoded, firstField(record, 'INRD'));
    const template: string | undefined = formIdReference(decoded, firstField(record, 'CNAM'));
    return {
      ...identity(decoded, record),
      flags: hex8(record.flags),
      ...(dnam ? { dnam: parseWeaponStats(dnam) } : {}),
      ...(data ? { data: parseValueWeight(data) } : {}),
      ...(instanceNaming !== undefined ? { instanceNaming } : {}),
      ...(template !== undefined ? { template } : {}),
    };
  });
}

export function analyzeAmmo(decoded: DecodedPlugin): AmmoRow[] {
  return decoded.index.byType('AMMO').map((record: PluginRecord): AmmoRow => {
    const data: Buffer | undefined = firstField(record, 'DATA');
    return {
      ...identity(decoded, record),
      ...(data ? { data: parseAmmoData(data) } : {}),
    };
  });
}

export function analyzeArmor(decoded: DecodedPlugin): ArmorRow[] {
  return decoded.index.byType('ARMO').map((record: PluginRecord): ArmorRow => {
    const dnam: Buffer | undefined = firstField(record, 'DNAM');
    const data: Buffer | undefined = firstField(record, 'DATA');
    return {
      ...identity(decoded, record),
      ...(dnam && dnam.length >= 4 ? { armorRating: dnam.readFloatLE(0) } : {}),
      ...(data ? parseValueWeight(data) : {}),
    };
  });
}

export function analyzeKeywords(decoded: DecodedPlugin): KeywordRow[] {
  const { resolver } = decoded;
  return decoded.index.byType('KYWD').map((record: PluginRecord): KeywordRow => {
    const resolved = resolver.resolve(record.formId);
    return {
      formId: hex8(record.formId),
      formIdResolved: resolver.format(record.formId),
      editorId: record.editorId,
      masterIndex: resolved.masterIndex,
      isNew: resolved.origin === 'self',
      source: resolver.sourceFile(record.formId),
    };
  });
}

export function analyzePerks(decoded: DecodedPlugin): PerkRow[] {
  return decoded.index.byType('PERK').map((record: PluginRecord): PerkRow => {
    const base: BaseIdentity = baseIdentity(decoded, record);
    const data: Buffer | undefined = firstField(record, 'DATA');
    if (!data || data.length < 5) {
      return base;
    }
    return {
      ...base,
      isTrait: data[0],
      level: data[1],
      numRanks: data[2],
      playable: data[3],
      hidden: data[4],
    };
  });
}

function overrideEntry(decoded: DecodedPlugin, record: PluginRecord): OverrideEntry {
  return {
    type: record.type,
    formId: hex8(record.formId),
    editorId: record.editorId,
    fullName: record.fullName,
    keywords: keywordNames(decoded, record),
  };
}

/**
 * Which records override a master's definitions and which are new here.
 */
export function analyzeOverrides(decoded: DecodedPlugin): OverrideReport {
  const partition = decoded.index.partitionOverrides(decoded.header.masters);
  const toEntries = (records: readonly PluginRecord[]): OverrideEntry[] =>
    records.map((record: PluginRecord) => overrideEntry(decoded, record));

  return {
    overrides: new Map(Array.from(partition.overrides, ([master, records]): [string, OverrideEntry[]] => [master, toEntries(records)])),
    newRecords: new Map(Array.from(partition.newRecords, ([type, records]): [string, OverrideEntry[]] => [type, toEntries(records)])),
    foreign: toEntries(partition.foreign),
  };
}

/**
 * Flat rows for any record type; `types` defaults to every type in the plugin.
 */
export function recordRows(decoded: DecodedPlugin, types?: readonly string[]): RecordRow[] {
  const { resolver } = decoded;
  const records: readonly PluginRecord[] = types
    ? types.flatMap((type: string) => decoded.index.byType(type))
    : decoded.index.records;

  return records.map((record: PluginRecord): RecordRow => ({
    type: record.type,
    formId: hex8(record.formId),
    formIdResolved: resolver.format(record.formId),
    editorId: record.editorId,
    fullName: record.fullName,
    isOverride: resolver.origin(record.formId) === 'master',
    sourceMaster: resolver.sourceFile(record.formId),
    keywords: keywordNames(decoded, record).join(' | '),
    flags: hex8(record.flags),
    compressed: record.isCompressed,
    subrecordCount: record.subrecords.length,
  }));
}

const ANALYSES: ReadonlyMap<string, (decoded: DecodedPlugin) => AnalysisRow[]> = new Map<string, (decoded: DecodedPlugin) => AnalysisRow[]>([
  ['WEAP', analyzeWeapons],
  ['AMMO', analyzeAmmo],
  ['ARMO', analyzeArmor],
  ['KYWD', analyzeKeywords],
  ['PERK', analyzePerks],
]);

export function hasSpecializedAnalysis(type: string): boolean {
  return ANALYSES.has(type);
}

/**
 * Rows for one record type: the specialized analysis when there is one, else generic rows.
 */
export function analysisFor(decoded: DecodedPlugin, type: string): AnalysisRow[] {
  const analysis = ANALYSES.get(type);
  return analysis ? analysis(decoded) : recordRows(decoded, [type]);
}
