/**
 * Builds plugin bytes in memory for tests.
 */
import { deflateSync } from 'node:zlib';

export const COMPRESSED = 0x00040000;

export function u16(value: number): Buffer {
  const buffer = Buffer.alloc(2);
  buffer.writeUInt16LE(value, 0);
  return buffer;
}

export function u32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(value >>> 0, 0);
  return buffer;
}

export function i32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeInt32LE(value, 0);
  return buffer;
}

export function f32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeFloatLE(value, 0);
  return buffer;
}

export function zstring(text: string): Buffer {
  return Buffer.concat([Buffer.from(text, 'utf8'), Buffer.from([0])]);
}

export function sig(type: string): Buffer {
  return Buffer.from(type, 'latin1');
}

/** One subrecord with a u16 size. */
export function field(type: string, data: Buffer): Buffer {
  return Buffer.concat([sig(type), u16(data.length), data]);
}

export interface RecordOptions {
  readonly flags?: number;
  /** Store the payload compressed. */
  readonly compress?: boolean;
  /** Override the stored uncompressed-size hint. */
  readonly sizeHint?: number;
  /** Override the declared payload size in the envelope. */
  readonly declaredSize?: number;
}

export function record(type: string, formId: number, fields: readonly Buffer[], options: RecordOptions = {}): Buffer {
  const raw: Buffer = Buffer.concat(fields);
  let flags: number = options.flags ?? 0;
  let payload: Buffer = raw;
  if (options.compress) {
    flags |= COMPRESSED;
    payload = Buffer.concat([u32(options.sizeHint ?? raw.length), deflateSync(raw)]);
  }
  return Buffer.concat([
    sig(type),
    u32(options.declaredSize ?? payload.length),
    u32(flags),
    u32(formId),
    u32(0),
    u32(0),
    payload,
  ]);
}

export function group(label: string, children: readonly Buffer[], groupType: number = 0, declaredSize?: number): Buffer {
  const content: Buffer = Buffer.concat(children);
  const labelBytes: Buffer = groupType === 0 ? sig(label) : u32(Number.parseInt(label, 16));
  return Buffer.concat([
    sig('GRUP'),
    u32(declaredSize ?? content.length + 24),
    labelBytes,
    i32(groupType),
    u32(0),
    u32(0),
    content,
  ]);
}

export interface HeaderOptions {
  readonly masters?: readonly string[];
  readonly version?: number;
  readonly recordCount?: number;
  readonly nextObjectId?: number;
  readonly flags?: number;
  readonly author?: string;
  readonly description?: string;
  /** Extra fields appended after the standard ones. */
  readonly extraFields?: readonly Buffer[];
  /** Leave out HEDR. */
  readonly omitHedr?: boolean;
}

export function header(options: HeaderOptions = {}): Buffer {
  const fields: Buffer[] = [];
  if (!options.omitHedr) {
    fields.push(field('HEDR', Buffer.concat([
      f32(options.version ?? 1.0),
      i32(options.recordCount ?? 0),
      u32(options.nextObjectId ?? 0x800),
    ])));
  }
  if (options.author !== undefined) {
    fields.push(field('CNAM', zstring(options.author)));
  }
  if (options.description !== undefined) {
    fields.push(field('SNAM', zstring(options.description)));
  }
  for (const master of options.masters ?? []) {
    fields.push(field('MAST', zstring(master)));
    fields.push(field('DATA', Buffer.alloc(8)));
  }
  fields.push(...(options.extraFields ?? []));
  return record('TES4', 0, fields, { flags: options.flags ?? 0 });
}

export function plugin(headerBytes: Buffer, ...entries: readonly Buffer[]): Buffer {
  return Buffer.concat([headerBytes, ...entries]);
}

export function edid(text: string): Buffer {
  return field('EDID', zstring(text));
}

export function keywords(formIds: readonly number[]): Buffer[] {
  return [
    field('KSIZ', u32(formIds.length)),
    field('KWDA', Buffer.concat(formIds.map((formId: number) => u32(formId)))),
  ];
}
