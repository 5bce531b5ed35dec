/**
 * Decoded record and subrecord shapes.
 */

export interface Subrecord {
  readonly type: string;
  readonly data: Buffer;
}

/**
 * Ordered multimap of subrecord payloads keyed by subrecord type.
 * Repeated types keep every payload in file order.
 */
export type SubrecordMap = ReadonlyMap<string, readonly Buffer[]>;

/** Display name as stored: plain text, or a reference into an external string table. */
export type DisplayName =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'localized'; readonly stringId: number };

export interface PluginRecord {
  readonly type: string;
  /** Declared payload size from the envelope (compressed size when compressed). */
  readonly dataSize: number;
  readonly flags: number;
  readonly formId: number;
  readonly timestamp: number;
  readonly versionInfo: number;
  readonly isCompressed: boolean;
  /** Byte offset of the record envelope in the file. */
  readonly offset: number;
  readonly subrecords: readonly Subrecord[];
  readonly fields: SubrecordMap;
  readonly editorId: string;
  /** Rendered display name; localized names render as `[LSTRING:XXXXXXXX]`. */
  readonly fullName: string;
  readonly displayName: DisplayName | null;
  /** KSIZ value when present. */
  readonly keywordCount: number | null;
  readonly keywords: readonly number[];
  /** Set when the payload could not be decompressed. */
  readonly error?: string;
}
