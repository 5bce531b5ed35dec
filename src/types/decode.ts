/**
 * Shapes returned by a plugin decode.
 */

export type DecodeWarningKind =
  | 'truncated-file'
  | 'container-overrun'
  | 'malformed-group'
  | 'decompression-failure'
  | 'subrecord-overrun';

/**
 * A payload-level anomaly isolated to one record or container.
 */
export interface DecodeWarning {
  readonly kind: DecodeWarningKind;
  readonly message: string;
  /** File offset where the offending envelope starts. */
  readonly offset: number;
  readonly signature?: string;
  readonly formId?: number;
}

export interface DecodeStats {
  readonly groupCount: number;
  /** Every record envelope read, whether kept or filtered out. */
  readonly recordCount: number;
  readonly compressedCount: number;
  /** Envelopes read per record type, in first-seen order. */
  readonly typeCounts: ReadonlyMap<string, number>;
}
