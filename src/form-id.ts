/**
 * FormID addressing and name resolution.
 *
 * A FormID's top byte indexes the plugin's master list; the index one past the
 * last master is the plugin itself, and anything higher is a master this
 * plugin never declared.
 */

import { KNOWN_FORM_IDS } from './constants/known-form-ids.js';
import type { PluginIndex } from './plugin-index.js';
import type { PluginHeader } from './types/plugin.js';
import { toHex } from './utils/hex.js';

export type FormIdOrigin = 'master' | 'self' | 'foreign';

export interface ResolvedFormId {
  /** Master file name, this plugin's name, or an `UNKNOWN_MASTER_XX` placeholder. */
  readonly source: string;
  /** Six uppercase hex digits. */
  readonly localId: string;
  readonly origin: FormIdOrigin;
  readonly masterIndex: number;
}

export function addressingIndex(formId: number): number {
  return (formId >>> 24) & 0xff;
}

export function localId(formId: number): number {
  return formId & 0x00ffffff;
}

export function unknownMasterName(index: number): string {
  return `UNKNOWN_MASTER_${toHex(index, 2)}`;
}

/**
 * Resolves FormIDs against one plugin's master list and decoded records.
 */
export class FormIdResolver {
  constructor(
    private readonly header: PluginHeader,
    private readonly index: PluginIndex,
    private readonly knownNames: ReadonlyMap<number, string> = KNOWN_FORM_IDS
  ) {}

  origin(formId: number): FormIdOrigin {
    const masterIndex: number = addressingIndex(formId);
    if (masterIndex < this.header.masters.length) {
      return 'master';
    }
    return masterIndex === this.header.masters.length ? 'self' : 'foreign';
  }

  resolve(formId: number): ResolvedFormId {
    const masterIndex: number = addressingIndex(formId);
    const origin: FormIdOrigin = this.origin(formId);
    const source: string = origin === 'master'
      ? this.header.masters[masterIndex]
      : origin === 'self' ? this.header.fileName : unknownMasterName(masterIndex);
    return { source, localId: toHex(localId(formId), 6), origin, masterIndex };
  }

  /** `source|localId`, e.g. `Fallout4.esm|04A0A2`. */
  format(formId: number): string {
    const { source, localId: local } = this.resolve(formId);
    return `${source}|${local}`;
  }

  /**
   * Best available name: a decoded record's editor id, then the known-FormID
   * table, then {@link FormIdResolver.format}. Always returns a string.
   */
  resolveName(formId: number): string {
    const editorId: string | undefined = this.index.get(formId)?.editorId;
    if (editorId) {
      return editorId;
    }
    return this.knownNames.get(formId >>> 0) ?? this.format(formId);
  }

  /** Master the record overrides, or this plugin's own name for new and foreign records. */
  sourceFile(formId: number): string {
    return this.origin(formId) === 'master' ? this.header.masters[addressingIndex(formId)] : this.header.fileName;
  }
}
