/**
 * File-level information decoded from the leading TES4 record.
 */
export interface PluginHeader {
  /** Base name of the decoded file; used as the "self" source for FormIDs. */
  readonly fileName: string;
  /** HEDR format version. */
  readonly version: number;
  /** HEDR declared record count. */
  readonly recordCount: number;
  /** HEDR next free object id. */
  readonly nextObjectId: number;
  /** Master files in declaration order; position is the addressing index. */
  readonly masters: readonly string[];
  readonly isMaster: boolean;
  readonly isLightMaster: boolean;
  readonly isLocalized: boolean;
  readonly author: string;
  readonly description: string;
  /** Raw TES4 flag word. */
  readonly flags: number;
}
