/**
 * esp-decoder - Main entry point
 *
 * Standalone decoding of game plugin files (.esp/.esm/.esl).
 */

// Decoding
export { PluginReader } from './plugin-reader.js';
export type { DecodedPlugin, DecodeOptions } from './plugin-reader.js';
export { decodeHeader } from './header.js';
export { walkGroups, readGroupEnvelope } from './group-walker.js';
export type { GroupEnvelope, WalkOptions, WalkResult, WalkSink, WalkerState } from './group-walker.js';
export { decodeRecord, inflatePayload, interpretSubrecords, splitSubrecords } from './record.js';
export { ByteCursor, decodeText } from './utils/byte-cursor.js';

// Index and FormID resolution
export { PluginIndex } from './plugin-index.js';
export type { OverridePartition } from './plugin-index.js';
export { FormIdResolver, addressingIndex, localId } from './form-id.js';
export type { FormIdOrigin, ResolvedFormId } from './form-id.js';
export { KNOWN_FORM_IDS } from './constants/known-form-ids.js';

// Analyses and export
export * from './analysis.js';
export { formatSummary, pluginKind } from './summary.js';
export { formatOverrideReport, toCsv, writeCsv, writeFullDump, writeJson } from './export.js';
export { batchScan, enumeratePluginFiles } from './batch.js';

// Errors and shared types
export { DecoderError, MalformedHeaderError, OutOfBoundsError } from './errors.js';
export type { DecodeStats, DecodeWarning, DecodeWarningKind } from './types/decode.js';
export type { PluginHeader } from './types/plugin.js';
export type { DisplayName, PluginRecord, Subrecord, SubrecordMap } from './types/record.js';
