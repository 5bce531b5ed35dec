/** Record flag bits shared by the TES4 header and ordinary records. */
export const FLAG_MASTER = 0x00000001;
export const FLAG_LOCALIZED = 0x00000040;
export const FLAG_LIGHT_MASTER = 0x00000200;
export const FLAG_COMPRESSED = 0x00040000;

/** Envelope size shared by records and GRUP containers. */
export const ENVELOPE_SIZE = 24;

/** Subrecord header: 4-byte type + u16 size. */
export const SUBRECORD_HEADER_SIZE = 6;

export const HEADER_SIGNATURE = 'TES4';
export const GROUP_SIGNATURE = 'GRUP';
export const OVERSIZE_SIGNATURE = 'XXXX';

/** GRUP group type whose label is a record type. */
export const TOP_LEVEL_GROUP = 0;
