export { DecodedRecord } from './record.js';
export { decodeLine, tryDecodeLine, readTag } from './decode-line.js';
export type { DecodeOutcome } from './decode-line.js';
export { renderRecord, renderValue } from './render.js';
