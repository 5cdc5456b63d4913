export { decodeString, decodeStringGroup } from './string.js';
export { decodeInteger } from './integer.js';
export { decodeScaledFloat } from './scaled-float.js';
export { decodeDate } from './date.js';
export { decodeTime } from './time.js';
export { decodeTierSpans } from './tier-spans.js';
export { decodeRiskArray } from './risk-array.js';
export { decodeField } from './decode-field.js';
export type { TierSpan, FieldValue, FieldValueByKind, FieldAccessor, DecodedField } from './types.js';
