// Types (re-exported from shared)
export type {
    FieldSpec,
    FieldKind,
    FieldSpecOf,
    RecordLayout,
    RecordLayoutInput,
    LayoutTable,
} from './types/index.js';

export {
    FieldSpecSchema,
    RecordLayoutSchema,
    LayoutTableSchema,
    TAG_LENGTH,
    DEFAULT_FLOAT_SCALE,
    TIER_SPAN,
    RISK_ARRAY,
    MIDNIGHT,
} from './types/index.js';

// Field accessors
export {
    decodeString,
    decodeStringGroup,
    decodeInteger,
    decodeScaledFloat,
    decodeDate,
    decodeTime,
    decodeTierSpans,
    decodeRiskArray,
    decodeField,
} from './fields/index.js';
export type { TierSpan, FieldValue, FieldValueByKind, FieldAccessor, DecodedField } from './fields/index.js';

// Layouts & registry
export { PA2_LAYOUT_TABLE } from './layouts/index.js';
export { RecordRegistry, DEFAULT_REGISTRY, getLayout } from './registry/index.js';

// Decoder
export { DecodedRecord, decodeLine, tryDecodeLine, readTag, renderRecord, renderValue } from './decoder/index.js';
export type { DecodeOutcome } from './decoder/index.js';

// Errors
export {
    Pa2Error,
    UnknownTagError,
    FieldDecodeError,
    FieldRangeError,
    MalformedFieldError,
    RecordDecodeError,
} from './errors.js';
