/**
 * Re-export layout types from the shared package.
 * Core consumes these types but doesn't define them.
 */
export type {
    FieldSpec,
    FieldKind,
    FieldSpecOf,
    RecordLayout,
    RecordLayoutInput,
    LayoutTable,
} from '@span-pa2/shared';

export {
    FieldSpecSchema,
    RecordLayoutSchema,
    LayoutTableSchema,
    TAG_LENGTH,
    DEFAULT_FLOAT_SCALE,
    TIER_SPAN,
    RISK_ARRAY,
    MIDNIGHT,
} from '@span-pa2/shared';
