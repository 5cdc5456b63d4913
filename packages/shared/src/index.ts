// Schemas
export {
    FieldSpecSchema,
    RecordLayoutSchema,
    LayoutTableSchema,
    CliConfigSchema,
    DecodeFlagsSchema,
    RunManifestSchema,
} from './schemas.js';

// Types
export type {
    FieldSpec,
    FieldKind,
    FieldSpecOf,
    RecordLayout,
    RecordLayoutInput,
    LayoutTable,
    CliConfig,
    DecodeFlags,
    LineFailure,
    RunManifest,
} from './schemas.js';

// Constants
export {
    TAG_LENGTH,
    DEFAULT_FLOAT_SCALE,
    TIER_SPAN,
    RISK_ARRAY,
    DATE_WIDTH,
    TIME_WIDTH,
    MIDNIGHT,
    CLI_DEFAULTS,
} from './constants.js';
