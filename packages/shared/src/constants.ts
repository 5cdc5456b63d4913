/**
 * Constants for the PA2 decoder.
 * Wire-format widths and scales shared by the layout schemas and the field accessors.
 */

/**
 * Every line starts with a two-character record tag.
 * Single-character tags are padded with a trailing space ("T ", "0 ").
 */
export const TAG_LENGTH = 2;

/**
 * Scale applied to scaled_float fields that declare none.
 */
export const DEFAULT_FLOAT_SCALE = 1e-6;

/**
 * Tier span chunks: 14 digits, two 6-digit months at +2 and +8.
 */
export const TIER_SPAN = {
    CHUNK_WIDTH: 14,
    START_OFFSET: 2,
    END_OFFSET: 8,
    MONTH_WIDTH: 6,
} as const;

/**
 * Risk array chunks: 5-digit magnitude followed by a sign flag.
 */
export const RISK_ARRAY = {
    CHUNK_WIDTH: 6,
    MAGNITUDE_WIDTH: 5,
    SCALE: 1e-4,
    NEGATIVE_FLAG: '-',
} as const;

export const DATE_WIDTH = 8;
export const TIME_WIDTH = 4;

/**
 * Value returned by time fields that do not hold a valid HHMM.
 */
export const MIDNIGHT = '00:00';

// ============================================================================
// CLI
// ============================================================================

export const CLI_DEFAULTS = {
    CONFIG_FILENAME: 'pa2.config.yaml',
    OUT_DIR: 'out',
    MANIFEST_SUFFIX: '.manifest.json',
    WORKBOOK_SUFFIX: '.xlsx',
    VERSION: '0.1.0',
} as const;
