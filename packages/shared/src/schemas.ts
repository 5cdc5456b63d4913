/**
 * Zod schemas for PA2 decoder data structures.
 *
 * The layout schemas describe the static per-tag field table the core consumes.
 * Range invariants are checked here so that a transcription error in the table
 * fails at registry construction instead of silently corrupting decoded values.
 */

import { z } from 'zod';
import {
    DATE_WIDTH,
    DEFAULT_FLOAT_SCALE,
    RISK_ARRAY,
    TAG_LENGTH,
    TIER_SPAN,
    TIME_WIDTH,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Field names are snake_case, matching the record layouts they come from.
 */
const fieldName = z.string().regex(/^[a-z][a-z0-9_]*$/, 'Must be snake_case');

/**
 * 0-based character offset.
 */
const offset = z.number().int().min(0);

/**
 * Record tag as written in a layout: exactly two characters.
 */
const tag = z.string().length(TAG_LENGTH, `Tag must be ${TAG_LENGTH} characters`);

/**
 * Record tag as written by a user: one or two characters, padded with a space.
 * Lets config files say `T` instead of `"T "`.
 */
const userTag = z
    .string()
    .min(1)
    .max(TAG_LENGTH)
    .transform((value) => value.padEnd(TAG_LENGTH, ' '));

const rangeShape = {
    name: fieldName,
    start: offset,
    stop: offset,
};

// ============================================================================
// Field Specs
// ============================================================================

const StringFieldSchema = z.object({ ...rangeShape, kind: z.literal('string') }).strict();

const StringGroupFieldSchema = z
    .object({ ...rangeShape, kind: z.literal('string_group'), step: z.number().int().min(1) })
    .strict();

const IntegerFieldSchema = z.object({ ...rangeShape, kind: z.literal('integer') }).strict();

const ScaledFloatFieldSchema = z
    .object({
        ...rangeShape,
        kind: z.literal('scaled_float'),
        scale: z
            .number()
            .finite()
            .refine((value) => value !== 0, 'Scale must be non-zero')
            .default(DEFAULT_FLOAT_SCALE),
    })
    .strict();

const DateFieldSchema = z.object({ ...rangeShape, kind: z.literal('date') }).strict();

const TimeFieldSchema = z.object({ ...rangeShape, kind: z.literal('time') }).strict();

const TierSpansFieldSchema = z.object({ ...rangeShape, kind: z.literal('tier_spans') }).strict();

const SignedMagnitudeArrayFieldSchema = z
    .object({ ...rangeShape, kind: z.literal('signed_magnitude_array') })
    .strict();

/**
 * One named field bound to a byte range `[start, stop)` of a line.
 */
export const FieldSpecSchema = z
    .discriminatedUnion('kind', [
        StringFieldSchema,
        StringGroupFieldSchema,
        IntegerFieldSchema,
        ScaledFloatFieldSchema,
        DateFieldSchema,
        TimeFieldSchema,
        TierSpansFieldSchema,
        SignedMagnitudeArrayFieldSchema,
    ])
    .superRefine((spec, ctx) => {
        if (spec.start > spec.stop) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `${spec.name}: start ${spec.start} is after stop ${spec.stop}`,
            });
            return;
        }

        const width = spec.stop - spec.start;
        const requireMultiple = (chunk: number) => {
            if (width % chunk !== 0) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `${spec.name}: width ${width} is not a multiple of ${chunk}`,
                });
            }
        };
        const requireWidth = (expected: number) => {
            if (width !== expected) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `${spec.name}: ${spec.kind} fields are ${expected} characters wide, got ${width}`,
                });
            }
        };

        switch (spec.kind) {
            case 'string_group':
                requireMultiple(spec.step);
                break;
            case 'tier_spans':
                requireMultiple(TIER_SPAN.CHUNK_WIDTH);
                break;
            case 'signed_magnitude_array':
                requireMultiple(RISK_ARRAY.CHUNK_WIDTH);
                break;
            case 'date':
                requireWidth(DATE_WIDTH);
                break;
            case 'time':
                requireWidth(TIME_WIDTH);
                break;
            default:
                break;
        }
    });

export type FieldSpec = z.infer<typeof FieldSpecSchema>;

export type FieldKind = FieldSpec['kind'];

export type FieldSpecOf<K extends FieldKind> = Extract<FieldSpec, { kind: K }>;

// ============================================================================
// Record Layouts
// ============================================================================

/**
 * Ordered field bindings for one record tag.
 */
export const RecordLayoutSchema = z
    .object({
        tag,
        name: z.string().regex(/^[A-Z][A-Za-z0-9]*$/, 'Must be PascalCase'),
        title: z.string().min(1),
        fields: z.array(FieldSpecSchema).min(1),
    })
    .strict()
    .superRefine((layout, ctx) => {
        const seen = new Set<string>();
        for (const field of layout.fields) {
            if (seen.has(field.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `${layout.name}: duplicate field "${field.name}"`,
                });
            }
            seen.add(field.name);
        }
    });

export type RecordLayout = z.infer<typeof RecordLayoutSchema>;

export type RecordLayoutInput = z.input<typeof RecordLayoutSchema>;

/**
 * The full per-tag table. Tags must be unique.
 */
export const LayoutTableSchema = z.array(RecordLayoutSchema).superRefine((layouts, ctx) => {
    const seen = new Set<string>();
    for (const layout of layouts) {
        if (seen.has(layout.tag)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Duplicate record tag "${layout.tag}" (${layout.name})`,
            });
        }
        seen.add(layout.tag);
    }
});

export type LayoutTable = z.infer<typeof LayoutTableSchema>;

// ============================================================================
// CLI Configuration
// ============================================================================

/**
 * Optional pa2.config.yaml next to the input file.
 */
export const CliConfigSchema = z
    .object({
        out_dir: z.string().min(1).optional(),
        tags: z.array(userTag).optional(),
        skip_tags: z.array(userTag).default([]),
        fail_fast: z.boolean().default(false),
    })
    .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Flags of the decode command, validated at the CLI boundary.
 * Unset flags fall back to the config file.
 */
export const DecodeFlagsSchema = z.object({
    tag: z.array(userTag).default([]),
    out: z.string().min(1).optional(),
    config: z.string().min(1).optional(),
    dryRun: z.boolean().default(false),
    force: z.boolean().default(false),
    failFast: z.boolean().optional(),
    yes: z.boolean().default(false),
});

export type DecodeFlags = z.infer<typeof DecodeFlagsSchema>;

// ============================================================================
// Run Manifest
// ============================================================================

/**
 * A line the decoder rejected.
 */
const LineFailureSchema = z.object({
    line_number: z.number().int().min(1),
    tag: z.string(),
    field: z.string().optional(),
    message: z.string(),
});

export type LineFailure = z.infer<typeof LineFailureSchema>;

/**
 * Summary written next to the exported workbook.
 */
export const RunManifestSchema = z.object({
    source_file: z.string(),
    source_hash: z.string().regex(/^sha256:[0-9a-f]{64}$/, 'Must be sha256:<hex>'),
    run_timestamp: z.string(),
    line_count: z.number().int().min(0),
    record_count: z.number().int().min(0),
    record_counts: z.record(z.string(), z.number().int().min(0)),
    unknown_tags: z.record(z.string(), z.number().int().min(1)),
    failed_lines: z.array(LineFailureSchema),
    version: z.string(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
