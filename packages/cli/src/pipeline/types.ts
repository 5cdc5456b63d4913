import type { LineFailure } from '@span-pa2/shared';
import type { DecodedRecord } from '@span-pa2/core';
import type { DecodeOptions, OutputPaths } from '../types.js';

/**
 * The PA2 file being decoded.
 */
export interface InputFile {
    path: string;
    filename: string;
    hash: string;
}

/**
 * One non-empty line of the input, numbered from 1.
 */
export interface SourceLine {
    number: number;
    text: string;
}

/**
 * A decoded record with the line it came from.
 */
export interface RecordEntry {
    lineNumber: number;
    record: DecodedRecord;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the decode pipeline.
 */
export interface PipelineState {
    inputPath: string;
    options: DecodeOptions;
    outputs: OutputPaths;

    // Accumulated during pipeline execution
    file?: InputFile;
    lines: SourceLine[];
    records: RecordEntry[];
    /** Decoded records per record type, in first-seen order */
    recordCounts: Record<string, number>;
    /** Lines skipped per unknown tag */
    unknownTags: Record<string, number>;
    failures: LineFailure[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
