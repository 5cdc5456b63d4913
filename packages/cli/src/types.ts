/**
 * PA2 CLI - Core Types
 */

export type { DecodeFlags } from '@span-pa2/shared';

/**
 * Resolved options for one decode run: command-line flags merged over the config file.
 */
export interface DecodeOptions {
    dryRun: boolean;
    force: boolean;
    yes: boolean;
    failFast: boolean;
    outDir: string;
    /** Record tags to keep; undefined keeps every tag */
    tags?: string[];
    /** Record tags dropped before decoding */
    skipTags: string[];
}

export interface OutputPaths {
    dir: string;
    workbook: string;
    manifest: string;
}
