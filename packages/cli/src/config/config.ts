import { readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { parse } from 'yaml';
import { CliConfigSchema, CLI_DEFAULTS, type CliConfig } from '@span-pa2/shared';
import type { DecodeFlags, DecodeOptions } from '../types.js';

/**
 * Config file for an input: the --config path, else pa2.config.yaml beside the input.
 */
export function resolveConfigPath(inputPath: string, explicit?: string): string {
    return explicit ?? join(dirname(inputPath), CLI_DEFAULTS.CONFIG_FILENAME);
}

/**
 * Loads and validates the YAML config.
 * A missing implicit config yields the defaults; a missing explicit one is an error.
 */
export function loadCliConfig(path: string, required = false): CliConfig {
    if (!existsSync(path)) {
        if (required) {
            throw new Error(`Config file not found: ${path}`);
        }
        return CliConfigSchema.parse({});
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);
    return CliConfigSchema.parse(data ?? {});
}

/**
 * Merges command-line flags over the config file.
 */
export function resolveOptions(inputPath: string, flags: DecodeFlags, config: CliConfig): DecodeOptions {
    return {
        dryRun: flags.dryRun,
        force: flags.force,
        yes: flags.yes,
        failFast: flags.failFast ?? config.fail_fast,
        outDir: flags.out ?? config.out_dir ?? join(dirname(inputPath), CLI_DEFAULTS.OUT_DIR),
        tags: flags.tag.length > 0 ? flags.tag : config.tags,
        skipTags: config.skip_tags,
    };
}
