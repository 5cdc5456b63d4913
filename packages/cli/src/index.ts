#!/usr/bin/env node
/**
 * span-pa2 CLI
 *
 * The CLI owns all file I/O and console output. The core decoder receives
 * lines and returns records; it never touches the file system.
 */

import { Command } from 'commander';
import { CLI_DEFAULTS } from '@span-pa2/shared';
import { decodeFile } from './commands/decode.js';
import { errorMessage } from './utils/errors.js';

function collectTag(value: string, previous: string[]): string[] {
    return [...previous, value];
}

const program = new Command();

program
    .name('pa2')
    .description('Decode SPAN PA2 risk parameter files')
    .version(CLI_DEFAULTS.VERSION)
    .argument('<file>', 'PA2 file to decode')
    .option('--tag <tag>', 'Only decode records with this tag (repeatable)', collectTag, [])
    .option('--out <dir>', 'Output directory')
    .option('--config <path>', `Config file (default: ${CLI_DEFAULTS.CONFIG_FILENAME} beside the input)`)
    .option('--dry-run', 'Decode without writing any files')
    .option('--force', 'Overwrite existing outputs')
    .option('--fail-fast', 'Stop at the first line that fails to decode')
    .option('--yes', 'Continue past decode errors without asking')
    .action(async (file: string, rawOptions: unknown) => {
        process.exitCode = await decodeFile(file, rawOptions);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error('Unexpected error:', errorMessage(err));
    process.exit(1);
});
