import { basename, extname, join } from 'node:path';
import { CLI_DEFAULTS } from '@span-pa2/shared';
import type { OutputPaths } from '../types.js';

/**
 * Output files for an input: `<out>/<name>.xlsx` and `<out>/<name>.manifest.json`,
 * where name is the input's basename without its extension.
 */
export function getOutputPaths(inputPath: string, outDir: string): OutputPaths {
    const name = basename(inputPath, extname(inputPath));
    return {
        dir: outDir,
        workbook: join(outDir, `${name}${CLI_DEFAULTS.WORKBOOK_SUFFIX}`),
        manifest: join(outDir, `${name}${CLI_DEFAULTS.MANIFEST_SUFFIX}`),
    };
}
