import { createHash } from 'node:crypto';

const ALGORITHM = 'sha256';

/**
 * Digest of the raw input bytes in the run manifest's `sha256:<hex>` form.
 */
export function contentDigest(content: Buffer | string): string {
    return `${ALGORITHM}:${createHash(ALGORITHM).update(content).digest('hex')}`;
}
