/**
 * Content Digests for Subtrack Lineage Outputs
 *
 * Output tables are deterministic: identical inputs and thresholds must
 * produce byte-identical tables. Digests recorded in each run manifest make
 * that checkable without diffing files.
 */

import { createHash } from 'crypto';

/**
 * Digest format: {algorithm}:{hex}
 * Example: sha256:9f86d0...
 */
export type ContentDigest = `${string}:${string}`;

export const DIGEST_ALGORITHM = 'sha256';

/**
 * Digest an encoded table
 */
export function digestText(text: string): ContentDigest {
  const hash = createHash(DIGEST_ALGORITHM).update(text, 'utf8').digest('hex');
  return `${DIGEST_ALGORITHM}:${hash}`;
}
