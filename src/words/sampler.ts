import { createHash } from 'node:crypto';
import type { SampleFilter, WordSet, WordToken } from '../types/index.js';

/**
 * SHA-256 digests span [0, 2^256).
 */
const DIGEST_RANGE = 1n << 256n;

/**
 * Invalid sampling configuration.
 */
export class SampleFilterError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SampleFilterError';
    }
}

/**
 * Build a sample filter, rejecting fractions that are not integers >= 1.
 */
export function createSampleFilter(nonce: string, fraction: number): SampleFilter {
    if (!Number.isSafeInteger(fraction) || fraction < 1) {
        throw new SampleFilterError(`Fraction must be a positive integer, got ${fraction}`);
    }
    return { nonce, fraction };
}

/**
 * Decide whether a word belongs to the sampled view.
 *
 * The digest of `nonce + word` (UTF-8, no separator) is read as a 256-bit
 * unsigned integer h; the word is kept iff h < floor(2^256 / fraction).
 * The floor makes the rate slightly below 1/fraction when fraction does not
 * divide 2^256. Pure: the same inputs give the same answer on any machine.
 */
export function includeWord(word: WordToken, filter: SampleFilter): boolean {
    if (filter.fraction === 1) return true;
    const digest = createHash('sha256').update(filter.nonce + word, 'utf8').digest('hex');
    return BigInt(`0x${digest}`) < DIGEST_RANGE / BigInt(filter.fraction);
}

/**
 * Apply the filter to every word of a set.
 */
export function sampleWords(words: WordSet, filter: SampleFilter): WordSet {
    const sampled = new Set<WordToken>();
    for (const word of words) {
        if (includeWord(word, filter)) sampled.add(word);
    }
    return sampled;
}
