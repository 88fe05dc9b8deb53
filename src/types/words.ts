/**
 * A normalized word: trimmed, uppercase, 2 to 9 code points long.
 * Compared as an opaque string.
 */
export type WordToken = string;

/**
 * Unique word tokens. Immutable once built for a run.
 */
export type WordSet = ReadonlySet<WordToken>;

/**
 * Keyed hash filter that keeps roughly 1/fraction of all words.
 * Built with `createSampleFilter()`, which validates the fraction.
 */
export interface SampleFilter {
    readonly nonce: string;
    readonly fraction: number;
}
