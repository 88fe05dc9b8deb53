import type { ComparisonResult, SampleFilter, WordSet } from '../types/index.js';
import { sampleWords } from './sampler.js';

const PERCENT_DECIMALS = 4;

/**
 * 100 * part / whole rounded to 4 decimals, or 0 for an empty whole.
 */
export function percentage(part: number, whole: number): number {
    if (whole === 0) return 0;
    const scale = 10 ** PERCENT_DECIMALS;
    return Math.round((part / whole) * 100 * scale) / scale;
}

/**
 * Compare a candidate word set against a reference word set.
 *
 * Both sets go through the same sample filter, so their sampled views stay
 * aligned without ever being compared during sampling. The sampled sets are
 * local to this call: only counts and percentages are returned.
 */
export function compareWordSets(
    reference: WordSet,
    candidate: WordSet,
    filter: SampleFilter,
    language: string
): ComparisonResult {
    const referenceSampled = sampleWords(reference, filter);
    const candidateSampled = sampleWords(candidate, filter);

    let truePositives = 0;
    for (const word of candidateSampled) {
        if (referenceSampled.has(word)) truePositives++;
    }

    // Both differences follow from the intersection size
    const falsePositives = candidateSampled.size - truePositives;
    const falseNegatives = referenceSampled.size - truePositives;

    return {
        language,
        nonce: filter.nonce,
        fraction: filter.fraction,
        referenceTotal: reference.size,
        referenceSampled: referenceSampled.size,
        candidateTotal: candidate.size,
        candidateSampled: candidateSampled.size,
        truePositives,
        falsePositives,
        falseNegatives,
        recallPct: percentage(truePositives, referenceSampled.size),
        precisionPct: percentage(truePositives, candidateSampled.size),
    };
}
