import type { WordSet, WordToken } from '../types/index.js';

export const MIN_WORD_LENGTH = 2;
export const MAX_WORD_LENGTH = 9;

/**
 * Normalize one raw line into a word token.
 * - Trim surrounding whitespace
 * - Uppercase
 * - Keep only tokens of 2 to 9 code points
 *
 * Returns null for anything outside the length range, blank lines included.
 */
export function normalizeWord(line: string): WordToken | null {
    const token = line.trim().toUpperCase();
    // Count code points, not UTF-16 units, so astral letters count once
    const length = [...token].length;
    if (length < MIN_WORD_LENGTH || length > MAX_WORD_LENGTH) return null;
    return token;
}

/**
 * Build a word set from an in-memory sequence of lines.
 */
export function normalizeWordsSync(lines: Iterable<string>): WordSet {
    const words = new Set<WordToken>();
    for (const line of lines) {
        const token = normalizeWord(line);
        if (token !== null) words.add(token);
    }
    return words;
}

/**
 * Build a word set from a stream of lines, such as a file or stdin.
 */
export async function normalizeWords(lines: Iterable<string> | AsyncIterable<string>): Promise<WordSet> {
    const words = new Set<WordToken>();
    for await (const line of lines) {
        const token = normalizeWord(line);
        if (token !== null) words.add(token);
    }
    return words;
}
