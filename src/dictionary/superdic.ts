import type { WordSet } from '../types/index.js';
import { normalizeWordsSync } from '../words/normalize.js';

const WORDS_MARKER = Buffer.from('[Words]\r\n', 'latin1');
const LINE_BREAK = Buffer.from('\r\n', 'latin1');
const ENTRY_KEY = Buffer.from('7AVFU8PP', 'latin1');

/**
 * Markers of extended or graded entries, which are not part of the base list.
 */
const EXTENDED_MARKERS = [';1', ';2'];

/**
 * Failure to obtain or decode a reference dictionary.
 * Messages never include dictionary entries.
 */
export class DictionaryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DictionaryError';
    }
}

/**
 * Decode one SuperDic entry: base64, then XOR with the repeating entry key.
 */
function decodeEntry(line: Buffer): string {
    const bytes = Buffer.from(line.toString('latin1'), 'base64');
    for (let i = 0; i < bytes.length; i++) {
        bytes[i] = (bytes[i] ?? 0) ^ (ENTRY_KEY[i % ENTRY_KEY.length] ?? 0);
    }
    return new TextDecoder('utf-8').decode(bytes);
}

/**
 * Split a buffer on CRLF.
 */
function* splitLines(data: Buffer): Generator<Buffer> {
    let start = 0;
    while (start <= data.length) {
        const end = data.indexOf(LINE_BREAK, start);
        if (end === -1) {
            yield data.subarray(start);
            return;
        }
        yield data.subarray(start, end);
        start = end + LINE_BREAK.length;
    }
}

/**
 * Decode the raw words of a SuperDic `.dic` file.
 *
 * Entries follow a `[Words]` marker, one base64 line each. A decoded entry
 * reads `WORD=details`; entries whose details carry `;1` or `;2` are skipped.
 * Words are returned as stored, without normalization.
 */
export function decodeSuperDic(data: Buffer): string[] {
    const markerIndex = data.indexOf(WORDS_MARKER);
    if (markerIndex === -1) {
        throw new DictionaryError('[Words] section not found in dictionary file');
    }

    const words: string[] = [];
    let lineNumber = 0;

    for (const line of splitLines(data.subarray(markerIndex + WORDS_MARKER.length))) {
        lineNumber++;
        if (line.length === 0) continue;

        const entry = decodeEntry(line);
        const separator = entry.indexOf('=');
        if (separator === -1) {
            throw new DictionaryError(`Malformed dictionary entry at line ${lineNumber} of the [Words] section`);
        }

        const details = entry.slice(separator + 1);
        if (EXTENDED_MARKERS.some((marker) => details.includes(marker))) continue;

        words.push(entry.slice(0, separator));
    }

    return words;
}

/**
 * Decode a SuperDic file straight into a normalized reference word set.
 */
export function loadReferenceWords(data: Buffer): WordSet {
    return normalizeWordsSync(decodeSuperDic(data));
}
