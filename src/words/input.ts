import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

/**
 * Iterate the lines of a text stream (UTF-8).
 * Handles both \n and \r\n line endings.
 */
export function readLines(stream: Readable): AsyncIterable<string> {
    stream.setEncoding('utf8');
    return createInterface({ input: stream, crlfDelay: Infinity });
}

/**
 * Open the candidate source: a file path, or stdin when none is given.
 */
export function openCandidateStream(input?: string): Readable {
    if (input && input !== '-') return createReadStream(input);
    return process.stdin;
}
