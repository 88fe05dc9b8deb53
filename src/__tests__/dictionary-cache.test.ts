import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DictionaryCache } from '../cache/dictionary-cache.js';

const diskFull = vi.hoisted(() => ({ enabled: false }));

vi.mock('node:fs', async (importOriginal) => {
    const actual = await importOriginal<typeof import('node:fs')>();
    return {
        ...actual,
        writeFileSync: (...args: Parameters<typeof actual.writeFileSync>): void => {
            if (diskFull.enabled) {
                actual.writeFileSync(args[0], 'partial');
                throw new Error('ENOSPC: no space left on device');
            }
            actual.writeFileSync(...args);
        },
    };
});

describe('DictionaryCache write failures', () => {
    let cacheDir: string;

    beforeEach(() => {
        cacheDir = mkdtempSync(join(tmpdir(), 'wordlist-oracle-cache-'));
    });

    afterEach(() => {
        diskFull.enabled = false;
        rmSync(cacheDir, { recursive: true, force: true });
    });

    it('should not leave a truncated entry behind', () => {
        const cache = new DictionaryCache({ cacheDir });

        diskFull.enabled = true;
        cache.write('english', Buffer.from('complete dictionary'));

        expect(cache.has('english')).toBe(false);
        expect(cache.read('english')).toBeNull();
        expect(readdirSync(cacheDir)).toEqual([]);
    });

    it('should keep the previous entry when a rewrite fails', () => {
        const cache = new DictionaryCache({ cacheDir });
        cache.write('english', Buffer.from('abc'));

        diskFull.enabled = true;
        cache.write('english', Buffer.from('abcdef'));

        expect(cache.read('english')?.toString()).toBe('abc');
        expect(readdirSync(cacheDir)).toEqual(['english.dic']);
    });
});
