import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, renameSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { getLogger } from '../utils/logger.js';

/**
 * File-system cache for extracted dictionary files.
 * Stores one `<language>.dic` file per language in a cache directory.
 *
 * Entries never expire: published dictionaries change rarely, and
 * `cache clear` forces a fresh download.
 */
export class DictionaryCache {
    private cacheDir: string;
    private enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? '.wordlist-oracle-cache';
        this.enabled = options.enabled ?? true;
    }

    /**
     * Path of the cached dictionary file for a language.
     */
    path(language: string): string {
        return join(this.cacheDir, `${language}.dic`);
    }

    /**
     * Get cached dictionary bytes, or null if not cached.
     */
    read(language: string): Buffer | null {
        if (!this.enabled) return null;

        const filePath = this.path(language);
        if (!existsSync(filePath)) return null;

        getLogger().debug({ language, filePath }, 'Cache hit');
        return readFileSync(filePath);
    }

    /**
     * Store dictionary bytes in the cache.
     * Written to a temp file and renamed, so a failed write never leaves a
     * partial `.dic` behind.
     */
    write(language: string, data: Buffer): void {
        if (!this.enabled) return;

        mkdirSync(this.cacheDir, { recursive: true });
        const filePath = this.path(language);
        const tempPath = `${filePath}.tmp`;
        try {
            writeFileSync(tempPath, data);
            renameSync(tempPath, filePath);
            getLogger().debug({ language, filePath, bytes: data.length }, 'Dictionary cached');
        } catch (error) {
            rmSync(tempPath, { force: true });
            getLogger().warn({ err: error, filePath }, 'Failed to write cache entry');
        }
    }

    /**
     * Check if a language's dictionary is cached.
     */
    has(language: string): boolean {
        return this.enabled && existsSync(this.path(language));
    }

    /**
     * Remove the cache directory. Returns false if there was nothing to remove.
     */
    clear(): boolean {
        if (!existsSync(this.cacheDir)) return false;
        rmSync(this.cacheDir, { recursive: true, force: true });
        return true;
    }

    /**
     * Get cache stats.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; totalBytes: number } {
        let entries = 0;
        let totalBytes = 0;

        if (existsSync(this.cacheDir)) {
            for (const file of readdirSync(this.cacheDir)) {
                if (!file.endsWith('.dic')) continue;
                entries++;
                totalBytes += statSync(join(this.cacheDir, file)).size;
            }
        }

        return {
            enabled: this.enabled,
            directory: this.cacheDir,
            entries,
            totalBytes,
        };
    }
}
