import JSZip from 'jszip';
import type { DownloadConfig } from '../types/index.js';
import { DictionaryCache } from '../cache/dictionary-cache.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import type { Language } from './languages.js';
import { DictionaryError } from './superdic.js';

export interface FetchDictionaryOptions {
    cache: DictionaryCache;
    download: DownloadConfig;
    client?: HttpClient;
}

/**
 * Archive URL for a language, e.g. `<baseUrl>/deutsch.dic.zip`.
 */
export function dictionaryUrl(baseUrl: string, language: Language): string {
    return `${baseUrl.replace(/\/+$/, '')}/${language}.dic.zip`;
}

/**
 * Pull the first `.dic` file out of a zip archive.
 */
export async function extractDictionary(archive: Buffer): Promise<Buffer> {
    let zip: JSZip;
    try {
        zip = await JSZip.loadAsync(archive);
    } catch (error) {
        throw new DictionaryError(
            `Extraction failed: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    const entry = zip.file(/\.dic$/)[0];
    if (!entry) {
        throw new DictionaryError('No .dic file found in downloaded zip');
    }

    getLogger().debug({ entry: entry.name }, 'Extracting dictionary');
    return entry.async('nodebuffer');
}

/**
 * Return the dictionary file for a language, downloading and caching it
 * on first use.
 */
export async function fetchDictionary(language: Language, options: FetchDictionaryOptions): Promise<Buffer> {
    const logger = getLogger();

    const cached = options.cache.read(language);
    if (cached) return cached;

    const url = dictionaryUrl(options.download.baseUrl, language);
    logger.info({ language, url }, 'Dictionary not cached, downloading');

    const client = options.client ?? new HttpClient({
        timeout: options.download.timeoutMs,
        maxRetries: options.download.maxRetries,
        version: VERSION,
    });
    const archive = await client.getBuffer(url);
    const data = await extractDictionary(archive);

    options.cache.write(language, data);
    return data;
}
