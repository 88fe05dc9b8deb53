import type { Language } from '../dictionary/languages.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Report output formats.
 */
export type ReportFormat = 'json' | 'text';

/**
 * Dictionary download settings.
 */
export interface DownloadConfig {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
}

/**
 * Run history settings.
 */
export interface HistoryConfig {
    enabled: boolean;
    path: string;
}

/**
 * Full oracle configuration merged from CLI flags, env vars, and config file.
 */
export interface OracleConfig {
    // Comparison
    language: Language;
    fraction: number;
    nonce: string;

    // Input / output
    input?: string;
    format: ReportFormat;

    // Dictionary cache
    cacheDir: string;
    noCache: boolean;

    // Download
    download: DownloadConfig;

    // History
    history: HistoryConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: OracleConfig = {
    language: 'deutsch',
    fraction: 1,
    nonce: '',
    format: 'json',
    cacheDir: '.wordlist-oracle-cache',
    noCache: false,
    download: {
        baseUrl: 'https://github.com/Scrabble3D/Dictionaries/raw/main',
        timeoutMs: 60000,
        maxRetries: 3,
    },
    history: {
        enabled: false,
        path: './wordlist-oracle.db',
    },
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 * Holds report aggregates only, never words.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    oracle_version: string;
    language: string;
    nonce: string;
    fraction: number;
    reference_total: number;
    reference_sampled: number;
    candidate_total: number;
    candidate_sampled: number;
    true_positives: number;
    false_positives: number;
    false_negatives: number;
    recall_pct: number;
    precision_pct: number;
}
