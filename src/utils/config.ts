import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type OracleConfig } from '../types/index.js';
import { SUPPORTED_LANGUAGES, isSupportedLanguage } from '../dictionary/languages.js';
import { getLogger, isLogLevel } from './logger.js';

/**
 * Configuration values that cannot be used for a run.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Load configuration from wordlist-oracle.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<OracleConfig> | null> {
    const explorer = cosmiconfig('wordlist-oracle', {
        searchPlaces: ['wordlist-oracle.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config as Partial<OracleConfig>;
        }
    } catch (error) {
        getLogger().warn({ err: error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): Partial<OracleConfig> {
    const env: Partial<OracleConfig> = {};

    const cacheDir = process.env['WORDLIST_ORACLE_CACHE_DIR'];
    if (cacheDir) env.cacheDir = cacheDir;

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<OracleConfig>,
    searchFrom?: string
): Promise<OracleConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();
    const envBaseUrl = process.env['WORDLIST_ORACLE_BASE_URL'];

    const merged: OracleConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        download: {
            ...DEFAULT_CONFIG.download,
            ...fileConfig?.download,
            ...(envBaseUrl ? { baseUrl: envBaseUrl } : {}),
            ...cliFlags.download,
        },
        history: {
            ...DEFAULT_CONFIG.history,
            ...fileConfig?.history,
            ...cliFlags.history,
        },
    };

    return validateConfig(merged);
}

/**
 * Reject configurations that cannot produce a meaningful run.
 * File configs are untyped JSON, so every field is checked here.
 */
export function validateConfig(config: OracleConfig): OracleConfig {
    if (typeof config.language !== 'string' || !isSupportedLanguage(config.language)) {
        throw new ConfigError(
            `Unsupported language '${String(config.language)}'. Choose from: ${SUPPORTED_LANGUAGES.join(', ')}`
        );
    }
    if (!Number.isSafeInteger(config.fraction) || config.fraction < 1) {
        throw new ConfigError(`Fraction must be a positive integer, got ${String(config.fraction)}`);
    }
    if (typeof config.nonce !== 'string') {
        throw new ConfigError('Nonce must be a string');
    }
    if (config.format !== 'json' && config.format !== 'text') {
        throw new ConfigError(`Invalid format: ${String(config.format)}. Valid: json, text`);
    }
    if (typeof config.logLevel !== 'string' || !isLogLevel(config.logLevel)) {
        throw new ConfigError(
            `Invalid log level: ${String(config.logLevel)}. Valid: error, warn, info, debug, silent`
        );
    }
    if (typeof config.jsonLogs !== 'boolean') {
        throw new ConfigError('jsonLogs must be true or false');
    }
    if (typeof config.cacheDir !== 'string' || config.cacheDir === '') {
        throw new ConfigError('cacheDir must be a non-empty path');
    }

    const { baseUrl, timeoutMs, maxRetries } = config.download;
    if (typeof baseUrl !== 'string' || baseUrl === '') {
        throw new ConfigError('download.baseUrl must be a non-empty URL');
    }
    if (typeof timeoutMs !== 'number' || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        throw new ConfigError(`download.timeoutMs must be a positive number, got ${String(timeoutMs)}`);
    }
    if (!Number.isSafeInteger(maxRetries) || maxRetries < 0) {
        throw new ConfigError(`download.maxRetries must be a non-negative integer, got ${String(maxRetries)}`);
    }
    return config;
}

/**
 * Parse a sampling fraction from its textual form.
 * Only plain positive integers are accepted ("3", not "3.0" or "1e2").
 */
export function parseFraction(value: string): number {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        throw new ConfigError(`Fraction must be a positive integer, got '${value}'`);
    }
    const fraction = Number(trimmed);
    if (!Number.isSafeInteger(fraction) || fraction < 1) {
        throw new ConfigError(`Fraction must be a positive integer, got '${value}'`);
    }
    return fraction;
}
