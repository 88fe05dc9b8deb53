import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, parseFraction, resolveConfig, validateConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('Config', () => {
    describe('DEFAULT_CONFIG', () => {
        it('should compare the German dictionary without sampling', () => {
            expect(DEFAULT_CONFIG.language).toBe('deutsch');
            expect(DEFAULT_CONFIG.fraction).toBe(1);
            expect(DEFAULT_CONFIG.nonce).toBe('');
        });

        it('should print JSON and keep no history by default', () => {
            expect(DEFAULT_CONFIG.format).toBe('json');
            expect(DEFAULT_CONFIG.history.enabled).toBe(false);
        });
    });

    describe('parseFraction', () => {
        it('should parse positive integers', () => {
            expect(parseFraction('1')).toBe(1);
            expect(parseFraction(' 7 ')).toBe(7);
            expect(parseFraction('1000')).toBe(1000);
        });

        it('should reject anything else', () => {
            for (const value of ['0', '-1', '1.5', '1e2', 'abc', '']) {
                expect(() => parseFraction(value)).toThrow(ConfigError);
            }
        });
    });

    describe('validateConfig', () => {
        it('should accept the defaults', () => {
            expect(validateConfig({ ...DEFAULT_CONFIG })).toEqual(DEFAULT_CONFIG);
        });

        it('should reject a zero fraction', () => {
            expect(() => validateConfig({ ...DEFAULT_CONFIG, fraction: 0 })).toThrow(
                'Fraction must be a positive integer, got 0'
            );
        });

        it('should reject a fractional fraction', () => {
            expect(() => validateConfig({ ...DEFAULT_CONFIG, fraction: 2.5 })).toThrow(ConfigError);
        });
    });

    describe('resolveConfig', () => {
        let configDir: string;

        beforeEach(() => {
            configDir = mkdtempSync(join(tmpdir(), 'wordlist-oracle-config-'));
        });

        afterEach(() => {
            vi.unstubAllEnvs();
            rmSync(configDir, { recursive: true, force: true });
        });

        function writeConfig(config: unknown): void {
            writeFileSync(join(configDir, 'wordlist-oracle.config.json'), JSON.stringify(config), 'utf-8');
        }

        it('should fall back to defaults without a config file', async () => {
            vi.stubEnv('WORDLIST_ORACLE_CACHE_DIR', '');
            vi.stubEnv('WORDLIST_ORACLE_BASE_URL', '');
            expect(await resolveConfig({}, configDir)).toEqual(DEFAULT_CONFIG);
        });

        it('should let CLI flags override the config file', async () => {
            writeConfig({ language: 'english', fraction: 4, nonce: 'from-file', download: { timeoutMs: 5000 } });

            const config = await resolveConfig({ nonce: 'from-cli' }, configDir);

            expect(config.language).toBe('english');
            expect(config.fraction).toBe(4);
            expect(config.nonce).toBe('from-cli');
            expect(config.download).toEqual({ ...DEFAULT_CONFIG.download, timeoutMs: 5000 });
        });

        it('should read environment variables', async () => {
            writeConfig({ cacheDir: '/from/file' });
            vi.stubEnv('WORDLIST_ORACLE_CACHE_DIR', '/from/env');
            vi.stubEnv('WORDLIST_ORACLE_BASE_URL', 'https://mirror.example.test');

            const config = await resolveConfig({}, configDir);

            expect(config.cacheDir).toBe('/from/env');
            expect(config.download.baseUrl).toBe('https://mirror.example.test');
        });

        it('should reject an unsupported language from the config file', async () => {
            writeConfig({ language: 'klingon' });
            await expect(resolveConfig({}, configDir)).rejects.toThrow(ConfigError);
            await expect(resolveConfig({}, configDir)).rejects.toThrow(/^Unsupported language 'klingon'\. Choose from: brazilian, /);
        });

        it('should reject an invalid fraction from the config file', async () => {
            writeConfig({ fraction: -3 });
            await expect(resolveConfig({}, configDir)).rejects.toThrow('Fraction must be a positive integer, got -3');
        });

        it('should reject an unknown report format', async () => {
            writeConfig({ format: 'xml' });
            await expect(resolveConfig({}, configDir)).rejects.toThrow('Invalid format: xml. Valid: json, text');
        });

        it('should reject an unknown log level before the logger starts', async () => {
            writeConfig({ logLevel: 'verbose' });
            await expect(resolveConfig({}, configDir)).rejects.toThrow(
                'Invalid log level: verbose. Valid: error, warn, info, debug, silent'
            );
        });

        it('should reject a non-boolean jsonLogs', async () => {
            writeConfig({ jsonLogs: 'yes' });
            await expect(resolveConfig({}, configDir)).rejects.toThrow('jsonLogs must be true or false');
        });

        it('should reject bad download settings', async () => {
            writeConfig({ download: { timeoutMs: 0 } });
            await expect(resolveConfig({}, configDir)).rejects.toThrow('download.timeoutMs must be a positive number, got 0');

            writeConfig({ download: { maxRetries: -1 } });
            await expect(resolveConfig({}, configDir)).rejects.toThrow('download.maxRetries must be a non-negative integer, got -1');

            writeConfig({ download: { maxRetries: 'many' } });
            await expect(resolveConfig({}, configDir)).rejects.toThrow(ConfigError);
        });
    });
});
