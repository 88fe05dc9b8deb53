import { Command, InvalidArgumentError, Option } from 'commander';
import { ConfigError, parseFraction, resolveConfig } from '../utils/config.js';
import { initLogger, logFailure } from '../utils/logger.js';
import { runOracle } from '../oracle/run-oracle.js';
import { formatReport, formatRunLine } from '../report/format.js';
import { DictionaryCache } from '../cache/dictionary-cache.js';
import { RunHistory } from '../storage/history.js';
import { SUPPORTED_LANGUAGES, type Language } from '../dictionary/languages.js';
import { DEFAULT_CONFIG, type OracleConfig, type LogLevel, type ReportFormat } from '../types/index.js';
import { VERSION } from '../version.js';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];
const REPORT_FORMATS: ReportFormat[] = ['json', 'text'];

function fractionArg(value: string): number {
    try {
        return parseFraction(value);
    } catch (error) {
        if (error instanceof ConfigError) throw new InvalidArgumentError(error.message);
        throw error;
    }
}

function limitArg(value: string): number {
    const limit = parseInt(value, 10);
    if (isNaN(limit) || limit < 1) {
        throw new InvalidArgumentError('Limit must be a positive integer.');
    }
    return limit;
}

const program = new Command();

program
    .name('wordlist-oracle')
    .description(
        'Check a candidate word list (one word per line) against an authoritative dictionary.\n' +
        'Only aggregate counts, recall and precision are reported; no reference word is ever printed.'
    )
    .version(VERSION);

// ─── CHECK command ────────────────────────────────────────

program
    .command('check', { isDefault: true })
    .description('Compare candidate words from stdin (or --input) with the reference dictionary')
    .addOption(
        new Option('-l, --language <language>', `Dictionary language (default: ${DEFAULT_CONFIG.language})`)
            .choices(SUPPORTED_LANGUAGES)
    )
    .option('-f, --fraction <n>', 'Include only 1/N of words, by hash (default: 1 = all)', fractionArg)
    .option('-n, --nonce <string>', 'Salt for the sampling hash (default: empty)')
    .option('-i, --input <path>', 'Read candidate words from a file instead of stdin')
    .addOption(new Option('--format <format>', 'Report format (default: json)').choices(REPORT_FORMATS))
    .option('--cache-dir <dir>', 'Dictionary cache directory')
    .option('--no-cache', 'Always download the dictionary, do not read or write the cache')
    .option('--base-url <url>', 'Base URL of the dictionary archives')
    .option('--record [dbPath]', 'Record the aggregates of this run in a SQLite history')
    .addOption(new Option('--log-level <level>', 'Log level (default: info)').choices(LOG_LEVELS))
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts) => {
        const record: boolean | string | undefined = opts.record;

        const cliConfig: Partial<OracleConfig> = {
            ...(opts.language !== undefined && { language: opts.language as Language }),
            ...(opts.fraction !== undefined && { fraction: opts.fraction as number }),
            ...(opts.nonce !== undefined && { nonce: opts.nonce as string }),
            ...(opts.input !== undefined && { input: opts.input as string }),
            ...(opts.format !== undefined && { format: opts.format as ReportFormat }),
            ...(opts.cacheDir !== undefined && { cacheDir: opts.cacheDir as string }),
            ...(opts.cache === false && { noCache: true }),
            ...(record !== undefined && {
                history: {
                    enabled: true,
                    path: typeof record === 'string' ? record : DEFAULT_CONFIG.history.path,
                },
            }),
            ...(opts.logLevel !== undefined && { logLevel: opts.logLevel as LogLevel }),
            ...(opts.jsonLogs === true && { jsonLogs: true }),
        };
        if (opts.baseUrl !== undefined) {
            cliConfig.download = { ...DEFAULT_CONFIG.download, baseUrl: opts.baseUrl };
        }

        let config: OracleConfig;
        try {
            config = await resolveConfig(cliConfig);
        } catch (error) {
            console.error(error instanceof Error ? error.message : String(error));
            process.exit(1);
        }

        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        try {
            const result = await runOracle(config);
            console.log(formatReport(result, config.format));
        } catch (error) {
            logFailure(error, 'Check failed');
            process.exit(1);
        }
    });

// ─── LANGUAGES command ────────────────────────────────────

program
    .command('languages')
    .description('List supported dictionary languages')
    .action(() => {
        for (const language of SUPPORTED_LANGUAGES) {
            console.log(language);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the dictionary cache')
    .argument('<action>', 'Action: clear | stats')
    .option('--cache-dir <dir>', 'Dictionary cache directory')
    .action(async (action: string, opts) => {
        let config: OracleConfig;
        try {
            config = await resolveConfig(opts.cacheDir !== undefined ? { cacheDir: opts.cacheDir } : {});
        } catch (error) {
            console.error(error instanceof Error ? error.message : String(error));
            process.exit(1);
        }
        const cache = new DictionaryCache({ cacheDir: config.cacheDir });

        switch (action) {
            case 'clear':
                console.log(cache.clear() ? 'Cache cleared.' : 'No cache to clear.');
                break;
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache: ${stats.entries} dictionaries, ${(stats.totalBytes / 1024).toFixed(1)} KB in ${stats.directory}`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exit(1);
        }
    });

// ─── HISTORY command ──────────────────────────────────────

program
    .command('history')
    .description('Show recorded runs')
    .option('--db <dbPath>', 'History database path', DEFAULT_CONFIG.history.path)
    .option('--limit <n>', 'Number of runs to show', limitArg, 20)
    .addOption(new Option('-l, --language <language>', 'Only runs for this language').choices(SUPPORTED_LANGUAGES))
    .action((opts) => {
        try {
            const history = new RunHistory(opts.db);
            const runs = history.listRuns({ limit: opts.limit, language: opts.language });
            history.close();

            if (runs.length === 0) {
                console.log('No runs recorded.');
                return;
            }
            for (const run of runs) {
                console.log(formatRunLine(run));
            }
        } catch (error) {
            console.error('History failed:', error);
            process.exit(1);
        }
    });

await program.parseAsync();
