/**
 * Barrel export for all shared types.
 */
export type { WordToken, WordSet, SampleFilter } from './words.js';
export { REPORT_FIELDS } from './report.js';
export type { ComparisonResult, OracleReport } from './report.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    OracleConfig,
    LogLevel,
    ReportFormat,
    DownloadConfig,
    HistoryConfig,
    RunRecord,
} from './config.js';
