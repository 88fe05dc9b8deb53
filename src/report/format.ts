import { REPORT_FIELDS, type ComparisonResult, type OracleReport, type ReportFormat, type RunRecord } from '../types/index.js';

/**
 * Convert a comparison result to the serialized report record.
 * Field order follows REPORT_FIELDS.
 */
export function toReport(result: ComparisonResult): OracleReport {
    return {
        language: result.language,
        nonce: result.nonce,
        fraction: result.fraction,
        reference_total: result.referenceTotal,
        reference_sampled: result.referenceSampled,
        candidate_total: result.candidateTotal,
        candidate_sampled: result.candidateSampled,
        true_positives: result.truePositives,
        false_positives: result.falsePositives,
        false_negatives: result.falseNegatives,
        recall_pct: result.recallPct,
        precision_pct: result.precisionPct,
    };
}

/**
 * Render a report as an aligned `key  value` listing.
 * Percentages always show 4 decimals.
 */
function formatText(report: OracleReport): string {
    const width = Math.max(...REPORT_FIELDS.map((field) => field.length));

    const lines = REPORT_FIELDS.map((field) => {
        const value = report[field];
        let rendered: string;
        if (field === 'recall_pct' || field === 'precision_pct') {
            rendered = Number(value).toFixed(4);
        } else if (field === 'nonce') {
            rendered = JSON.stringify(value);
        } else {
            rendered = String(value);
        }
        return `${field.padEnd(width)}  ${rendered}`;
    });

    return lines.join('\n');
}

/**
 * Serialize a comparison result for stdout.
 */
export function formatReport(result: ComparisonResult, format: ReportFormat): string {
    const report = toReport(result);

    switch (format) {
        case 'json':
            return JSON.stringify(report, null, 2);
        case 'text':
            return formatText(report);
    }
}

/**
 * One-line summary of a recorded run for `history` output.
 */
export function formatRunLine(run: RunRecord): string {
    return [
        `#${run.run_id ?? '?'}`,
        run.created_at,
        run.language,
        `fraction=${run.fraction}`,
        `nonce=${JSON.stringify(run.nonce)}`,
        `recall=${run.recall_pct.toFixed(4)}%`,
        `precision=${run.precision_pct.toFixed(4)}%`,
        `(tp=${run.true_positives} fp=${run.false_positives} fn=${run.false_negatives})`,
    ].join('  ');
}
