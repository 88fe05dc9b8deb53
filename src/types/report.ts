/**
 * Aggregate outcome of one comparison.
 *
 * Only counts and percentages: no field here may ever hold a word or a
 * word collection, so reference content cannot leak through the result.
 */
export interface ComparisonResult {
    readonly language: string;
    readonly nonce: string;
    readonly fraction: number;
    readonly referenceTotal: number;
    readonly referenceSampled: number;
    readonly candidateTotal: number;
    readonly candidateSampled: number;
    readonly truePositives: number;
    readonly falsePositives: number;
    readonly falseNegatives: number;
    readonly recallPct: number;
    readonly precisionPct: number;
}

/**
 * Serialized report record, as printed to stdout and stored in the history.
 */
export interface OracleReport {
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

/**
 * Field order of the serialized report.
 */
export const REPORT_FIELDS = [
    'language',
    'nonce',
    'fraction',
    'reference_total',
    'reference_sampled',
    'candidate_total',
    'candidate_sampled',
    'true_positives',
    'false_positives',
    'false_negatives',
    'recall_pct',
    'precision_pct',
] as const satisfies ReadonlyArray<keyof OracleReport>;
