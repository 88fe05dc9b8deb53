import type { ComparisonResult, OracleConfig, WordSet } from '../types/index.js';
import type { Language } from '../dictionary/languages.js';
import { DictionaryCache } from '../cache/dictionary-cache.js';
import { fetchDictionary } from '../dictionary/fetch.js';
import { loadReferenceWords } from '../dictionary/superdic.js';
import { RunHistory } from '../storage/history.js';
import { toReport } from '../report/format.js';
import { normalizeWords } from '../words/normalize.js';
import { createSampleFilter } from '../words/sampler.js';
import { compareWordSets } from '../words/compare.js';
import { openCandidateStream, readLines } from '../words/input.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

/**
 * Collaborators of a run. Defaults read from the network/cache, stdin or
 * `config.input`, and `config.history`.
 */
export interface OracleDeps {
    loadReference?: (language: Language) => Promise<WordSet>;
    candidateLines?: Iterable<string> | AsyncIterable<string>;
    history?: RunHistory;
}

/**
 * Download (or read from cache) and decode the reference word set.
 */
export async function loadReferenceSet(language: Language, config: OracleConfig): Promise<WordSet> {
    const cache = new DictionaryCache({ cacheDir: config.cacheDir, enabled: !config.noCache });
    const data = await fetchDictionary(language, { cache, download: config.download });
    return loadReferenceWords(data);
}

/**
 * Run one comparison:
 *
 * 1. Validate the sample filter (before any I/O)
 * 2. Load the reference word set
 * 3. Read the candidate word set
 * 4. Compare sampled views
 * 5. Optionally record the aggregates in the run history
 *
 * Only counts are logged; reference words never leave this function.
 */
export async function runOracle(config: OracleConfig, deps: OracleDeps = {}): Promise<ComparisonResult> {
    const logger = getLogger();
    const filter = createSampleFilter(config.nonce, config.fraction);

    logger.info({ language: config.language }, 'Loading dictionary');
    const reference = deps.loadReference
        ? await deps.loadReference(config.language)
        : await loadReferenceSet(config.language, config);

    logger.info({ source: config.input ?? 'stdin' }, 'Reading candidate words');
    const candidate = await normalizeWords(
        deps.candidateLines ?? readLines(openCandidateStream(config.input))
    );

    const result = compareWordSets(reference, candidate, filter, config.language);
    logger.info(
        {
            referenceTotal: result.referenceTotal,
            referenceSampled: result.referenceSampled,
            candidateTotal: result.candidateTotal,
            candidateSampled: result.candidateSampled,
        },
        'Comparison complete'
    );

    if (deps.history) {
        const runId = deps.history.insertRun(toReport(result), VERSION);
        logger.debug({ runId }, 'Run recorded');
    } else if (config.history.enabled) {
        const history = new RunHistory(config.history.path);
        try {
            const runId = history.insertRun(toReport(result), VERSION);
            logger.debug({ runId, path: config.history.path }, 'Run recorded');
        } finally {
            history.close();
        }
    }

    return result;
}
