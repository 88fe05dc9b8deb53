import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runOracle } from '../oracle/run-oracle.js';
import { RunHistory } from '../storage/history.js';
import { SampleFilterError } from '../words/sampler.js';
import { DEFAULT_CONFIG, type OracleConfig } from '../types/index.js';
import { buildSuperDic } from './fixtures.js';

const reference = new Set(['CAT', 'DOG', 'BIRD']);

function makeConfig(overrides: Partial<OracleConfig> = {}): OracleConfig {
    return { ...DEFAULT_CONFIG, language: 'english', ...overrides };
}

describe('runOracle', () => {
    let workDir: string;

    beforeEach(() => {
        workDir = mkdtempSync(join(tmpdir(), 'wordlist-oracle-run-'));
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        rmSync(workDir, { recursive: true, force: true });
    });

    it('should compare injected reference and candidate words', async () => {
        const loadReference = vi.fn().mockResolvedValue(reference);

        const result = await runOracle(makeConfig(), {
            loadReference,
            candidateLines: ['cat', 'fish', 'Cat', ''],
        });

        expect(loadReference).toHaveBeenCalledWith('english');
        expect(result).toMatchObject({
            language: 'english',
            referenceTotal: 3,
            candidateTotal: 2,
            truePositives: 1,
            falsePositives: 1,
            falseNegatives: 2,
            recallPct: 33.3333,
            precisionPct: 50,
        });
    });

    it('should apply the configured sample filter', async () => {
        const result = await runOracle(makeConfig({ fraction: 2, nonce: '' }), {
            loadReference: async () => reference,
            candidateLines: ['cat', 'fish'],
        });

        expect(result.fraction).toBe(2);
        expect(result.referenceSampled).toBe(2);
        expect(result.candidateSampled).toBe(2);
        expect(result.recallPct).toBe(50);
    });

    it('should fail before loading anything when the fraction is invalid', async () => {
        const loadReference = vi.fn().mockResolvedValue(reference);

        await expect(
            runOracle(makeConfig({ fraction: 0 }), { loadReference, candidateLines: [] })
        ).rejects.toBeInstanceOf(SampleFilterError);
        expect(loadReference).not.toHaveBeenCalled();
    });

    it('should treat an empty candidate list as a zero-precision run', async () => {
        const result = await runOracle(makeConfig(), {
            loadReference: async () => reference,
            candidateLines: [],
        });

        expect(result.candidateTotal).toBe(0);
        expect(result.precisionPct).toBe(0);
        expect(result.recallPct).toBe(0);
    });

    it('should read candidates from an input file', async () => {
        const input = join(workDir, 'candidates.txt');
        writeFileSync(input, 'cat\r\nfish\n\nA\ndog\n', 'utf-8');

        const result = await runOracle(makeConfig({ input }), {
            loadReference: async () => reference,
        });

        expect(result.candidateTotal).toBe(3);
        expect(result.truePositives).toBe(2);
    });

    it('should load the reference from the dictionary cache', async () => {
        const cacheDir = join(workDir, 'cache');
        mkdirSync(cacheDir);
        writeFileSync(join(cacheDir, 'english.dic'), buildSuperDic(['cat=', 'dog=', 'bird=', 'owl=;1']));
        const mockFetch = vi.fn();
        vi.stubGlobal('fetch', mockFetch);

        const result = await runOracle(makeConfig({ cacheDir }), { candidateLines: ['cat', 'owl'] });

        expect(mockFetch).not.toHaveBeenCalled();
        expect(result.referenceTotal).toBe(3);
        expect(result.truePositives).toBe(1);
        expect(result.falsePositives).toBe(1);
    });

    it('should record aggregates in an injected history', async () => {
        const history = new RunHistory(':memory:');

        await runOracle(makeConfig({ nonce: 'n1' }), {
            loadReference: async () => reference,
            candidateLines: ['cat', 'fish'],
            history,
        });

        const runs = history.listRuns();
        history.close();
        expect(runs).toHaveLength(1);
        expect(runs[0]).toMatchObject({
            language: 'english',
            nonce: 'n1',
            true_positives: 1,
            false_negatives: 2,
            recall_pct: 33.3333,
        });
    });

    it('should open the configured history database', async () => {
        const path = join(workDir, 'history.db');

        await runOracle(makeConfig({ history: { enabled: true, path } }), {
            loadReference: async () => reference,
            candidateLines: ['dog'],
        });

        const history = new RunHistory(path);
        const runs = history.listRuns();
        history.close();
        expect(runs).toHaveLength(1);
        expect(runs[0]?.true_positives).toBe(1);
    });
});
