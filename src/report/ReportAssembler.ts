import { LOW_SCORE_THRESHOLD, REPORT } from '../config/constants.js';
import { roundScore } from '../comparison/ScoreAggregator.js';
import type { PairResult } from '../comparison/types.js';

export interface LowScoreEntry {
    name: string;
    score: number;
}

export interface ScoreBands {
    /** overall >= 0.9 */
    good: number;
    /** 0.7 <= overall < 0.9 */
    fair: number;
    poor: number;
}

export interface BatchSummary {
    generatedAt: string;
    results: readonly PairResult[];
    total: number;
    averageScore: number;
    lowScoreThreshold: number;
    /** Cases at or above the threshold */
    passedCount: number;
    /** Cases below the threshold, worst first */
    needsAttention: readonly LowScoreEntry[];
    missingCount: number;
    bands: ScoreBands;
}

export type ScoreBand = keyof ScoreBands;

export function scoreBand(score: number): ScoreBand {
    if (score >= REPORT.GOOD_SCORE) return 'good';
    if (score >= REPORT.FAIR_SCORE) return 'fair';
    return 'poor';
}

/**
 * Build the batch summary from the complete result set.
 */
export function summarize(results: readonly PairResult[], now: Date = new Date()): BatchSummary {
    const total = results.length;
    const sum = results.reduce((acc, r) => acc + r.overallScore, 0);

    const needsAttention = results
        .filter((r) => r.overallScore < LOW_SCORE_THRESHOLD)
        .map((r) => ({ name: r.name, score: r.overallScore }))
        .sort((x, y) => x.score - y.score || x.name.localeCompare(y.name));

    const bands: ScoreBands = { good: 0, fair: 0, poor: 0 };
    for (const r of results) {
        bands[scoreBand(r.overallScore)]++;
    }

    return Object.freeze({
        generatedAt: now.toISOString(),
        results: Object.freeze([...results]),
        total,
        averageScore: total > 0 ? roundScore(sum / total) : 0,
        lowScoreThreshold: LOW_SCORE_THRESHOLD,
        passedCount: total - needsAttention.length,
        needsAttention: Object.freeze(needsAttention),
        missingCount: results.filter((r) => r.status !== 'COMPARED').length,
        bands: Object.freeze(bands)
    });
}
