import {
    PAGE_MISMATCH_SCORE,
    PAGE_WEIGHT,
    SCORE_PRECISION,
    TEXT_WEIGHT,
    VISUAL_WEIGHT
} from '../config/constants.js';

/**
 * Round to a fixed number of decimal digits
 */
export function roundScore(value: number, digits: number = SCORE_PRECISION): number {
    return Number(value.toFixed(digits));
}

/**
 * 1.0 when the page counts agree, flat partial credit otherwise.
 * Two unknown counts (no renderer) agree.
 */
export function pageCountScore(candidatePages: number | null, referencePages: number | null): number {
    return candidatePages === referencePages ? 1.0 : PAGE_MISMATCH_SCORE;
}

/**
 * Weighted overall score. Without a visual score the text score stands in
 * for it.
 */
export function aggregateScore(pageScore: number, textScore: number, visualScore: number | null): number {
    const visual = visualScore ?? textScore;
    return roundScore(TEXT_WEIGHT * textScore + VISUAL_WEIGHT * visual + PAGE_WEIGHT * pageScore);
}
