/**
 * Scoring policy for candidate vs reference PDF comparison.
 * Report thresholds downstream were calibrated against these exact values.
 */

// ============================================================
// SCORE WEIGHTS
// ============================================================

export const WEIGHTS = {
    /** Share of the overall score taken by text similarity */
    TEXT: 0.4,

    /** Share taken by the averaged per-page pixel similarity */
    VISUAL: 0.4,

    /** Share taken by the page-count match */
    PAGE: 0.2,
} as const;

export const TEXT_WEIGHT = WEIGHTS.TEXT;
export const VISUAL_WEIGHT = WEIGHTS.VISUAL;
export const PAGE_WEIGHT = WEIGHTS.PAGE;

/** Flat partial credit for any page-count mismatch, whatever its size */
export const PAGE_MISMATCH_SCORE = 0.5;

/** Cases scoring below this are listed as needing attention */
export const LOW_SCORE_THRESHOLD = 0.8;

/** Decimal digits kept on every reported score */
export const SCORE_PRECISION = 4;

// ============================================================
// RENDERING
// ============================================================

export const DEFAULT_DPI = 150;

/** PDF user space unit */
export const POINTS_PER_INCH = 72;

// ============================================================
// TEXT
// ============================================================

export const PAGE_BREAK_MARKER = '\n---PAGE---\n';

export const IDENTICAL_DIFF_MARKER = '(identical)';

/** Lines of context around each hunk of the text diff */
export const DIFF_CONTEXT_LINES = 3;

// ============================================================
// REPORT
// ============================================================

export const REPORT = {
    JSON_FILE: 'comparison_report.json',
    MARKDOWN_FILE: 'comparison_report.md',
    IMAGES_DIR: 'images',

    /** Longest text diff printed into the markdown report */
    MAX_DIFF_CHARS: 3000,

    /** Colour bands of the summary table */
    GOOD_SCORE: 0.9,
    FAIR_SCORE: 0.7,
} as const;

export const ERRORS = {
    MISSING_CANDIDATE: 'Candidate PDF not found',
    MISSING_REFERENCE: 'Reference PDF not found',
} as const;
