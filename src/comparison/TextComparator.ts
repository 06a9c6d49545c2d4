import { structuredPatch } from 'diff';
import {
    DIFF_CONTEXT_LINES,
    IDENTICAL_DIFF_MARKER,
    PAGE_BREAK_MARKER
} from '../config/constants.js';
import { roundScore } from './ScoreAggregator.js';
import { similarityRatio } from './SequenceMatcher.js';
import type { PageText } from './types.js';

export interface TextSimilarity {
    pageAware: number;
    pageAgnostic: number;
    /** The higher of the two views */
    best: number;
}

/**
 * Join pages with the page-break marker and trim the ends
 */
export function flattenPages(pages: PageText): string {
    return pages.join(PAGE_BREAK_MARKER).trim();
}

export function stripPageBreaks(flattened: string): string {
    return flattened.split(PAGE_BREAK_MARKER).join('\n');
}

function scoreTexts(a: string, b: string): number {
    if (a.length === 0 && b.length === 0) return 1.0;
    return roundScore(similarityRatio(a, b));
}

/**
 * Similarity of the flattened texts with page-break markers kept
 */
export function pageAwareSimilarity(candidate: string, reference: string): number {
    return scoreTexts(candidate, reference);
}

/**
 * Similarity with page breaks collapsed to plain newlines, so content that only
 * paginates differently is not penalised
 */
export function pageAgnosticSimilarity(candidate: string, reference: string): number {
    return scoreTexts(stripPageBreaks(candidate), stripPageBreaks(reference));
}

export function textSimilarity(candidate: string, reference: string): TextSimilarity {
    const pageAware = pageAwareSimilarity(candidate, reference);
    const pageAgnostic = pageAgnosticSimilarity(candidate, reference);
    return { pageAware, pageAgnostic, best: Math.max(pageAware, pageAgnostic) };
}

/**
 * Hunk range in unified-diff form: a single line is just its number, and an
 * empty range points at the line before it
 */
function formatRange(start: number, length: number): string {
    if (length === 1) return `${start}`;
    if (length === 0) return `${start - 1},0`;
    return `${start},${length}`;
}

/**
 * Unified diff of the flattened texts, or the identical marker
 */
export function unifiedTextDiff(candidate: string, reference: string, name: string): string {
    const fromFile = `candidate/${name}.pdf`;
    const toFile = `reference/${name}.pdf`;
    const patch = structuredPatch(fromFile, toFile, candidate, reference, '', '', {
        context: DIFF_CONTEXT_LINES
    });

    if (patch.hunks.length === 0) {
        return IDENTICAL_DIFF_MARKER;
    }

    const lines = [`--- ${fromFile}`, `+++ ${toFile}`];
    for (const hunk of patch.hunks) {
        lines.push(`@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`);
        for (const line of hunk.lines) {
            // end-of-file newline notices carry no content difference
            if (line.startsWith('\\')) continue;
            lines.push(line);
        }
    }
    return lines.join('\n');
}
