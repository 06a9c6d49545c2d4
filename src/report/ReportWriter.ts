/**
 * Writes a batch summary as JSON and as a Markdown report.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import Handlebars from 'handlebars';
import { IDENTICAL_DIFF_MARKER, REPORT } from '../config/constants.js';
import { isCompared, type PairResult } from '../comparison/types.js';
import { ReportWriteError } from '../shared/errors.js';
import { FileSystemHelper } from '../shared/utils/FileSystemHelper.js';
import { scoreBand, type BatchSummary, type ScoreBand } from './ReportAssembler.js';

const DEFAULT_TEMPLATE = fileURLToPath(new URL('../../templates/comparison-report.md.hbs', import.meta.url));

const BADGES: Record<ScoreBand, string> = {
    good: '🟢',
    fair: '🟡',
    poor: '🔴'
};

const NOT_AVAILABLE = 'N/A';

export interface ReportPaths {
    json: string;
    markdown: string;
}

interface SummaryRow {
    index: number;
    badge: string;
    name: string;
    textSimilarity: string;
    visualAverage: string;
    pages: string;
    overall: string;
}

interface DetailSection {
    name: string;
    error?: string;
    textSimilarity?: string;
    pageAware?: string;
    pageAgnostic?: string;
    visualAverage?: string;
    overall?: string;
    candidatePages?: string;
    referencePages?: string;
    candidateSize?: number;
    referenceSize?: number;
    warning?: string;
    diff?: string;
    truncatedChars?: number;
}

function formatValue(value: number | null | undefined, fallback: string = NOT_AVAILABLE): string {
    return value === null || value === undefined ? fallback : String(value);
}

function toRow(result: PairResult, index: number): SummaryRow {
    const compared = isCompared(result) ? result : null;
    return {
        index: index + 1,
        badge: BADGES[scoreBand(result.overallScore)],
        name: result.name,
        textSimilarity: formatValue(compared?.textSimilarity),
        visualAverage: formatValue(compared?.visualAverage),
        pages: `${formatValue(compared?.candidatePages, '?')}/${formatValue(compared?.referencePages, '?')}`,
        overall: String(result.overallScore)
    };
}

function toDetail(result: PairResult): DetailSection {
    if (!isCompared(result)) {
        return { name: result.name, error: result.error };
    }

    const section: DetailSection = {
        name: result.name,
        textSimilarity: String(result.textSimilarity),
        pageAware: String(result.pageAwareSimilarity),
        pageAgnostic: String(result.pageAgnosticSimilarity),
        visualAverage: formatValue(result.visualAverage),
        overall: String(result.overallScore),
        candidatePages: formatValue(result.candidatePages, '?'),
        referencePages: formatValue(result.referencePages, '?'),
        candidateSize: result.candidateSize,
        referenceSize: result.referenceSize,
        warning: result.textExtractWarning
    };

    if (result.textDiff !== IDENTICAL_DIFF_MARKER) {
        const overflow = result.textDiff.length - REPORT.MAX_DIFF_CHARS;
        section.diff = overflow > 0 ? result.textDiff.slice(0, REPORT.MAX_DIFF_CHARS) : result.textDiff;
        if (overflow > 0) section.truncatedChars = overflow;
    }
    return section;
}

export class ReportWriter {
    private readonly render: ReturnType<typeof Handlebars.compile>;

    constructor(templatePath: string = DEFAULT_TEMPLATE) {
        const source = fs.readFileSync(templatePath, 'utf-8');
        // Markdown output: nothing to HTML-escape
        this.render = Handlebars.create().compile(source, { noEscape: true });
    }

    renderMarkdown(summary: BatchSummary): string {
        return this.render({
            generatedAt: summary.generatedAt,
            rows: summary.results.map(toRow),
            averageScore: summary.averageScore.toFixed(4),
            bands: summary.bands,
            missingCount: summary.missingCount,
            details: summary.results.map(toDetail),
            needsAttention: summary.needsAttention,
            threshold: summary.lowScoreThreshold
        });
    }

    /**
     * Write both reports. Throws ReportWriteError when either file cannot be written.
     */
    write(summary: BatchSummary, reportDir: string): ReportPaths {
        FileSystemHelper.ensureDir(reportDir);
        const paths: ReportPaths = {
            json: path.join(reportDir, REPORT.JSON_FILE),
            markdown: path.join(reportDir, REPORT.MARKDOWN_FILE)
        };

        if (!FileSystemHelper.safeWriteJSON(paths.json, summary)) {
            throw new ReportWriteError(paths.json);
        }
        if (!FileSystemHelper.safeWriteText(paths.markdown, this.renderMarkdown(summary))) {
            throw new ReportWriteError(paths.markdown);
        }
        return paths;
    }
}
