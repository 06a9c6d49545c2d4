import { DEFAULT_DPI, ERRORS } from '../config/constants.js';
import type { DocumentRenderer } from '../rendering/DocumentRenderer.js';
import { ErrorHandler, ErrorSeverity } from '../shared/utils/ErrorHandler.js';
import { FileSystemHelper } from '../shared/utils/FileSystemHelper.js';
import { createLogger } from '../shared/utils/Logger.js';
import { PageRasterizer } from './PageRasterizer.js';
import { aggregateScore, pageCountScore } from './ScoreAggregator.js';
import { flattenPages, textSimilarity, unifiedTextDiff } from './TextComparator.js';
import { TextExtractor } from './TextExtractor.js';
import type {
    ComparedPairResult,
    ComparisonCase,
    ComparisonState,
    DocumentRef,
    MissingInputResult,
    PairResult
} from './types.js';
import { VisualComparator, type VisualComparison } from './VisualComparator.js';

export interface PdfComparatorOptions {
    dpi?: number;
    /** Directory for page renderings; omit to skip image export */
    imagesDir?: string | null;
}

const log = createLogger('PdfComparator');

function freezeResult<T extends PairResult>(result: T): T {
    if (result.status === 'COMPARED') {
        if (result.visualScores) Object.freeze(result.visualScores);
        if (result.pageImages) {
            result.pageImages.forEach((record) => Object.freeze(record));
            Object.freeze(result.pageImages);
        }
    }
    return Object.freeze(result);
}

/**
 * Drives one candidate/reference pair through extraction, text and visual
 * scoring and aggregation. Never throws for a single case.
 */
export class PdfComparator {
    private readonly extractor: TextExtractor;
    private readonly rasterizer: PageRasterizer;
    private readonly visual: VisualComparator;

    constructor(
        private readonly renderer: DocumentRenderer,
        options: PdfComparatorOptions = {}
    ) {
        this.extractor = new TextExtractor(renderer);
        this.rasterizer = new PageRasterizer(renderer, options.dpi ?? DEFAULT_DPI);
        this.visual = new VisualComparator(this.rasterizer, options.imagesDir ?? null);
    }

    async compare(testCase: ComparisonCase): Promise<PairResult> {
        const { name } = testCase;
        this.transition(name, 'NOT_STARTED');

        const candidate = this.resolve(testCase.candidatePath);
        const reference = this.resolve(testCase.referencePath);
        this.transition(name, 'EXISTENCE_CHECKED');

        if (!candidate.exists) {
            this.transition(name, 'MISSING_CANDIDATE');
            return this.finalize(name, this.missing(name, candidate, reference, 'MISSING_CANDIDATE'));
        }
        if (!reference.exists) {
            this.transition(name, 'MISSING_REFERENCE');
            return this.finalize(name, this.missing(name, candidate, reference, 'MISSING_REFERENCE'));
        }

        const result = await this.computeMetrics(name, candidate, reference);
        this.transition(name, 'METRICS_COMPUTED');
        return this.finalize(name, result);
    }

    private resolve(filePath: string): DocumentRef {
        return FileSystemHelper.probe(filePath);
    }

    private missing(
        name: string,
        candidate: DocumentRef,
        reference: DocumentRef,
        status: MissingInputResult['status']
    ): MissingInputResult {
        return {
            status,
            name,
            candidateExists: candidate.exists,
            referenceExists: reference.exists,
            error: status === 'MISSING_CANDIDATE' ? ERRORS.MISSING_CANDIDATE : ERRORS.MISSING_REFERENCE,
            overallScore: 0.0
        };
    }

    private async computeMetrics(
        name: string,
        candidate: DocumentRef,
        reference: DocumentRef
    ): Promise<ComparedPairResult> {
        const candidatePages = await this.countPages(candidate.path);
        const referencePages = await this.countPages(reference.path);

        const extraction = await this.extractor.extractPair(candidate.path, reference.path);
        const candidateText = flattenPages(extraction.candidate);
        const referenceText = flattenPages(extraction.reference);
        const similarity = textSimilarity(candidateText, referenceText);

        let visual: VisualComparison | null = null;
        if (this.rasterizer.available && candidatePages !== null && referencePages !== null) {
            visual = await this.visual.compare({
                name,
                candidatePath: candidate.path,
                referencePath: reference.path,
                candidatePages,
                referencePages
            });
        }

        const pageScore = pageCountScore(candidatePages, referencePages);
        const visualAverage = visual ? visual.average : null;

        const result: ComparedPairResult = {
            status: 'COMPARED',
            name,
            candidateExists: true,
            referenceExists: true,
            candidateSize: candidate.size,
            referenceSize: reference.size,
            candidatePages,
            referencePages,
            candidateText,
            referenceText,
            pageAwareSimilarity: similarity.pageAware,
            pageAgnosticSimilarity: similarity.pageAgnostic,
            textSimilarity: similarity.best,
            textDiff: unifiedTextDiff(candidateText, referenceText, name),
            visualScores: visual ? visual.scores : null,
            visualAverage,
            pageScore,
            overallScore: aggregateScore(pageScore, similarity.best, visualAverage),
            ...(extraction.warning !== undefined ? { textExtractWarning: extraction.warning } : {}),
            ...(visual?.images ? { pageImages: visual.images } : {})
        };
        return result;
    }

    /**
     * Page count through the renderer; null when it is unavailable or cannot
     * open the document
     */
    private async countPages(filePath: string): Promise<number | null> {
        if (!this.renderer.available) return null;
        return ErrorHandler.safeExecute<number | null>(
            () => this.rasterizer.countPages(filePath),
            { component: 'PdfComparator', operation: 'countPages', data: { filePath } },
            null,
            ErrorSeverity.WARNING
        );
    }

    private finalize<T extends PairResult>(name: string, result: T): T {
        this.transition(name, 'FINALIZED');
        return freezeResult(result);
    }

    private transition(name: string, state: ComparisonState): void {
        log.debug(`${name}: ${state}`);
    }
}
