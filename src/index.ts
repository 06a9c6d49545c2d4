export * from './comparison/types.js';
export { PdfComparator, type PdfComparatorOptions } from './comparison/PdfComparator.js';
export { BatchRunner, collectCaseNames, type BatchRunnerOptions, type ProgressCallback } from './comparison/BatchRunner.js';
export { TextExtractor, extractTextFallback, type ExtractionResult, type PairExtraction } from './comparison/TextExtractor.js';
export { PageRasterizer } from './comparison/PageRasterizer.js';
export { SequenceMatcher, similarityRatio, type MatchingBlock } from './comparison/SequenceMatcher.js';
export {
    flattenPages,
    pageAgnosticSimilarity,
    pageAwareSimilarity,
    stripPageBreaks,
    textSimilarity,
    unifiedTextDiff,
    type TextSimilarity
} from './comparison/TextComparator.js';
export { VisualComparator, averageScore, pixelSimilarity, type VisualComparison } from './comparison/VisualComparator.js';
export { aggregateScore, pageCountScore, roundScore } from './comparison/ScoreAggregator.js';
export { summarize, scoreBand, type BatchSummary, type LowScoreEntry, type ScoreBands } from './report/ReportAssembler.js';
export { ReportWriter, type ReportPaths } from './report/ReportWriter.js';
export {
    MupdfRenderer,
    UnavailableRenderer,
    resolveRenderer,
    withDocument,
    type DocumentRenderer,
    type RenderedDocument
} from './rendering/index.js';
export * from './config/constants.js';
export { loadSettings, type Settings } from './config/settings.js';
export { ConfigurationError, RendererUnavailableError, ReportWriteError } from './shared/errors.js';
