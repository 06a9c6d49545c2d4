export interface DocumentRef {
    path: string;
    exists: boolean;
    size: number;
}

/** Text of each page, in page order */
export type PageText = string[];

/** One rendered page: RGB samples, no alpha, row-major */
export interface PixelBuffer {
    width: number;
    height: number;
    samples: Uint8Array;
}

export interface ComparisonCase {
    /** Identifier used for reporting only */
    name: string;
    candidatePath: string;
    referencePath: string;
}

export type ComparisonState =
    | 'NOT_STARTED'
    | 'EXISTENCE_CHECKED'
    | 'MISSING_CANDIDATE'
    | 'MISSING_REFERENCE'
    | 'METRICS_COMPUTED'
    | 'FINALIZED';

export interface PageImageRecord {
    page: number;
    candidateImage: string | null;
    referenceImage: string | null;
    diffImage: string | null;
}

interface PairResultBase {
    readonly name: string;
    readonly candidateExists: boolean;
    readonly referenceExists: boolean;
    readonly overallScore: number;
}

export interface MissingInputResult extends PairResultBase {
    readonly status: 'MISSING_CANDIDATE' | 'MISSING_REFERENCE';
    readonly error: string;
}

export interface ComparedPairResult extends PairResultBase {
    readonly status: 'COMPARED';
    readonly candidateSize: number;
    readonly referenceSize: number;
    /** null when no renderer could count pages */
    readonly candidatePages: number | null;
    readonly referencePages: number | null;
    readonly candidateText: string;
    readonly referenceText: string;
    readonly pageAwareSimilarity: number;
    readonly pageAgnosticSimilarity: number;
    /** max(pageAwareSimilarity, pageAgnosticSimilarity) */
    readonly textSimilarity: number;
    readonly textDiff: string;
    /** null when visual scoring was not performed */
    readonly visualScores: readonly number[] | null;
    readonly visualAverage: number | null;
    readonly pageScore: number;
    readonly textExtractWarning?: string;
    readonly pageImages?: readonly PageImageRecord[];
}

export type PairResult = MissingInputResult | ComparedPairResult;

export function isCompared(result: PairResult): result is ComparedPairResult {
    return result.status === 'COMPARED';
}
