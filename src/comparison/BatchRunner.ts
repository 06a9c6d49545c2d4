/**
 * BatchRunner
 *
 * Compares every candidate PDF against the reference PDF of the same name.
 * Each case is isolated: a missing or unreadable file only affects its own result.
 */

import * as path from 'path';
import { DEFAULT_DPI } from '../config/constants.js';
import type { DocumentRenderer } from '../rendering/DocumentRenderer.js';
import { summarize, type BatchSummary } from '../report/ReportAssembler.js';
import { FileSystemHelper } from '../shared/utils/FileSystemHelper.js';
import { createLogger } from '../shared/utils/Logger.js';
import { PdfComparator } from './PdfComparator.js';
import type { ComparisonCase, PairResult } from './types.js';

export interface BatchRunnerOptions {
    candidateDir: string;
    referenceDir: string;
    dpi?: number;
    /** Directory for page renderings; omit to skip image export */
    imagesDir?: string | null;
    /** Cases compared at once */
    concurrency?: number;
}

export type ProgressCallback = (current: number, total: number, result: PairResult) => void;

const log = createLogger('BatchRunner');

const PDF_EXTENSION = '.pdf';

/**
 * Case names: stems of the PDFs found in either directory, sorted
 */
export function collectCaseNames(...dirs: string[]): string[] {
    const names = new Set<string>();
    for (const dir of dirs) {
        for (const file of FileSystemHelper.listFiles(dir, (f) => path.extname(f).toLowerCase() === PDF_EXTENSION)) {
            names.add(path.basename(file, path.extname(file)));
        }
    }
    return [...names].sort();
}

export class BatchRunner {
    private readonly comparator: PdfComparator;
    private readonly options: Required<BatchRunnerOptions>;

    constructor(renderer: DocumentRenderer, options: BatchRunnerOptions) {
        this.options = {
            candidateDir: options.candidateDir,
            referenceDir: options.referenceDir,
            dpi: options.dpi ?? DEFAULT_DPI,
            imagesDir: options.imagesDir ?? null,
            concurrency: Math.max(1, options.concurrency ?? 1)
        };
        this.comparator = new PdfComparator(renderer, {
            dpi: this.options.dpi,
            imagesDir: this.options.imagesDir
        });
    }

    cases(): ComparisonCase[] {
        const { candidateDir, referenceDir } = this.options;
        return collectCaseNames(candidateDir, referenceDir).map((name) => ({
            name,
            candidatePath: path.join(candidateDir, `${name}${PDF_EXTENSION}`),
            referencePath: path.join(referenceDir, `${name}${PDF_EXTENSION}`)
        }));
    }

    /**
     * Run all cases. Results keep name order whatever the concurrency.
     */
    async run(onProgress?: ProgressCallback): Promise<BatchSummary> {
        const cases = this.cases();
        if (cases.length === 0) {
            log.warn(`No PDF files found in ${this.options.candidateDir} or ${this.options.referenceDir}`);
            return summarize([]);
        }

        const results: PairResult[] = new Array<PairResult>(cases.length);
        let next = 0;
        let done = 0;

        const worker = async (): Promise<void> => {
            while (next < cases.length) {
                const index = next++;
                const result = await this.comparator.compare(cases[index]);
                results[index] = result;
                done++;
                onProgress?.(done, cases.length, result);
            }
        };

        const workers = Array.from({ length: Math.min(this.options.concurrency, cases.length) }, () => worker());
        await Promise.all(workers);

        return summarize(results);
    }
}
