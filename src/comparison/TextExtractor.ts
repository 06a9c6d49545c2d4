import * as fs from 'fs';
import { withDocument, type DocumentRenderer } from '../rendering/DocumentRenderer.js';
import { ErrorHandler, ErrorSeverity } from '../shared/utils/ErrorHandler.js';
import type { PageText } from './types.js';

export type ExtractionMethod = 'renderer' | 'fallback';

export interface ExtractionResult {
    pages: PageText;
    method: ExtractionMethod;
    /** Set when the renderer was available but failed on this document */
    warning?: string;
}

export interface PairExtraction {
    candidate: PageText;
    reference: PageText;
    warning?: string;
}

/** Literal strings of PDF text-showing operators: (Hello) Tj */
const PDF_STRING_LITERAL = /\(([^)]*)\)/g;

/**
 * Scrape parenthesised string literals out of the raw PDF bytes.
 * Never throws: an unreadable file yields a single empty page.
 */
export function extractTextFallback(filePath: string): PageText {
    const raw = ErrorHandler.safeExecuteSync(
        // latin1 maps every byte to a char, so decoding cannot fail
        () => fs.readFileSync(filePath).toString('latin1'),
        { component: 'TextExtractor', operation: 'extractTextFallback', data: { filePath } },
        '',
        ErrorSeverity.WARNING
    );

    const strings: string[] = [];
    for (const match of raw.matchAll(PDF_STRING_LITERAL)) {
        strings.push(match[1] ?? '');
    }
    return [strings.join('\n')];
}

export class TextExtractor {
    constructor(private readonly renderer: DocumentRenderer) { }

    /**
     * Per-page text through the renderer, or the raw-string fallback when the
     * renderer is unavailable or fails on this document.
     */
    async extract(filePath: string): Promise<ExtractionResult> {
        if (!this.renderer.available) {
            return { pages: extractTextFallback(filePath), method: 'fallback' };
        }

        try {
            const pages = await withDocument(this.renderer, filePath, (doc) => {
                const texts: string[] = [];
                for (let i = 0; i < doc.pageCount; i++) {
                    texts.push(doc.pageText(i));
                }
                return texts;
            });
            return { pages, method: 'renderer' };
        } catch (error) {
            const info = ErrorHandler.handle(
                error,
                { component: 'TextExtractor', operation: 'extract', data: { filePath } },
                ErrorSeverity.WARNING
            );
            return { pages: extractTextFallback(filePath), method: 'fallback', warning: info.message };
        }
    }

    /**
     * Extract both sides with one method. If either side had to fall back
     * after a renderer failure, the other side is re-read with the fallback too.
     */
    async extractPair(candidatePath: string, referencePath: string): Promise<PairExtraction> {
        const candidate = await this.extract(candidatePath);
        const reference = await this.extract(referencePath);

        const warning = candidate.warning ?? reference.warning;
        if (warning === undefined) {
            return { candidate: candidate.pages, reference: reference.pages };
        }

        return {
            candidate: candidate.method === 'fallback' ? candidate.pages : extractTextFallback(candidatePath),
            reference: reference.method === 'fallback' ? reference.pages : extractTextFallback(referencePath),
            warning
        };
    }
}
