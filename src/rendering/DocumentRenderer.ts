import type { PixelBuffer } from '../comparison/types.js';

/**
 * An open document. Must be closed by whoever opened it; use withDocument.
 */
export interface RenderedDocument {
    readonly pageCount: number;
    /** Plain text of a zero-based page */
    pageText(pageIndex: number): string;
    /** RGB raster of a zero-based page at the given resolution */
    renderPage(pageIndex: number, dpi: number): PixelBuffer;
    close(): void;
}

/**
 * Rendering/text-extraction capability, resolved once per process.
 */
export interface DocumentRenderer {
    readonly name: string;
    /** false for the stub used when no rendering library could be loaded */
    readonly available: boolean;
    open(filePath: string): Promise<RenderedDocument>;
}

/**
 * Scoped acquisition: the document is closed on every exit path of fn.
 */
export async function withDocument<T>(
    renderer: DocumentRenderer,
    filePath: string,
    fn: (doc: RenderedDocument) => T | Promise<T>
): Promise<T> {
    const doc = await renderer.open(filePath);
    try {
        return await fn(doc);
    } finally {
        doc.close();
    }
}
