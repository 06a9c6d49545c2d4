import { DEFAULT_DPI } from '../config/constants.js';
import { withDocument, type DocumentRenderer } from '../rendering/DocumentRenderer.js';
import type { PixelBuffer } from './types.js';

export class PageRasterizer {
    constructor(
        private readonly renderer: DocumentRenderer,
        readonly dpi: number = DEFAULT_DPI
    ) { }

    get available(): boolean {
        return this.renderer.available;
    }

    /**
     * Render one zero-based page. A page past the end is not an error: it is
     * reported as null. The document is opened and released within the call.
     */
    async render(filePath: string, pageIndex: number, dpi: number = this.dpi): Promise<PixelBuffer | null> {
        return withDocument(this.renderer, filePath, (doc) => {
            if (pageIndex < 0 || pageIndex >= doc.pageCount) {
                return null;
            }
            return doc.renderPage(pageIndex, dpi);
        });
    }

    /**
     * Number of pages. Rejects when the renderer cannot open the document.
     */
    async countPages(filePath: string): Promise<number> {
        return withDocument(this.renderer, filePath, (doc) => doc.pageCount);
    }
}
