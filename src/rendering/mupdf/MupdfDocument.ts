import type { Document } from 'mupdf';
import type { PixelBuffer } from '../../comparison/types.js';
import { POINTS_PER_INCH } from '../../config/constants.js';
import type { RenderedDocument } from '../DocumentRenderer.js';
import type { MupdfModule } from './MupdfRenderer.js';

export class MupdfDocument implements RenderedDocument {
    readonly pageCount: number;
    private closed = false;

    constructor(
        private readonly lib: MupdfModule,
        private readonly doc: Document
    ) {
        this.pageCount = doc.countPages();
    }

    pageText(pageIndex: number): string {
        this.assertPage(pageIndex);
        const page = this.doc.loadPage(pageIndex);
        try {
            const stext = page.toStructuredText('preserve-whitespace');
            try {
                return stext.asText();
            } finally {
                stext.destroy();
            }
        } finally {
            page.destroy();
        }
    }

    renderPage(pageIndex: number, dpi: number): PixelBuffer {
        this.assertPage(pageIndex);
        const scale = dpi / POINTS_PER_INCH;
        const page = this.doc.loadPage(pageIndex);
        try {
            const pixmap = page.toPixmap(
                this.lib.Matrix.scale(scale, scale),
                this.lib.ColorSpace.DeviceRGB,
                false
            );
            try {
                return {
                    width: pixmap.getWidth(),
                    height: pixmap.getHeight(),
                    // Copy out of WebAssembly memory before the pixmap is freed
                    samples: new Uint8Array(pixmap.getPixels())
                };
            } finally {
                pixmap.destroy();
            }
        } finally {
            page.destroy();
        }
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.doc.destroy();
    }

    private assertPage(pageIndex: number): void {
        if (this.closed) {
            throw new Error('Document is closed');
        }
        if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= this.pageCount) {
            throw new RangeError(`Page ${pageIndex} out of range (0-${this.pageCount - 1})`);
        }
    }
}
