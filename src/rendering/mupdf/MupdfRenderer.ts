import * as fs from 'fs/promises';
import type { DocumentRenderer, RenderedDocument } from '../DocumentRenderer.js';
import { MupdfDocument } from './MupdfDocument.js';

export type MupdfModule = typeof import('mupdf');

/**
 * Renderer backed by the mupdf WebAssembly build.
 * Stateless between calls: every open reads the file and returns a fresh handle.
 */
export class MupdfRenderer implements DocumentRenderer {
    readonly name = 'mupdf';
    readonly available = true;

    constructor(private readonly lib: MupdfModule) { }

    async open(filePath: string): Promise<RenderedDocument> {
        const data = await fs.readFile(filePath);
        const doc = this.lib.Document.openDocument(data, 'application/pdf');
        try {
            return new MupdfDocument(this.lib, doc);
        } catch (error) {
            doc.destroy();
            throw error;
        }
    }
}
