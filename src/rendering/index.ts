/**
 * Process-wide rendering capability.
 *
 * mupdf is imported dynamically so that a missing or broken install degrades
 * to the unavailable stub instead of failing at module load.
 */

import { ErrorHandler } from '../shared/utils/ErrorHandler.js';
import { createLogger } from '../shared/utils/Logger.js';
import type { DocumentRenderer } from './DocumentRenderer.js';
import { MupdfRenderer } from './mupdf/MupdfRenderer.js';
import { UnavailableRenderer } from './UnavailableRenderer.js';

export { withDocument, type DocumentRenderer, type RenderedDocument } from './DocumentRenderer.js';
export { MupdfRenderer } from './mupdf/MupdfRenderer.js';
export { UnavailableRenderer } from './UnavailableRenderer.js';

const log = createLogger('Renderer');

let resolved: Promise<DocumentRenderer> | null = null;

async function loadRenderer(): Promise<DocumentRenderer> {
    try {
        const lib = await import('mupdf');
        log.debug('Using mupdf for text extraction and rasterization');
        return new MupdfRenderer(lib);
    } catch (error) {
        const reason = ErrorHandler.describe(error);
        log.warn(`mupdf could not be loaded (${reason}). Text falls back to raw string scraping and visual comparison is disabled.`);
        return new UnavailableRenderer(reason);
    }
}

/**
 * Resolve the renderer once; later calls share the same instance.
 */
export function resolveRenderer(): Promise<DocumentRenderer> {
    if (!resolved) {
        resolved = loadRenderer();
    }
    return resolved;
}

/** Forget the resolved renderer (tests) */
export function resetRenderer(): void {
    resolved = null;
}
