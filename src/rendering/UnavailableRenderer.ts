import { RendererUnavailableError } from '../shared/errors.js';
import type { DocumentRenderer, RenderedDocument } from './DocumentRenderer.js';

/**
 * Stands in for the real renderer when the rendering library cannot be loaded.
 * Every open rejects, which sends extraction down the fallback path and
 * disables visual scoring.
 */
export class UnavailableRenderer implements DocumentRenderer {
    readonly name = 'unavailable';
    readonly available = false;

    constructor(readonly reason: string = 'no rendering library installed') { }

    async open(_filePath: string): Promise<RenderedDocument> {
        throw new RendererUnavailableError(this.reason);
    }
}
