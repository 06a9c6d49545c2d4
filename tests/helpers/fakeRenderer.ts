import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { PixelBuffer } from '../../src/comparison/types.js';
import type { DocumentRenderer, RenderedDocument } from '../../src/rendering/DocumentRenderer.js';

export interface FakePage {
    text: string;
    raster?: PixelBuffer;
}

export function raster(width: number, height: number, fill: number = 0): PixelBuffer {
    return { width, height, samples: new Uint8Array(width * height * 3).fill(fill) };
}

/**
 * In-process renderer keyed by file path. Counts opens and closes so tests can
 * check that every handle is released.
 */
export class FakeRenderer implements DocumentRenderer {
    readonly name = 'fake';
    readonly available = true;
    opened = 0;
    closed = 0;
    readonly renderCalls: Array<{ filePath: string; pageIndex: number; dpi: number }> = [];
    readonly failOpen = new Set<string>();
    readonly failText = new Set<string>();
    readonly failRender = new Set<string>();

    constructor(private readonly docs: Map<string, FakePage[]> = new Map()) { }

    add(filePath: string, pages: FakePage[]): this {
        this.docs.set(filePath, pages);
        return this;
    }

    async open(filePath: string): Promise<RenderedDocument> {
        if (this.failOpen.has(filePath)) {
            throw new Error(`cannot open ${path.basename(filePath)}`);
        }
        const pages = this.docs.get(filePath);
        if (!pages) {
            throw new Error(`unknown document ${filePath}`);
        }

        this.opened++;
        return {
            pageCount: pages.length,
            pageText: (pageIndex) => {
                if (this.failText.has(filePath)) {
                    throw new Error('broken text layer');
                }
                return pages[pageIndex].text;
            },
            renderPage: (pageIndex, dpi) => {
                this.renderCalls.push({ filePath, pageIndex, dpi });
                if (this.failRender.has(filePath)) {
                    throw new Error('broken page');
                }
                return pages[pageIndex].raster ?? raster(1, 1);
            },
            close: () => {
                this.closed++;
            }
        };
    }
}

export function makeTempDir(prefix: string = 'pdf-fidelity-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Write a file on disk so existence and size probes see it */
export function writeFile(dir: string, name: string, content: string | Buffer = '%PDF-1.4\n'): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
}
