import * as path from 'path';
import pixelmatch from 'pixelmatch';
import sharp from 'sharp';
import { ErrorHandler, ErrorSeverity } from '../shared/utils/ErrorHandler.js';
import { FileSystemHelper } from '../shared/utils/FileSystemHelper.js';
import type { PageRasterizer } from './PageRasterizer.js';
import { roundScore } from './ScoreAggregator.js';
import type { PageImageRecord, PixelBuffer } from './types.js';

export interface VisualComparison {
    /** One rounded score per page, over the longer document */
    scores: number[];
    average: number;
    images?: PageImageRecord[];
}

export interface VisualCompareInput {
    name: string;
    candidatePath: string;
    referencePath: string;
    candidatePages: number;
    referencePages: number;
}

const RGB_CHANNELS = 3;

/**
 * Fraction of byte-equal samples. Buffers of different dimensions are compared
 * over the overlapping prefix of their sample sequences only.
 */
export function pixelSimilarity(a: PixelBuffer | null, b: PixelBuffer | null): number {
    if (!a || !b) return 0.0;

    if (a.width !== b.width || a.height !== b.height) {
        const overlap = Math.min(a.samples.length, b.samples.length);
        if (overlap === 0) return 0.0;
        return countEqual(a.samples, b.samples, overlap) / overlap;
    }

    const total = a.samples.length;
    if (total === 0) return 1.0;
    return countEqual(a.samples, b.samples, total) / total;
}

function countEqual(a: Uint8Array, b: Uint8Array, length: number): number {
    let matching = 0;
    for (let i = 0; i < length; i++) {
        if (a[i] === b[i]) matching++;
    }
    return matching;
}

export function averageScore(scores: readonly number[]): number {
    if (scores.length === 0) return 0.0;
    return roundScore(scores.reduce((sum, s) => sum + s, 0) / scores.length);
}

function toRGBA(buffer: PixelBuffer): Buffer {
    const pixels = buffer.width * buffer.height;
    const rgba = Buffer.alloc(pixels * 4);
    for (let p = 0; p < pixels; p++) {
        rgba[p * 4] = buffer.samples[p * RGB_CHANNELS];
        rgba[p * 4 + 1] = buffer.samples[p * RGB_CHANNELS + 1];
        rgba[p * 4 + 2] = buffer.samples[p * RGB_CHANNELS + 2];
        rgba[p * 4 + 3] = 255;
    }
    return rgba;
}

export class VisualComparator {
    /**
     * @param imagesDir when set, page renderings and diff overlays are written here
     */
    constructor(
        private readonly rasterizer: PageRasterizer,
        private readonly imagesDir: string | null = null,
        private readonly threshold: number = 0.1
    ) { }

    /**
     * Score every page of the longer document. A page missing on either side,
     * or one the renderer fails on, scores 0.
     */
    async compare(input: VisualCompareInput): Promise<VisualComparison> {
        const pageCount = Math.max(input.candidatePages, input.referencePages);
        const scores: number[] = [];
        const images: PageImageRecord[] = [];

        if (this.imagesDir) {
            FileSystemHelper.ensureDir(this.imagesDir);
        }

        for (let page = 0; page < pageCount; page++) {
            const candidate = await this.renderSafely(input.candidatePath, page);
            const reference = await this.renderSafely(input.referencePath, page);
            scores.push(roundScore(pixelSimilarity(candidate, reference)));

            if (this.imagesDir) {
                images.push(await this.saveImages(this.imagesDir, input.name, page, candidate, reference));
            }
        }

        const result: VisualComparison = { scores, average: averageScore(scores) };
        if (this.imagesDir) {
            result.images = images;
        }
        return result;
    }

    private async renderSafely(filePath: string, page: number): Promise<PixelBuffer | null> {
        return ErrorHandler.safeExecute(
            () => this.rasterizer.render(filePath, page),
            { component: 'VisualComparator', operation: 'render', data: { filePath, page } },
            null,
            ErrorSeverity.WARNING
        );
    }

    private async saveImages(
        dir: string,
        name: string,
        page: number,
        candidate: PixelBuffer | null,
        reference: PixelBuffer | null
    ): Promise<PageImageRecord> {
        const base = `${name}_p${page + 1}`;
        const record: PageImageRecord = {
            page: page + 1,
            candidateImage: candidate ? await this.writeRaster(dir, `${base}_candidate.png`, candidate) : null,
            referenceImage: reference ? await this.writeRaster(dir, `${base}_reference.png`, reference) : null,
            diffImage: null
        };

        if (candidate && reference && candidate.width === reference.width && candidate.height === reference.height) {
            record.diffImage = await this.writeDiff(dir, `${base}_diff.png`, candidate, reference);
        }
        return record;
    }

    private async writeRaster(dir: string, fileName: string, buffer: PixelBuffer): Promise<string | null> {
        return ErrorHandler.safeExecute(
            async () => {
                await sharp(buffer.samples, {
                    raw: { width: buffer.width, height: buffer.height, channels: RGB_CHANNELS }
                }).png().toFile(path.join(dir, fileName));
                return fileName;
            },
            { component: 'VisualComparator', operation: 'writeRaster', data: { fileName } },
            null,
            ErrorSeverity.WARNING
        );
    }

    private async writeDiff(dir: string, fileName: string, a: PixelBuffer, b: PixelBuffer): Promise<string | null> {
        if (a.width === 0 || a.height === 0) return null;

        return ErrorHandler.safeExecute(
            async () => {
                const { width, height } = a;
                const diff = Buffer.alloc(width * height * 4);
                const diffPixels = pixelmatch(toRGBA(a), toRGBA(b), diff, width, height, { threshold: this.threshold });
                if (diffPixels === 0) return null;

                await sharp(diff, { raw: { width, height, channels: 4 } }).png().toFile(path.join(dir, fileName));
                return fileName;
            },
            { component: 'VisualComparator', operation: 'writeDiff', data: { fileName } },
            null,
            ErrorSeverity.WARNING
        );
    }
}
