import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as path from 'path';
import { PdfComparator } from '../../src/comparison/PdfComparator.js';
import { isCompared, type ComparedPairResult, type PairResult } from '../../src/comparison/types.js';
import { UnavailableRenderer } from '../../src/rendering/UnavailableRenderer.js';
import { FakeRenderer, makeTempDir, raster, writeFile } from '../helpers/fakeRenderer.js';

function expectCompared(result: PairResult): ComparedPairResult {
    if (!isCompared(result)) {
        throw new Error(`expected a compared result, got ${result.status}`);
    }
    return result;
}

describe('PdfComparator', () => {
    let dir: string;
    let renderer: FakeRenderer;

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        dir = makeTempDir();
        renderer = new FakeRenderer();
    });

    describe('missing inputs', () => {
        it('should score 0 with an error when the candidate is missing', async () => {
            const reference = writeFile(dir, 'reference.pdf');

            const result = await new PdfComparator(renderer).compare({
                name: 'sheet',
                candidatePath: path.join(dir, 'nope.pdf'),
                referencePath: reference
            });

            expect(result).toEqual({
                status: 'MISSING_CANDIDATE',
                name: 'sheet',
                candidateExists: false,
                referenceExists: true,
                error: 'Candidate PDF not found',
                overallScore: 0
            });
            expect('textSimilarity' in result).toBe(false);
            expect(renderer.opened).toBe(0);
        });

        it('should score 0 with an error when the reference is missing', async () => {
            const candidate = writeFile(dir, 'candidate.pdf');

            const result = await new PdfComparator(renderer).compare({
                name: 'sheet',
                candidatePath: candidate,
                referencePath: path.join(dir, 'nope.pdf')
            });

            expect(result.status).toBe('MISSING_REFERENCE');
            expect(result.overallScore).toBe(0);
            expect(!isCompared(result) && result.error).toBe('Reference PDF not found');
        });

        it('should report the candidate first when both are missing', async () => {
            const result = await new PdfComparator(renderer).compare({
                name: 'ghost',
                candidatePath: path.join(dir, 'a.pdf'),
                referencePath: path.join(dir, 'b.pdf')
            });

            expect(result.status).toBe('MISSING_CANDIDATE');
            expect(result.candidateExists).toBe(false);
            expect(result.referenceExists).toBe(false);
        });

        it('should treat a directory as a missing file', async () => {
            const reference = writeFile(dir, 'reference.pdf');

            const result = await new PdfComparator(renderer).compare({
                name: 'dir',
                candidatePath: dir,
                referencePath: reference
            });

            expect(result.status).toBe('MISSING_CANDIDATE');
        });
    });

    describe('with a renderer', () => {
        it('should score identical single-page documents 1.0', async () => {
            const candidate = writeFile(dir, 'candidate.pdf', 'candidate bytes');
            const reference = writeFile(dir, 'reference.pdf', 'ref');
            renderer.add(candidate, [{ text: 'Total 42', raster: raster(100, 100) }]);
            renderer.add(reference, [{ text: 'Total 42', raster: raster(100, 100) }]);

            const result = expectCompared(await new PdfComparator(renderer).compare({
                name: 'same',
                candidatePath: candidate,
                referencePath: reference
            }));

            expect(result.candidateSize).toBe(15);
            expect(result.referenceSize).toBe(3);
            expect(result.candidatePages).toBe(1);
            expect(result.referencePages).toBe(1);
            expect(result.textSimilarity).toBe(1);
            expect(result.textDiff).toBe('(identical)');
            expect(result.visualScores).toEqual([1]);
            expect(result.visualAverage).toBe(1);
            expect(result.pageScore).toBe(1);
            expect(result.overallScore).toBe(1);
            expect(result.textExtractWarning).toBeUndefined();
            expect(renderer.closed).toBe(renderer.opened);
        });

        it('should prefer page-agnostic similarity when pagination differs', async () => {
            const candidate = writeFile(dir, 'candidate.pdf');
            const reference = writeFile(dir, 'reference.pdf');
            renderer.add(candidate, [
                { text: 'Hello', raster: raster(100, 100) },
                { text: 'World', raster: raster(100, 100) }
            ]);
            renderer.add(reference, [{ text: 'Hello World', raster: raster(100, 100) }]);

            const result = expectCompared(await new PdfComparator(renderer).compare({
                name: 'split',
                candidatePath: candidate,
                referencePath: reference
            }));

            expect(result.candidateText).toBe('Hello\n---PAGE---\nWorld');
            expect(result.referenceText).toBe('Hello World');
            expect(result.pageAwareSimilarity).toBe(0.6061);
            expect(result.pageAgnosticSimilarity).toBe(0.9091);
            expect(result.textSimilarity).toBe(0.9091);
            expect(result.visualScores).toEqual([1, 0]);
            expect(result.visualAverage).toBe(0.5);
            expect(result.pageScore).toBe(0.5);
            // 0.4 * 0.9091 + 0.4 * 0.5 + 0.2 * 0.5
            expect(result.overallScore).toBe(0.6636);
        });

        it('should compare rasters of different dimensions without failing', async () => {
            const candidate = writeFile(dir, 'candidate.pdf');
            const reference = writeFile(dir, 'reference.pdf');
            const tall = raster(100, 100);
            tall.samples.fill(200, 15000);
            renderer.add(candidate, [{ text: 'x', raster: tall }]);
            renderer.add(reference, [{ text: 'x', raster: raster(100, 50) }]);

            const result = expectCompared(await new PdfComparator(renderer).compare({
                name: 'sizes',
                candidatePath: candidate,
                referencePath: reference
            }));

            expect(result.visualScores).toEqual([1]);
            expect(result.overallScore).toBe(1);
        });

        it('should score two empty documents as identical text', async () => {
            const candidate = writeFile(dir, 'candidate.pdf');
            const reference = writeFile(dir, 'reference.pdf');
            renderer.add(candidate, []);
            renderer.add(reference, []);

            const result = expectCompared(await new PdfComparator(renderer).compare({
                name: 'empty',
                candidatePath: candidate,
                referencePath: reference
            }));

            expect(result.textSimilarity).toBe(1);
            expect(result.visualScores).toEqual([]);
            expect(result.visualAverage).toBe(0);
            // 0.4 * 1 + 0.4 * 0 + 0.2 * 1
            expect(result.overallScore).toBe(0.6);
        });

        it('should fall back on both sides and keep the warning when text extraction fails', async () => {
            const candidate = writeFile(dir, 'candidate.pdf', 'BT (Hello) Tj ET');
            const reference = writeFile(dir, 'reference.pdf', 'BT (Hello) Tj ET');
            renderer.add(candidate, [{ text: 'rendered', raster: raster(4, 4) }]);
            renderer.add(reference, [{ text: 'rendered', raster: raster(4, 4) }]);
            renderer.failText.add(candidate);

            const result = expectCompared(await new PdfComparator(renderer).compare({
                name: 'broken',
                candidatePath: candidate,
                referencePath: reference
            }));

            expect(result.textExtractWarning).toBe('broken text layer');
            expect(result.candidateText).toBe('Hello');
            expect(result.referenceText).toBe('Hello');
            expect(result.visualScores).toEqual([1]);
            expect(renderer.closed).toBe(renderer.opened);
        });

        it('should pass the configured dpi to the rasterizer', async () => {
            const candidate = writeFile(dir, 'candidate.pdf');
            const reference = writeFile(dir, 'reference.pdf');
            renderer.add(candidate, [{ text: 'a' }]);
            renderer.add(reference, [{ text: 'a' }]);

            await new PdfComparator(renderer, { dpi: 96 }).compare({
                name: 'dpi',
                candidatePath: candidate,
                referencePath: reference
            });

            expect(renderer.renderCalls.every((call) => call.dpi === 96)).toBe(true);
        });

        it('should disable visual scoring for a document the renderer cannot open', async () => {
            const candidate = writeFile(dir, 'candidate.pdf', 'BT (Hello) Tj ET');
            const reference = writeFile(dir, 'reference.pdf', 'BT (Hello) Tj ET');
            renderer.add(reference, [{ text: 'Hello', raster: raster(4, 4) }]);
            renderer.failOpen.add(candidate);

            const result = expectCompared(await new PdfComparator(renderer).compare({
                name: 'corrupt',
                candidatePath: candidate,
                referencePath: reference
            }));

            expect(result.candidatePages).toBeNull();
            expect(result.referencePages).toBe(1);
            expect(result.visualScores).toBeNull();
            expect(result.textExtractWarning).toBe('cannot open candidate.pdf');
            // text 1 stands in for visual, page counts differ
            expect(result.overallScore).toBe(0.9);
        });
    });

    describe('without a renderer', () => {
        it('should compare fallback text and let text stand in for the visual score', async () => {
            const candidate = writeFile(dir, 'candidate.pdf', 'BT (Hello) Tj ET');
            const reference = writeFile(dir, 'reference.pdf', 'BT (Hallo) Tj ET');

            const result = expectCompared(await new PdfComparator(new UnavailableRenderer()).compare({
                name: 'plain',
                candidatePath: candidate,
                referencePath: reference
            }));

            expect(result.candidatePages).toBeNull();
            expect(result.referencePages).toBeNull();
            expect(result.visualScores).toBeNull();
            expect(result.visualAverage).toBeNull();
            expect(result.textSimilarity).toBe(0.8);
            expect(result.pageScore).toBe(1);
            expect(result.overallScore).toBe(0.84);
            expect(result.textExtractWarning).toBeUndefined();
        });
    });

    describe('result contract', () => {
        it('should freeze the result', async () => {
            const candidate = writeFile(dir, 'candidate.pdf');
            const reference = writeFile(dir, 'reference.pdf');
            renderer.add(candidate, [{ text: 'a' }]);
            renderer.add(reference, [{ text: 'a' }]);

            const result = expectCompared(await new PdfComparator(renderer).compare({
                name: 'frozen',
                candidatePath: candidate,
                referencePath: reference
            }));

            expect(Object.isFrozen(result)).toBe(true);
            expect(Object.isFrozen(result.visualScores)).toBe(true);
        });

        it('should produce identical results on repeated runs', async () => {
            const candidate = writeFile(dir, 'candidate.pdf');
            const reference = writeFile(dir, 'reference.pdf');
            renderer.add(candidate, [{ text: 'Q1 revenue 10', raster: raster(20, 20, 3) }, { text: 'notes' }]);
            renderer.add(reference, [{ text: 'Q1 revenue 12', raster: raster(20, 10, 3) }]);
            const comparator = new PdfComparator(renderer);
            const testCase = { name: 'repeat', candidatePath: candidate, referencePath: reference };

            const first = await comparator.compare(testCase);
            const second = await comparator.compare(testCase);

            expect(second).toEqual(first);
            expect(JSON.stringify(second)).toBe(JSON.stringify(first));
        });
    });
});
