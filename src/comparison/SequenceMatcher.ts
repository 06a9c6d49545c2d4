/**
 * Longest-matching-block sequence alignment (Ratcliff/Obershelp).
 *
 * Finds the longest common contiguous block, then recurses on the pieces to
 * its left and right. With `autoJunk`, elements of a second sequence of 200+
 * items that occur in more than 1% of its positions (plus one) are "popular":
 * they never seed a match, though a match may still extend over them.
 */

export interface MatchingBlock {
    /** Start in the first sequence */
    a: number;
    /** Start in the second sequence */
    b: number;
    size: number;
}

const AUTOJUNK_MIN_LENGTH = 200;

export class SequenceMatcher {
    private readonly a: readonly string[];
    private readonly b: readonly string[];
    private readonly b2j = new Map<string, number[]>();
    private matchingBlocks: MatchingBlock[] | null = null;

    /**
     * Strings are compared by code point.
     */
    constructor(a: string | readonly string[], b: string | readonly string[], autoJunk: boolean = true) {
        this.a = typeof a === 'string' ? Array.from(a) : a;
        this.b = typeof b === 'string' ? Array.from(b) : b;
        this.indexSecondSequence(autoJunk);
    }

    private indexSecondSequence(autoJunk: boolean): void {
        this.b.forEach((element, j) => {
            const positions = this.b2j.get(element);
            if (positions) {
                positions.push(j);
            } else {
                this.b2j.set(element, [j]);
            }
        });

        const n = this.b.length;
        if (autoJunk && n >= AUTOJUNK_MIN_LENGTH) {
            const limit = Math.floor(n / 100) + 1;
            for (const [element, positions] of [...this.b2j]) {
                if (positions.length > limit) {
                    this.b2j.delete(element);
                }
            }
        }
    }

    /**
     * Longest block with a[i..i+size) == b[j..j+size) inside the given ranges.
     * Ties go to the block starting earliest in a, then earliest in b.
     */
    findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): MatchingBlock {
        const { a, b, b2j } = this;
        let bestI = alo;
        let bestJ = blo;
        let bestSize = 0;

        // lengths of matches ending at a[i-1], b[j], keyed by j
        let j2len = new Map<number, number>();
        for (let i = alo; i < ahi; i++) {
            const next = new Map<number, number>();
            const positions = b2j.get(a[i]) ?? [];
            for (const j of positions) {
                if (j < blo) continue;
                if (j >= bhi) break;
                const k = (j2len.get(j - 1) ?? 0) + 1;
                next.set(j, k);
                if (k > bestSize) {
                    bestI = i - k + 1;
                    bestJ = j - k + 1;
                    bestSize = k;
                }
            }
            j2len = next;
        }

        // Popular elements were left out of the index; grow the block over them
        while (bestI > alo && bestJ > blo && a[bestI - 1] === b[bestJ - 1]) {
            bestI--;
            bestJ--;
            bestSize++;
        }
        while (bestI + bestSize < ahi && bestJ + bestSize < bhi && a[bestI + bestSize] === b[bestJ + bestSize]) {
            bestSize++;
        }

        return { a: bestI, b: bestJ, size: bestSize };
    }

    /**
     * Non-overlapping matching blocks in increasing order, adjacent blocks
     * merged, terminated by a zero-size sentinel at (len(a), len(b)).
     */
    getMatchingBlocks(): MatchingBlock[] {
        if (this.matchingBlocks) return this.matchingBlocks;

        const la = this.a.length;
        const lb = this.b.length;
        const queue: Array<[number, number, number, number]> = [[0, la, 0, lb]];
        const found: MatchingBlock[] = [];

        while (queue.length > 0) {
            const range = queue.pop();
            if (!range) break;
            const [alo, ahi, blo, bhi] = range;
            const match = this.findLongestMatch(alo, ahi, blo, bhi);
            if (match.size === 0) continue;

            found.push(match);
            if (alo < match.a && blo < match.b) {
                queue.push([alo, match.a, blo, match.b]);
            }
            if (match.a + match.size < ahi && match.b + match.size < bhi) {
                queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
            }
        }

        found.sort((x, y) => x.a - y.a || x.b - y.b || x.size - y.size);

        const merged: MatchingBlock[] = [];
        for (const block of found) {
            const last = merged[merged.length - 1];
            if (last && last.a + last.size === block.a && last.b + last.size === block.b) {
                last.size += block.size;
            } else {
                merged.push({ ...block });
            }
        }
        merged.push({ a: la, b: lb, size: 0 });

        this.matchingBlocks = merged;
        return merged;
    }

    /**
     * 2 * matched / (len(a) + len(b)); 1.0 for two empty sequences
     */
    ratio(): number {
        const total = this.a.length + this.b.length;
        if (total === 0) return 1.0;
        const matched = this.getMatchingBlocks().reduce((sum, block) => sum + block.size, 0);
        return (2.0 * matched) / total;
    }
}

export function similarityRatio(a: string, b: string): number {
    return new SequenceMatcher(a, b).ratio();
}
