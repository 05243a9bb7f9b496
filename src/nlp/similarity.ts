/**
 * Ratcliff/Obershelp sequence similarity.
 *
 * The longest common contiguous block is located first, then the same
 * search recurses into the unmatched text on either side of it. The score is
 * `2 * M / T`, with M the total length of all matched blocks and T the
 * combined length of both strings.
 */

interface Block {
    i: number;
    j: number;
    size: number;
}

/**
 * Longest block common to `a[alo:ahi]` and `b[blo:bhi]`. On ties the block
 * starting earliest in `a` wins, then the one starting earliest in `b`.
 */
function longestBlock(
    a: string[],
    bIndex: Map<string, number[]>,
    alo: number,
    ahi: number,
    blo: number,
    bhi: number
): Block {
    let best: Block = { i: alo, j: blo, size: 0 };
    // runLengths.get(j) = length of the match ending at a[i - 1], b[j]
    let runLengths = new Map<number, number>();

    for (let i = alo; i < ahi; i++) {
        const next = new Map<number, number>();
        for (const j of bIndex.get(a[i] ?? '') ?? []) {
            if (j < blo) continue;
            if (j >= bhi) break;
            const size = (runLengths.get(j - 1) ?? 0) + 1;
            next.set(j, size);
            if (size > best.size) {
                best = { i: i - size + 1, j: j - size + 1, size };
            }
        }
        runLengths = next;
    }

    return best;
}

/**
 * Total number of characters in matching blocks between `a` and `b`.
 */
export function matchedCharacters(a: string[], b: string[]): number {
    const bIndex = new Map<string, number[]>();
    b.forEach((ch, j) => {
        const positions = bIndex.get(ch);
        if (positions) positions.push(j);
        else bIndex.set(ch, [j]);
    });

    let matched = 0;
    const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

    for (let range = pending.pop(); range; range = pending.pop()) {
        const [alo, ahi, blo, bhi] = range;
        const { i, j, size } = longestBlock(a, bIndex, alo, ahi, blo, bhi);
        if (size === 0) continue;

        matched += size;
        if (alo < i && blo < j) pending.push([alo, i, blo, j]);
        if (i + size < ahi && j + size < bhi) pending.push([i + size, ahi, j + size, bhi]);
    }

    return matched;
}

/**
 * Case-insensitive similarity ratio in [0, 1]. Two empty strings score 1.
 */
export function sequenceRatio(left: string, right: string): number {
    const a = Array.from(left.toLowerCase());
    const b = Array.from(right.toLowerCase());
    const total = a.length + b.length;
    if (total === 0) return 1.0;

    return (2 * matchedCharacters(a, b)) / total;
}

/**
 * Cheap upper bound on `sequenceRatio` from the lengths alone.
 */
export function ratioUpperBound(left: string, right: string): number {
    const la = Array.from(left.toLowerCase()).length;
    const lb = Array.from(right.toLowerCase()).length;
    const total = la + lb;
    if (total === 0) return 1.0;

    return (2 * Math.min(la, lb)) / total;
}
