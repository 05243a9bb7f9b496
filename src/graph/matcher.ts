import type { EntityMatch, EntityRef } from '../types/index.js';
import type { EntityIndex } from './entity-index.js';
import { normalizeName } from '../nlp/normalize.js';
import { ratioUpperBound, sequenceRatio } from '../nlp/similarity.js';

export const DEFAULT_MATCH_THRESHOLD = 0.85;

/**
 * Resolves external names to graph entities.
 *
 * 1. Exact: the normalized candidate is looked up in the index. A hit is
 *    trusted unconditionally and beats any fuzzy score.
 * 2. Fuzzy: the raw candidate is scored against every key. A key replaces
 *    the current best only when it scores strictly higher and at least
 *    `threshold`, so ties go to the key seen first.
 *
 * Linear in the index size per unresolved name.
 */
export class EntityMatcher {
    constructor(private readonly index: EntityIndex) {}

    get size(): number {
        return this.index.size;
    }

    match(candidate: string, threshold = DEFAULT_MATCH_THRESHOLD): EntityRef | null {
        return this.matchDetailed(candidate, threshold)?.entity ?? null;
    }

    matchDetailed(candidate: string, threshold = DEFAULT_MATCH_THRESHOLD): EntityMatch | null {
        const key = normalizeName(candidate);
        if (!key) return null;

        const exact = this.index.get(key);
        if (exact) {
            return { entity: exact, key, score: 1.0, method: 'exact' };
        }

        let best: EntityMatch | null = null;
        let bestScore = 0.0;

        for (const [indexKey, entity] of this.index) {
            // Skip keys whose length alone rules them out
            const bound = ratioUpperBound(candidate, indexKey);
            if (bound <= bestScore || bound < threshold) continue;

            const score = sequenceRatio(candidate, indexKey);
            if (score > bestScore && score >= threshold) {
                bestScore = score;
                best = { entity, key: indexKey, score, method: 'fuzzy' };
            }
        }

        return best;
    }
}
