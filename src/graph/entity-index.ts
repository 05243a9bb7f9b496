import type { Store } from 'n3';
import type { EntityRef, NamedEntity } from '../types/index.js';
import { nameKeys } from '../nlp/normalize.js';

/**
 * Read-only mapping from normalized name key to graph entity.
 */
export type EntityIndex = ReadonlyMap<string, EntityRef>;

/**
 * Decides which entity a key keeps when two names normalize to it.
 */
export type ConflictPolicy = (existing: EntityRef, incoming: EntityRef, key: string) => EntityRef;

/** Later entity in enumeration order replaces the earlier one. */
export const lastWriteWins: ConflictPolicy = (_existing, incoming) => incoming;

/** First entity in enumeration order is kept. */
export const firstWriteWins: ConflictPolicy = (existing) => existing;

/**
 * Build the index in one pass. Each name contributes its normalized key and
 * its space-stripped key; empty keys are skipped. When the graph holds
 * duplicate names the index guarantees a plausible entity per key, chosen by
 * `policy`, not the single correct one.
 */
export function buildEntityIndex(
    entries: Iterable<NamedEntity>,
    policy: ConflictPolicy = lastWriteWins
): EntityIndex {
    const index = new Map<string, EntityRef>();

    for (const { entity, name } of entries) {
        for (const key of nameKeys(name)) {
            const existing = index.get(key);
            index.set(key, existing ? policy(existing, entity, key) : entity);
        }
    }

    return index;
}

/**
 * Enumerate every `(entity, name)` pair in the graph for the given name
 * predicates. Only named/blank-node subjects with literal names count.
 */
export function* collectNamedEntities(store: Store, namePredicates: readonly string[]): Generator<NamedEntity> {
    for (const predicate of namePredicates) {
        for (const quad of store.getQuads(null, predicate, null, null)) {
            const { subject, object } = quad;
            if (subject.termType !== 'NamedNode' && subject.termType !== 'BlankNode') continue;
            if (object.termType !== 'Literal') continue;
            yield { entity: subject, name: object.value };
        }
    }
}
