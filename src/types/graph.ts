import type { BlankNode, NamedNode, Quad } from 'n3';

/**
 * A knowledge-graph entity: the subject of at least one name statement.
 */
export type EntityRef = NamedNode | BlankNode;

/**
 * One `(entity, name)` pair enumerated from the graph.
 */
export interface NamedEntity {
    entity: EntityRef;
    name: string;
}

/**
 * Result of a successful name resolution.
 */
export interface EntityMatch {
    entity: EntityRef;
    /** Index key that produced the match */
    key: string;
    /** Similarity score; 1 for exact hits */
    score: number;
    method: 'exact' | 'fuzzy';
}

/**
 * A card node minted for a matched catalog record, with the statements
 * emitted for it.
 */
export interface CardLink {
    cardNode: NamedNode;
    entity: EntityRef;
    statements: Quad[];
}
