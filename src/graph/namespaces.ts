import { DataFactory, type NamedNode } from 'n3';
import type { NamespaceConfig } from '../types/index.js';

const { namedNode } = DataFactory;

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';

/**
 * Predicates and classes the linker writes.
 */
export interface Vocabulary {
    type: NamedNode;
    label: NamedNode;
    thing: NamedNode;
    subjectOf: NamedNode;
    additionalType: NamedNode;
    additionalProperty: NamedNode;
    isPartOf: NamedNode;
}

export function buildVocabulary(namespaces: NamespaceConfig): Vocabulary {
    const schema = (local: string) => namedNode(`${namespaces.schema}${local}`);
    return {
        type: namedNode(`${RDF_NS}type`),
        label: namedNode(`${RDFS_NS}label`),
        thing: schema('Thing'),
        subjectOf: schema('subjectOf'),
        additionalType: schema('additionalType'),
        additionalProperty: schema('additionalProperty'),
        isPartOf: schema('isPartOf'),
    };
}

/**
 * Prefix bindings written at the top of serialized graphs.
 */
export function prefixBindings(namespaces: NamespaceConfig): Record<string, string> {
    return {
        rdf: RDF_NS,
        rdfs: RDFS_NS,
        tg: namespaces.base,
        tgr: namespaces.resource,
        schema: namespaces.schema,
        metw: namespaces.card,
    };
}
