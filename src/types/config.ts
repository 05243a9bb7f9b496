/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * IRI prefixes used when reading entity names and minting card nodes.
 */
export interface NamespaceConfig {
    /** Base vocabulary namespace of the knowledge graph */
    base: string;
    /** Namespace holding the graph's entities */
    resource: string;
    /** Generic schema vocabulary (name, subjectOf, additionalType, ...) */
    schema: string;
    /** Namespace under which card nodes are minted */
    card: string;
}

/**
 * Full cardlink configuration merged from CLI flags, env vars, and config file.
 */
export interface CardLinkConfig {
    // Paths
    input: string;
    catalog: string;
    out: string;

    // Matching
    threshold: number;
    namePredicates: string[];

    // Linking
    namespaces: NamespaceConfig;
    setLabelPrefix: string;
    progressEvery: number;

    // Catalog download
    catalogUrl?: string;
    httpTimeout: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

export const DEFAULT_NAMESPACES: NamespaceConfig = {
    base: 'http://tolkiengateway.semanticweb.org/',
    resource: 'http://tolkiengateway.semanticweb.org/resource/',
    schema: 'http://schema.org/',
    card: 'http://metw.org/card/',
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CardLinkConfig = {
    input: './data/rdf/tolkien_kg.ttl',
    catalog: './data/external/cards.json',
    out: './data/rdf/tolkien_kg_enriched.ttl',
    threshold: 0.85,
    namePredicates: ['http://schema.org/name'],
    namespaces: DEFAULT_NAMESPACES,
    setLabelPrefix: 'METW Set',
    progressEvery: 50,
    httpTimeout: 30000,
    logLevel: 'info',
    jsonLogs: false,
};
