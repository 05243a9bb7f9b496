import type { Store } from 'n3';
import type { CardLink, CardLinkConfig, CatalogShapeKind, NamespaceConfig } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { buildEntityIndex, collectNamedEntities, lastWriteWins, type ConflictPolicy } from '../graph/entity-index.js';
import { EntityMatcher } from '../graph/matcher.js';
import { prefixBindings } from '../graph/namespaces.js';
import { extractCatalog } from '../sources/catalog.js';
import { readCatalogFile } from '../sources/catalog-file.js';
import { StatementBuilder } from '../storage/statement-builder.js';
import { loadGraph, saveGraph } from '../storage/graph-store.js';
import { CardLinker } from './linker.js';
import { getLogger } from '../utils/logger.js';

export interface EnrichOptions {
    threshold?: number;
    namePredicates?: readonly string[];
    namespaces?: NamespaceConfig;
    setLabelPrefix?: string;
    /** Log a progress line every this many links */
    progressEvery?: number;
    conflictPolicy?: ConflictPolicy;
}

export interface EnrichmentResult {
    catalogFound: boolean;
    shape: CatalogShapeKind | null;
    /** Card entries in the catalog payload */
    cardsFound: number;
    /** Entries without a usable name */
    skipped: number;
    linked: number;
    unmatched: number;
    links: CardLink[];
}

export interface EnrichmentSummary extends EnrichmentResult {
    output: string;
    triplesBefore: number;
    triplesAfter: number;
}

function emptyResult(catalogFound: boolean, shape: CatalogShapeKind | null): EnrichmentResult {
    return { catalogFound, shape, cardsFound: 0, skipped: 0, linked: 0, unmatched: 0, links: [] };
}

/**
 * Build a matcher over every named entity currently in `store`.
 */
export function createMatcher(
    store: Store,
    namePredicates: readonly string[] = DEFAULT_CONFIG.namePredicates,
    policy: ConflictPolicy = lastWriteWins
): EntityMatcher {
    const index = buildEntityIndex(collectNamedEntities(store, namePredicates), policy);
    getLogger('index').info({ entries: index.size }, 'Built entity index');
    return new EntityMatcher(index);
}

/**
 * Link every catalog card whose name resolves to a graph entity and append
 * the link statements to `builder`. The entity index is built from the
 * builder's statements before any card is linked.
 */
export function enrichWithCards(builder: StatementBuilder, payload: unknown, options: EnrichOptions = {}): EnrichmentResult {
    const logger = getLogger('enricher');
    const threshold = options.threshold ?? DEFAULT_CONFIG.threshold;
    const progressEvery = options.progressEvery ?? DEFAULT_CONFIG.progressEvery;

    const catalog = extractCatalog(payload);
    logger.info({ shape: catalog.shape, cards: catalog.total }, 'Found cards');

    if (catalog.total === 0) {
        logger.warn({ shape: catalog.shape }, 'No cards found in catalog, check its JSON structure');
        return emptyResult(true, catalog.shape);
    }

    const matcher = createMatcher(builder.store, options.namePredicates, options.conflictPolicy);
    const linker = new CardLinker({
        namespaces: options.namespaces ?? DEFAULT_CONFIG.namespaces,
        setLabelPrefix: options.setLabelPrefix,
    });

    const links: CardLink[] = [];
    let unmatched = 0;

    for (const card of catalog.records) {
        const entity = matcher.match(card.name, threshold);
        if (!entity) {
            unmatched++;
            logger.debug({ card: card.name }, 'No matching entity');
            continue;
        }

        links.push(linker.link(builder, card, entity));

        if (progressEvery > 0 && links.length % progressEvery === 0) {
            logger.info({ linked: links.length }, 'Linking cards');
        }
    }

    logger.info({ linked: links.length, unmatched, skipped: catalog.skipped }, 'Linked cards to entities');

    return {
        catalogFound: true,
        shape: catalog.shape,
        cardsFound: catalog.total,
        skipped: catalog.skipped,
        linked: links.length,
        unmatched,
        links,
    };
}

/**
 * Read the catalog at `path` and enrich `builder` with it. A missing file
 * is reported and links nothing.
 */
export async function enrichFromCatalogFile(
    builder: StatementBuilder,
    path: string,
    options: EnrichOptions = {}
): Promise<EnrichmentResult> {
    const catalog = await readCatalogFile(path);
    if (!catalog) {
        getLogger('enricher').warn({ path }, 'Catalog file not found, continuing without card enrichment');
        return emptyResult(false, null);
    }
    return enrichWithCards(builder, catalog.payload, options);
}

/**
 * One full run: load the graph, enrich it from the catalog, save it to the
 * output path. The output is written even when nothing was linked.
 *
 * @throws InputGraphNotFoundError before anything is written
 */
export async function runEnrichment(config: CardLinkConfig): Promise<EnrichmentSummary> {
    const { store, prefixes } = await loadGraph(config.input);
    const builder = new StatementBuilder(store);
    const triplesBefore = builder.size;

    const result = await enrichFromCatalogFile(builder, config.catalog, {
        threshold: config.threshold,
        namePredicates: config.namePredicates,
        namespaces: config.namespaces,
        setLabelPrefix: config.setLabelPrefix,
        progressEvery: config.progressEvery,
    });

    const enriched = builder.finalize();
    await saveGraph(enriched, config.out, { ...prefixes, ...prefixBindings(config.namespaces) });

    return { ...result, output: config.out, triplesBefore, triplesAfter: enriched.size };
}
