import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { CardLinkError, InputGraphNotFoundError } from '../utils/errors.js';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { runEnrichment, createMatcher } from '../builder/enricher.js';
import { loadGraph } from '../storage/graph-store.js';
import { collectNamedEntities } from '../graph/entity-index.js';
import { buildVocabulary } from '../graph/namespaces.js';
import { downloadCatalog } from '../sources/catalog-file.js';
import type { CardLinkConfig, LogLevel } from '../types/index.js';

const VERSION = '0.1.0';

/** Read-only commands log only warnings unless the file or environment asks for more */
const QUIET: ConfigOverrides = { logLevel: 'warn' };

interface CommonOptions {
    input?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface LinkOptions extends CommonOptions {
    catalog?: string;
    out?: string;
    threshold?: string;
}

interface MatchOptions extends CommonOptions {
    threshold?: string;
}

interface FetchOptions extends CommonOptions {
    url?: string;
    catalog?: string;
}

function parseThreshold(value: string | undefined): number | undefined {
    return value === undefined ? undefined : parseFloat(value);
}

/**
 * Resolve config, start the logger, and run `task`. Any failure is logged
 * and turns into exit code 1. `defaults` sit below the config file and the
 * environment.
 */
async function withConfig(
    overrides: ConfigOverrides,
    task: (config: CardLinkConfig) => Promise<void>,
    defaults: ConfigOverrides = {}
): Promise<void> {
    let config: CardLinkConfig;
    try {
        config = await resolveConfig(overrides, { defaults });
    } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
        return;
    }

    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    const logger = getLogger();

    try {
        await task(config);
    } catch (error) {
        if (error instanceof InputGraphNotFoundError) {
            logger.error({ path: error.path }, 'Knowledge graph not found, nothing was written');
        } else if (error instanceof HttpError) {
            logger.error({ status: error.status, retryable: error.retryable }, error.message);
        } else if (error instanceof CardLinkError) {
            logger.error(error.message);
        } else {
            logger.error({ err: error }, 'Run failed');
        }
        process.exitCode = 1;
    }
}

const program = new Command();

program
    .name('cardlink')
    .description('Link card-game catalog records to knowledge-graph entities by name.')
    .version(VERSION);

// ─── LINK command ─────────────────────────────────────────

program
    .command('link', { isDefault: true })
    .description('Enrich a knowledge graph with the cards of a catalog')
    .option('-i, --input <path>', 'Input Turtle graph (default ./data/rdf/tolkien_kg.ttl)')
    .option('-c, --catalog <path>', 'Catalog JSON (default ./data/external/cards.json)')
    .option('-o, --out <path>', 'Output Turtle graph (default ./data/rdf/tolkien_kg_enriched.ttl)')
    .option('-t, --threshold <n>', 'Fuzzy match threshold in [0, 1] (default 0.85)')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: LinkOptions) => {
        const overrides: ConfigOverrides = {
            input: opts.input,
            catalog: opts.catalog,
            out: opts.out,
            threshold: parseThreshold(opts.threshold),
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
        };

        await withConfig(overrides, async (config) => {
            const logger = getLogger();
            logger.info({ input: config.input, catalog: config.catalog, threshold: config.threshold }, 'Starting card enrichment');

            const summary = await runEnrichment(config);
            logger.info(
                {
                    output: summary.output,
                    linked: summary.linked,
                    unmatched: summary.unmatched,
                    triplesBefore: summary.triplesBefore,
                    triplesAfter: summary.triplesAfter,
                },
                summary.catalogFound ? 'Enrichment complete' : 'Catalog missing, graph saved unchanged'
            );
        });
    });

// ─── MATCH command ────────────────────────────────────────

program
    .command('match')
    .description('Resolve one name against the entities of a graph')
    .argument('<name>', 'Name to resolve')
    .option('-i, --input <path>', 'Input Turtle graph')
    .option('-t, --threshold <n>', 'Fuzzy match threshold in [0, 1]')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .action(async (name: string, opts: MatchOptions) => {
        const overrides: ConfigOverrides = {
            input: opts.input,
            threshold: parseThreshold(opts.threshold),
            logLevel: opts.logLevel,
        };

        await withConfig(overrides, async (config) => {
            const { store } = await loadGraph(config.input);
            const match = createMatcher(store, config.namePredicates).matchDetailed(name, config.threshold);

            if (!match) {
                console.log(`No match for "${name}" at threshold ${config.threshold}`);
                return;
            }

            console.log(`\n  Entity: ${match.entity.value}`);
            console.log(`  Key:    ${match.key}`);
            console.log(`  Score:  ${match.score.toFixed(3)}`);
            console.log(`  Method: ${match.method}\n`);
        }, QUIET);
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show graph statistics')
    .option('-i, --input <path>', 'Input Turtle graph')
    .action(async (opts: CommonOptions) => {
        await withConfig({ input: opts.input }, async (config) => {
            const { store } = await loadGraph(config.input);
            const vocab = buildVocabulary(config.namespaces);

            const entities = new Set<string>();
            for (const { entity } of collectNamedEntities(store, config.namePredicates)) {
                entities.add(entity.value);
            }
            const cards = new Set<string>();
            for (const quad of store.getQuads(null, vocab.subjectOf, null, null)) {
                if (quad.object.value.startsWith(config.namespaces.card)) cards.add(quad.object.value);
            }
            const matcher = createMatcher(store, config.namePredicates);

            console.log('\n📊 Knowledge Graph Statistics\n');
            console.log(`  Triples:      ${store.size}`);
            console.log(`  Entities:     ${entities.size}`);
            console.log(`  Index keys:   ${matcher.size}`);
            console.log(`  Linked cards: ${cards.size}`);
            console.log('');
        }, QUIET);
    });

// ─── FETCH command ────────────────────────────────────────

program
    .command('fetch')
    .description('Download the card catalog to the catalog path')
    .option('-u, --url <url>', 'Catalog URL (or catalogUrl in cardlink.config.json)')
    .option('-c, --catalog <path>', 'Where to store the catalog')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .action(async (opts: FetchOptions) => {
        const overrides: ConfigOverrides = {
            catalogUrl: opts.url,
            catalog: opts.catalog,
            logLevel: opts.logLevel,
        };

        await withConfig(overrides, async (config) => {
            if (!config.catalogUrl) {
                throw new CardLinkError('No catalog URL: pass --url or set catalogUrl in cardlink.config.json');
            }
            const client = new HttpClient({ timeout: config.httpTimeout, version: VERSION });
            const cards = await downloadCatalog(config.catalogUrl, config.catalog, client);
            console.log(`Saved ${cards} cards to ${config.catalog}`);
        });
    });

await program.parseAsync();
