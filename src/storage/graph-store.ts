import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Parser, Store, Writer, type Quad } from 'n3';
import { GraphParseError, InputGraphNotFoundError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * A parsed graph together with the prefixes its file declared.
 */
export interface LoadedGraph {
    store: Store;
    prefixes: Record<string, string>;
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse Turtle text into quads, collecting declared prefixes.
 */
export function parseTurtle(text: string, prefixes: Record<string, string> = {}): Quad[] {
    const parser = new Parser({ format: 'Turtle' });
    return parser.parse(text, null, (prefix, iri) => {
        prefixes[prefix] = iri.value;
    });
}

/**
 * Serialize quads as Turtle.
 */
export function serializeTurtle(quads: Quad[], prefixes: Record<string, string>): Promise<string> {
    return new Promise((resolve, reject) => {
        const writer = new Writer({ prefixes, format: 'Turtle' });
        writer.addQuads(quads);
        writer.end((error, result) => (error ? reject(error) : resolve(result)));
    });
}

/**
 * Load a Turtle knowledge graph.
 *
 * @throws InputGraphNotFoundError when the file does not exist
 * @throws GraphParseError when the file is not valid Turtle
 */
export async function loadGraph(path: string): Promise<LoadedGraph> {
    const logger = getLogger('graph-store');
    logger.info({ path }, 'Loading knowledge graph');

    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        if (isNotFound(error)) throw new InputGraphNotFoundError(path);
        throw error;
    }

    const prefixes: Record<string, string> = {};
    let quads: Quad[];
    try {
        quads = parseTurtle(text, prefixes);
    } catch (error) {
        throw new GraphParseError(path, error);
    }

    const store = new Store(quads);
    logger.info({ triples: store.size }, 'Loaded existing triples');
    return { store, prefixes };
}

/**
 * Write a graph as Turtle, creating parent directories and replacing any
 * existing file. `prefixes` are declared at the top of the output.
 */
export async function saveGraph(store: Store, path: string, prefixes: Record<string, string>): Promise<void> {
    const logger = getLogger('graph-store');
    logger.info({ path }, 'Saving knowledge graph');

    await mkdir(dirname(path), { recursive: true });
    const text = await serializeTurtle(store.getQuads(null, null, null, null), prefixes);
    await writeFile(path, text, 'utf-8');

    logger.info({ triples: store.size }, 'Saved triples');
}
