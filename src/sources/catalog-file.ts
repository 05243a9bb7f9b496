import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { extractCatalog } from './catalog.js';

export interface CatalogFile {
    path: string;
    payload: unknown;
}

/**
 * Read a UTF-8 JSON catalog file.
 *
 * Returns null when the file does not exist. Malformed JSON throws the
 * parser's SyntaxError unchanged.
 */
export async function readCatalogFile(path: string): Promise<CatalogFile | null> {
    let text: string;
    try {
        text = await readFile(path, 'utf-8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
        throw error;
    }

    const payload: unknown = JSON.parse(text);
    return { path, payload };
}

/**
 * Download a catalog export and store it at `path`.
 *
 * The body must be JSON; the number of cards it holds is logged so an
 * unexpected layout shows up before the next `link` run.
 *
 * @returns Number of card entries found in the downloaded catalog
 */
export async function downloadCatalog(url: string, path: string, client: HttpClient = new HttpClient()): Promise<number> {
    const logger = getLogger('catalog');
    logger.info({ url }, 'Downloading catalog');

    const response = await client.get(url, { Accept: 'application/json' });
    const payload: unknown = JSON.parse(response.body);
    const { shape, total } = extractCatalog(payload);

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, response.body, 'utf-8');

    logger.info({ path, shape, cards: total }, 'Catalog saved');
    return total;
}
