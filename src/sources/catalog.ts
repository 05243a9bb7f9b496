import type { CardName, CardRecord, CatalogShape, CatalogShapeKind, NameLanguage } from '../types/index.js';
import { NAME_LANGUAGES } from '../types/index.js';
import { RawCardSchema, type RawCard } from './catalog-schema.js';
import { getLogger } from '../utils/logger.js';

/**
 * Outcome of flattening a catalog payload.
 */
export interface CatalogExtraction {
    shape: CatalogShapeKind;
    /** Card entries found in the payload, before name resolution */
    total: number;
    /** Entries dropped for not being objects or lacking a usable name */
    skipped: number;
    records: CardRecord[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Work out which layout a catalog payload uses.
 *
 * Nested-by-set is tried first. When it yields no cards at all the payload
 * falls through to the legacy `cards`/`data` arrays, so an empty nested
 * export and an unknown layout both end up here without an error.
 */
export function detectCatalogShape(payload: unknown): CatalogShape {
    if (Array.isArray(payload)) {
        return { kind: 'list', cards: payload };
    }
    if (!isRecord(payload)) {
        return { kind: 'unrecognized' };
    }

    const sets: Array<{ setKey: string; cards: unknown[] }> = [];
    for (const [setKey, setData] of Object.entries(payload)) {
        if (isRecord(setData) && isRecord(setData['cards'])) {
            sets.push({ setKey, cards: Object.values(setData['cards']) });
        }
    }
    if (sets.some((set) => set.cards.length > 0)) {
        return { kind: 'nested', sets };
    }

    // `cards` shadows `data` whenever it is present
    const key = 'cards' in payload ? 'cards' : 'data' in payload ? 'data' : null;
    if (key) {
        const cards = payload[key];
        if (Array.isArray(cards)) {
            return { kind: 'flat', key, cards };
        }
    }

    return { kind: 'unrecognized' };
}

/**
 * All raw card entries of a shape, in payload order.
 */
export function shapeEntries(shape: CatalogShape): unknown[] {
    switch (shape.kind) {
        case 'nested':
            return shape.sets.flatMap((set) => set.cards);
        case 'flat':
        case 'list':
            return shape.cards;
        case 'unrecognized':
            return [];
    }
}

export function toCardName(raw: RawCard['name']): CardName | null {
    if (raw === undefined) return null;
    if (typeof raw === 'string') return { kind: 'plain', value: raw };

    const values: Partial<Record<NameLanguage, string>> = {};
    for (const lang of NAME_LANGUAGES) {
        const value = raw[lang];
        if (typeof value === 'string') values[lang] = value;
    }
    return { kind: 'localized', values };
}

/**
 * Display name of a card: the plain string, or the first non-empty of
 * English, Spanish, French. Empty when nothing usable is present.
 */
export function resolveCardName(name: CardName | null): string {
    if (!name) return '';
    if (name.kind === 'plain') return name.value;

    for (const lang of NAME_LANGUAGES) {
        const value = name.values[lang];
        if (value) return value;
    }
    return '';
}

/**
 * Normalize one raw catalog entry. Returns null for entries that are not
 * card objects or have no resolvable name.
 */
export function toCardRecord(raw: unknown): CardRecord | null {
    const parsed = RawCardSchema.safeParse(raw);
    if (!parsed.success) return null;

    const card = parsed.data;
    const name = resolveCardName(toCardName(card.name));
    if (!name) return null;

    const record: CardRecord = { name };
    if (card.id) record.id = card.id;
    if (card.type) record.type = card.type;
    if (card.alignment) record.alignment = card.alignment;
    if (card.set) record.set = card.set;
    return record;
}

/**
 * Flatten a catalog payload of any supported layout into card records.
 */
export function extractCatalog(payload: unknown): CatalogExtraction {
    const shape = detectCatalogShape(payload);
    const entries = shapeEntries(shape);
    const records: CardRecord[] = [];

    for (const entry of entries) {
        const record = toCardRecord(entry);
        if (record) records.push(record);
    }

    getLogger('catalog').debug(
        { shape: shape.kind, entries: entries.length, records: records.length },
        'Catalog extracted'
    );

    return {
        shape: shape.kind,
        total: entries.length,
        skipped: entries.length - records.length,
        records,
    };
}

export function extractCards(payload: unknown): CardRecord[] {
    return extractCatalog(payload).records;
}
