/**
 * Languages a catalog card name may be given in, in resolution priority order.
 */
export const NAME_LANGUAGES = ['en', 'es', 'fr'] as const;

export type NameLanguage = (typeof NAME_LANGUAGES)[number];

/**
 * A card name as it appears in the catalog: either a single display string
 * or a per-language mapping.
 */
export type CardName =
    | { kind: 'plain'; value: string }
    | { kind: 'localized'; values: Partial<Record<NameLanguage, string>> };

/**
 * One catalog entry, normalized. Raw fields beyond these are dropped.
 */
export interface CardRecord {
    id?: string;
    /** Resolved display name, never empty */
    name: string;
    type?: string;
    alignment?: string;
    set?: string;
}

/**
 * The payload layouts a catalog export may use.
 *
 * - `nested`: `{ "<set>": { "cards": { "<id>": card } } }` (current exports)
 * - `flat`: `{ "cards": [card] }` or `{ "data": [card] }` (legacy exports)
 * - `list`: `[card]`
 */
export type CatalogShape =
    | { kind: 'nested'; sets: Array<{ setKey: string; cards: unknown[] }> }
    | { kind: 'flat'; key: 'cards' | 'data'; cards: unknown[] }
    | { kind: 'list'; cards: unknown[] }
    | { kind: 'unrecognized' };

export type CatalogShapeKind = CatalogShape['kind'];
