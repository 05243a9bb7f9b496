/**
 * Canonical lookup key for a display name: lowercased, nothing else.
 * Accents, punctuation and inner spacing are left alone; fuzzy matching
 * absorbs the remaining differences.
 */
export function normalizeName(name: string): string {
    return name.toLowerCase();
}

/**
 * Lookup key with every space removed ("Tom Bombadil" → "tombombadil").
 */
export function compactName(name: string): string {
    return normalizeName(name).replace(/ /g, '');
}

/**
 * Both index keys for a name, without empties or duplicates.
 */
export function nameKeys(name: string): string[] {
    const keys: string[] = [];
    for (const key of [normalizeName(name), compactName(name)]) {
        if (key && !keys.includes(key)) keys.push(key);
    }
    return keys;
}
