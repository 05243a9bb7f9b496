/**
 * Barrel export for all shared types.
 */
export { DEFAULT_CONFIG, DEFAULT_NAMESPACES } from './config.js';
export type { CardLinkConfig, LogLevel, NamespaceConfig } from './config.js';
export { NAME_LANGUAGES } from './card.js';
export type { CardName, CardRecord, CatalogShape, CatalogShapeKind, NameLanguage } from './card.js';
export type { EntityRef, NamedEntity, EntityMatch, CardLink } from './graph.js';
