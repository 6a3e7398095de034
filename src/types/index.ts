/**
 * Barrel export for all shared types.
 */
export { CANONICAL_FIELDS } from './record.js';
export type {
    CanonicalField,
    CanonicalRecord,
    DerivationKind,
    DerivationRef,
    PersonName,
    Skip,
    SourceRow,
} from './record.js';
export { EntityClass, Relation, DERIVATION_RELATIONS, NAMESPACES } from './graph.js';
export type { BuiltGraph, DanglingEdge, GraphEdge, GraphEntity, NamespacePrefix } from './graph.js';
export type {
    CacheEntry,
    LanguageEntry,
    PlaceEntry,
    PlaceMember,
    ReferenceEntry,
    VocabularyEntries,
    VocabularyKind,
} from './vocabulary.js';
export { DEFAULT_CONFIG, DEFAULT_PAGE_MARKS } from './config.js';
export type {
    BibKgConfig,
    CacheConfig,
    ColumnMapping,
    ColumnsByLabel,
    ColumnsByPosition,
    DecompositionRule,
    LanguageDetectionConfig,
    LogLevel,
    RowRange,
    RunRecord,
    SheetCategoryConfig,
    SheetConfig,
    VocabularyPaths,
} from './config.js';
export type { LanguageDetector } from './language-detector.js';
