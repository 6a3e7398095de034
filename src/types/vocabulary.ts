/**
 * The three curated auxiliary vocabularies.
 */
export type VocabularyKind = 'type' | 'language' | 'place';

/**
 * One vocabulary row after loading.
 */
export interface ReferenceEntry {
    vocabulary: VocabularyKind;

    /** Code as looked up (normalized) */
    code: string;

    /** Code the lookup was redirected to; equals `code` without an override */
    target: string;

    /** Canonical graph identifier, e.g. `E55_article` */
    id: string;

    label: string;
}

export interface LanguageEntry extends ReferenceEntry {
    vocabulary: 'language';
    iso6391: string;
    iso6393: string;
}

/**
 * One member of a place string, paired with its gazetteer identifier.
 */
export interface PlaceMember {
    name: string;
    externalId: string;
}

export interface PlaceEntry extends ReferenceEntry {
    vocabulary: 'place';
    members: PlaceMember[];
}

export interface VocabularyEntries {
    type: ReferenceEntry;
    language: LanguageEntry;
    place: PlaceEntry;
}

/**
 * Supplementary facts about a place, fetched from the gazetteer.
 */
export interface CacheEntry {
    name: string;
    country: string;

    /** Preferred Polish name, when the gazetteer lists one */
    localName?: string;

    wikidataId?: string;
}
