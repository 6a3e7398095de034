import type {
    LanguageEntry,
    PlaceEntry,
    PlaceMember,
    ReferenceEntry,
    VocabularyEntries,
    VocabularyKind,
} from '../types/index.js';
import { languageId, placeId, typeId } from '../graph/identifiers.js';
import { VocabularyError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

// ─── Input rows ─────────────────────────────────────────

export interface TypeRow {
    code: string;
    id: string;
    label: string;

    /** Type code this code redirects to */
    override?: string;
}

export interface LanguageRow {
    iso6391: string;
    iso6393: string;
    label: string;
}

/** A known misspelling or variant of a language code */
export interface LanguageOverrideRow {
    is: string;
    shouldbe: string;
}

export interface PlaceRow {
    /** Place string exactly as it appears in the source */
    place: string;

    /** Gazetteer ids, one per place named in `place`, in order */
    externalIds: string[];
}

export interface VocabularyData {
    types: TypeRow[];
    languages: LanguageRow[];
    languageErrors: LanguageOverrideRow[];
    places: PlaceRow[];
}

/** Where each vocabulary came from, for error messages */
export type VocabularySources = Record<'types' | 'languages' | 'languageErrors' | 'places', string>;

const IN_MEMORY_SOURCES: VocabularySources = {
    types: '<types>',
    languages: '<languages>',
    languageErrors: '<language errors>',
    places: '<places>',
};

// ─── Unresolved sentinel ────────────────────────────────

export const UNRESOLVED = Object.freeze({ unresolved: true as const });
export type Unresolved = typeof UNRESOLVED;

export function isUnresolved<T extends object>(value: T | Unresolved): value is Unresolved {
    return value === UNRESOLVED;
}

// ─── Code normalization ─────────────────────────────────

export function normalizeLanguageCode(code: string): string {
    return code.trim().toUpperCase();
}

export function normalizeTypeCode(code: string): string {
    return code.trim().toLowerCase();
}

export function normalizePlace(place: string): string {
    return place.replace(/\s+/g, ' ').trim();
}

const NORMALIZERS: Record<VocabularyKind, (code: string) => string> = {
    type: normalizeTypeCode,
    language: normalizeLanguageCode,
    place: normalizePlace,
};

type Tables = { [K in VocabularyKind]: Map<string, VocabularyEntries[K]> };

/**
 * The three curated vocabularies (types, languages, places), read-only
 * after construction.
 *
 * Overrides take precedence over the canonical table: a code listed as an
 * override resolves to its target's entry even if the code itself is also
 * a canonical code.
 */
export class ReferenceTables {
    private readonly tables: Tables = {
        type: new Map(),
        language: new Map(),
        place: new Map(),
    };

    /**
     * @throws VocabularyError when an override targets a code missing from
     *   its canonical table
     */
    constructor(data: VocabularyData, sources: VocabularySources = IN_MEMORY_SOURCES) {
        this.loadTypes(data.types, sources.types);
        this.loadLanguages(data.languages, data.languageErrors, sources.languageErrors);
        this.loadPlaces(data.places, sources.places);
    }

    /**
     * Resolve a code in one vocabulary. Never throws: unknown codes return
     * the `UNRESOLVED` sentinel.
     */
    lookup<K extends VocabularyKind>(vocabulary: K, code: string): VocabularyEntries[K] | Unresolved {
        const table: Map<string, VocabularyEntries[K]> = this.tables[vocabulary];
        const key = NORMALIZERS[vocabulary](code);
        if (key === '') return UNRESOLVED;
        return table.get(key) ?? UNRESOLVED;
    }

    /**
     * Canonical entries of one vocabulary (override aliases excluded),
     * in load order.
     */
    entries<K extends VocabularyKind>(vocabulary: K): Array<VocabularyEntries[K]> {
        const table: Map<string, VocabularyEntries[K]> = this.tables[vocabulary];
        return [...new Set(table.values())].filter((entry) => entry.code === entry.target);
    }

    /**
     * Number of lookup keys, overrides included.
     */
    size(vocabulary: VocabularyKind): number {
        return this.tables[vocabulary].size;
    }

    private loadTypes(rows: TypeRow[], source: string): void {
        const canonical = new Map<string, ReferenceEntry>();
        for (const row of rows) {
            const code = normalizeTypeCode(row.code);
            if (code === '' || row.id.trim() === '') continue;
            canonical.set(code, {
                vocabulary: 'type',
                code,
                target: code,
                id: typeId(row.id.trim()),
                label: row.label.trim() || row.id.trim(),
            });
        }

        for (const [code, entry] of canonical) {
            this.tables.type.set(code, entry);
        }

        for (const row of rows) {
            const override = row.override === undefined ? '' : normalizeTypeCode(row.override);
            if (override === '') continue;
            const code = normalizeTypeCode(row.code);
            const target = canonical.get(override);
            if (!target) {
                throw new VocabularyError(`Type override "${code}" → "${override}" targets an unknown type`, source);
            }
            this.tables.type.set(code, { ...target, code });
        }
    }

    private loadLanguages(rows: LanguageRow[], overrides: LanguageOverrideRow[], overrideSource: string): void {
        const canonical = new Map<string, LanguageEntry>();
        for (const row of rows) {
            const iso6391 = normalizeLanguageCode(row.iso6391);
            const iso6393 = normalizeLanguageCode(row.iso6393);
            if (iso6393 === '') continue;

            // Sheets use two-letter codes; three-letter codes resolve too
            const code = iso6391 || iso6393;
            const entry: LanguageEntry = {
                vocabulary: 'language',
                code,
                target: code,
                id: languageId(iso6393),
                label: row.label.trim() || code,
                iso6391,
                iso6393,
            };
            canonical.set(code, entry);
            if (iso6393 !== code && !canonical.has(iso6393)) {
                canonical.set(iso6393, entry);
            }
        }

        for (const [code, entry] of canonical) {
            this.tables.language.set(code, entry);
        }

        const missing: string[] = [];
        for (const row of overrides) {
            const variant = normalizeLanguageCode(row.is);
            const target = normalizeLanguageCode(row.shouldbe);
            if (variant === '') continue;
            const entry = canonical.get(target);
            if (!entry) {
                missing.push(target);
                continue;
            }
            this.tables.language.set(variant, { ...entry, code: variant, target: entry.code });
        }

        if (missing.length > 0) {
            throw new VocabularyError(
                `Language codes ${[...new Set(missing)].join(', ')} from the override list are not in the language table`,
                overrideSource
            );
        }
    }

    private loadPlaces(rows: PlaceRow[], source: string): void {
        for (const row of rows) {
            const place = normalizePlace(row.place);
            if (place === '') continue;
            if (row.externalIds.length === 0) {
                getLogger().warn({ place, source }, 'Place listed without gazetteer ids, ignoring');
                continue;
            }

            const names = place.split(', ');
            if (names.length !== row.externalIds.length) {
                getLogger().warn(
                    { place, names: names.length, ids: row.externalIds.length, source },
                    'Place names and gazetteer ids differ in number, pairing by position'
                );
            }

            const members: PlaceMember[] = row.externalIds.map((externalId, i) => ({
                name: names[i] ?? place,
                externalId,
            }));

            const entry: PlaceEntry = {
                vocabulary: 'place',
                code: place,
                target: place,
                id: members.map((member) => placeId(member.externalId)).join(' '),
                label: place,
                members,
            };
            this.tables.place.set(place, entry);
        }
    }
}
