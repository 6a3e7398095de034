import { fileURLToPath } from 'node:url';
import type { CanonicalRecord, VocabularyPaths } from '../types/index.js';
import type { VocabularyData } from '../reference/reference-tables.js';
import type { ResolvedRecord } from '../resolve/reference-resolver.js';

/** Absolute path of a file under `__tests__/fixtures` */
export function fixturePath(name: string): string {
    return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export const FIXTURE_VOCABULARIES: VocabularyPaths = {
    types: fixturePath('types.tsv'),
    languages: fixturePath('languages.tsv'),
    languageErrors: fixturePath('language-errors.tsv'),
    places: fixturePath('places.tsv'),
};

export const VOCABULARY: VocabularyData = {
    types: [
        { code: 'article', id: 'article', label: 'Article' },
        { code: 'book', id: 'book', label: 'Book' },
        { code: 'art', id: '', label: '', override: 'article' },
    ],
    languages: [
        { iso6391: 'pl', iso6393: 'pol', label: 'Polish' },
        { iso6391: 'en', iso6393: 'eng', label: 'English' },
        { iso6391: 'de', iso6393: 'deu', label: 'German' },
        { iso6391: 'ru', iso6393: 'rus', label: 'Russian' },
    ],
    languageErrors: [
        { is: 'ENG', shouldbe: 'en' },
        { is: 'GE', shouldbe: 'de' },
    ],
    places: [
        { place: 'Warszawa', externalIds: ['756135'] },
        { place: 'Kraków', externalIds: ['3094802'] },
        { place: 'Warszawa, Kraków', externalIds: ['756135', '3094802'] },
    ],
};

export function makeRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
    return {
        yid: 'NFPL1',
        sheet: 'PL',
        rowIndex: 0,
        code: 'PL',
        fields: {},
        title: 'Tytuł',
        authors: [],
        translators: [],
        publisher: '',
        place: '',
        year: '',
        issue: '',
        page: '',
        language: 'PL',
        type: '',
        partOf: null,
        refs: [],
        ...overrides,
    };
}

/** A resolved record with nothing resolved */
export function makeResolved(
    record: Partial<CanonicalRecord> = {},
    resolved: Partial<Omit<ResolvedRecord, 'record'>> = {}
): ResolvedRecord {
    return {
        record: makeRecord(record),
        type: null,
        language: null,
        places: [],
        authors: [],
        translators: [],
        ...resolved,
    };
}
