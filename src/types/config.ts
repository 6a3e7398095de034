import type { CanonicalField } from './record.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Columns addressed by their header label.
 */
export interface ColumnsByLabel {
    kind: 'labels';
    labels: Record<string, CanonicalField>;
}

/**
 * Columns addressed by position, for sheets whose headings differ but
 * whose column order is shared. `null` marks a separator column.
 */
export interface ColumnsByPosition {
    kind: 'positions';
    startColumn: number;
    fields: Array<CanonicalField | null>;
}

export type ColumnMapping = ColumnsByLabel | ColumnsByPosition;

/**
 * Inclusive range of 0-based data rows; `end: null` is open-ended.
 */
export interface RowRange {
    start: number;
    end: number | null;
}

/**
 * Rule splitting a combined "year, issue, page" field.
 */
export interface DecompositionRule {
    /** Field holding the combined text */
    field: CanonicalField;

    /** Regular expression with a named `year` group, matched at the start */
    yearPattern: string;

    /** Page-mark abbreviations, written without the trailing dot */
    pageMarks: string[];
}

/**
 * Settings shared by every sheet of one category.
 */
export interface SheetCategoryConfig {
    /** Identifier prefix, combined with the sheet code */
    prefix: string;
    columns: ColumnMapping;
    rows: RowRange;
    decomposition: DecompositionRule | null;
}

/**
 * One sheet to process, with optional overrides of its category.
 */
export interface SheetConfig {
    name: string;
    category: string;

    /** Defaults to the sheet name */
    code?: string;

    /** Default record language; defaults to the sheet code */
    language?: string;

    columns?: ColumnMapping;
    rows?: Partial<RowRange>;
    decomposition?: DecompositionRule | null;
}

/**
 * Auxiliary vocabulary file locations.
 */
export interface VocabularyPaths {
    types: string;
    languages: string;
    languageErrors: string;
    places: string;
}

/**
 * Gazetteer cache configuration.
 */
export interface CacheConfig {
    path: string;

    /** Fetch missing places from the gazetteer and rewrite the cache file */
    fetch: boolean;
}

/**
 * Fallback language detection.
 */
export interface LanguageDetectionConfig {
    enabled: boolean;

    /** ISO 639-1 codes the detector may answer with */
    candidates: string[];
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface BibKgConfig {
    // Input
    workbook: string;
    vocabularies: VocabularyPaths;
    categories: Record<string, SheetCategoryConfig>;
    sheets: SheetConfig[];

    // Resolution
    cache: CacheConfig;
    languageDetection: LanguageDetectionConfig;

    // Output
    out: string;
    unresolvedPlacesReport: string;
    baseIri: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Page marks seen across the non-fiction sheets.
 */
export const DEFAULT_PAGE_MARKS = ['s', 'c', 'S', 'p', 'pp', '页', 'lk', 'Ik', 'σ', 'გ', 'б', 'l', 'г', 'old'];

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: BibKgConfig = {
    workbook: './data/workbook',
    vocabularies: {
        types: './data/types.tsv',
        languages: './data/languages.tsv',
        languageErrors: './data/language-errors.tsv',
        places: './data/places.tsv',
    },
    categories: {
        nonfiction: {
            prefix: 'NF',
            columns: {
                kind: 'positions',
                startColumn: 2,
                fields: [
                    'marker', 'id', 'subId', null, 'author', null, 'title', null, 'publisher', null,
                    'pubInfo', 'more', 'refs', null, 'translator', null, 'type',
                ],
            },
            rows: { start: 0, end: null },
            decomposition: {
                field: 'pubInfo',
                yearPattern: '^(?<year>\\d{4})(?:,\\s*)?',
                pageMarks: DEFAULT_PAGE_MARKS,
            },
        },
    },
    sheets: [],
    cache: {
        path: './data/geocache.json',
        fetch: false,
    },
    languageDetection: {
        enabled: false,
        candidates: ['BE', 'DE', 'EN', 'ES', 'EL', 'FR', 'IT', 'JA', 'PL', 'PT', 'RU', 'TR', 'UK', 'ZH'],
    },
    out: './bibkg.db',
    unresolvedPlacesReport: './data/places-new.tsv',
    baseIri: 'http://lkg.org.pl/id/',
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    bibkg_version: string;
    config_json: string;
    stats_json: string;
}
