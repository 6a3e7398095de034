/**
 * Canonical fields a sheet column can be mapped onto.
 */
export const CANONICAL_FIELDS = [
    'marker',
    'id',
    'subId',
    'author',
    'title',
    'publisher',
    'pubInfo',
    'more',
    'refs',
    'translator',
    'type',
    'language',
    'place',
    'year',
    'issue',
    'page',
    'notes',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/**
 * One raw spreadsheet row, as handed over by the workbook loader.
 */
export interface SourceRow {
    sheet: string;

    /** 0-based data row index (the header line is not a data row) */
    index: number;

    /** Cells in column order; labels may repeat or be empty */
    cells: ReadonlyArray<readonly [label: string, value: string]>;
}

/**
 * A person name as written in the source, with its raw language tags
 * (`"Kandel Michael (EN)"` → name `Kandel Michael`, tags `['EN']`).
 */
export interface PersonName {
    name: string;
    languages: string[];
}

/** Precise derivation marks recognised in reference cells */
export type DerivationKind = 'reduced' | 'extended' | 'altered';

/**
 * Reference from one record to another it derives from.
 */
export interface DerivationRef {
    /** YID of the referenced record */
    target: string;

    kinds: DerivationKind[];

    /** Referenced record lives on a sheet with a different code */
    translation: boolean;
}

/**
 * Normalized, typed view of one row.
 */
export interface CanonicalRecord {
    yid: string;
    sheet: string;
    rowIndex: number;

    /** Sheet code, e.g. `PL` */
    code: string;

    /** Raw values for every mapped field, possibly empty */
    fields: Partial<Record<CanonicalField, string>>;

    title: string;
    authors: PersonName[];
    translators: PersonName[];
    publisher: string;
    place: string;
    year: string;
    issue: string;
    page: string;

    /** Language code or spelling variant, unresolved */
    language: string;

    /** Type code, unresolved */
    type: string;

    /** YID of the enclosing record for components */
    partOf: string | null;

    refs: DerivationRef[];
}

/**
 * Why a row produced no record.
 */
export interface Skip {
    skipped: true;
    reason: 'out-of-range';
    sheet: string;
    index: number;
}
