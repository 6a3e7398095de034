import type { VocabularyPaths } from '../types/index.js';
import { VocabularyError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { readTsvRecords } from '../utils/tsv.js';
import {
    ReferenceTables,
    type LanguageOverrideRow,
    type LanguageRow,
    type PlaceRow,
    type TypeRow,
} from './reference-tables.js';

/**
 * Read one vocabulary file and check that its header carries the
 * required columns.
 */
function readVocabulary(path: string, required: string[]): Record<string, string>[] {
    let table: ReturnType<typeof readTsvRecords>;
    try {
        table = readTsvRecords(path);
    } catch (error) {
        throw new VocabularyError(
            `Cannot read vocabulary file: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }

    const missing = required.filter((column) => !table.header.includes(column));
    if (missing.length > 0) {
        throw new VocabularyError(`Missing required column(s) ${missing.join(', ')}`, path);
    }

    return table.records;
}

function column(record: Record<string, string>, name: string): string {
    return record[name] ?? '';
}

/**
 * Load the four vocabulary files into reference tables.
 *
 * @throws VocabularyError on an unreadable file, a missing column or an
 *   override pointing outside its table
 */
export function loadReferenceTables(paths: VocabularyPaths): ReferenceTables {
    const types: TypeRow[] = readVocabulary(paths.types, ['code', 'id', 'label']).map((record) => ({
        code: column(record, 'code'),
        id: column(record, 'id'),
        label: column(record, 'label'),
        override: column(record, 'override'),
    }));

    const languages: LanguageRow[] = readVocabulary(paths.languages, ['iso639-1', 'iso639-3', 'label']).map(
        (record) => ({
            iso6391: column(record, 'iso639-1'),
            iso6393: column(record, 'iso639-3'),
            label: column(record, 'label'),
        })
    );

    const languageErrors: LanguageOverrideRow[] = readVocabulary(paths.languageErrors, ['is', 'shouldbe']).map(
        (record) => ({
            is: column(record, 'is'),
            shouldbe: column(record, 'shouldbe'),
        })
    );

    const places: PlaceRow[] = readVocabulary(paths.places, ['place', 'geonameid']).map((record) => ({
        place: column(record, 'place'),
        externalIds: column(record, 'geonameid').split(/\s+/).filter((id) => id !== ''),
    }));

    const tables = new ReferenceTables({ types, languages, languageErrors, places }, paths);

    getLogger().info(
        {
            types: tables.entries('type').length,
            languages: tables.entries('language').length,
            languageOverrides: languageErrors.length,
            places: tables.size('place'),
        },
        'Vocabularies loaded'
    );

    return tables;
}
