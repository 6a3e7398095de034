import type { CanonicalField, CanonicalRecord, ColumnMapping, Skip, SourceRow } from '../types/index.js';
import { decomposeCombinedField, type DecomposedField } from './combined-field.js';
import {
    collapseWhitespace,
    localKey,
    parentKey,
    parsePersonNames,
    parseRefs,
    splitPublisher,
} from './fields.js';
import type { SheetSchema } from './sheet-schema.js';

export function isSkip(result: CanonicalRecord | Skip): result is Skip {
    return 'skipped' in result;
}

/**
 * Read every mapped field from a row. Mapped fields are always present,
 * possibly as ''. With label mapping the first non-empty cell wins.
 */
export function readFields(row: SourceRow, columns: ColumnMapping): Partial<Record<CanonicalField, string>> {
    const fields: Partial<Record<CanonicalField, string>> = {};

    if (columns.kind === 'labels') {
        for (const field of Object.values(columns.labels)) {
            fields[field] = '';
        }
        for (const [label, value] of row.cells) {
            const field = columns.labels[label.trim()];
            if (field && !fields[field]) {
                fields[field] = collapseWhitespace(value);
            }
        }
        return fields;
    }

    columns.fields.forEach((field, i) => {
        if (field === null) return;
        const value = collapseWhitespace(row.cells[columns.startColumn + i]?.[1] ?? '');
        if (!fields[field]) {
            fields[field] = value;
        }
    });
    return fields;
}

function inRange(index: number, schema: SheetSchema): boolean {
    return index >= schema.rows.start && (schema.rows.end === null || index <= schema.rows.end);
}

/**
 * Turn one raw row into a canonical record, or a Skip for rows outside
 * the sheet's row range. Pure: the same row and schema always give the
 * same record.
 */
export function normalize(row: SourceRow, schema: SheetSchema): CanonicalRecord | Skip {
    if (!inRange(row.index, schema)) {
        return { skipped: true, reason: 'out-of-range', sheet: row.sheet, index: row.index };
    }

    const fields = readFields(row, schema.columns);
    const field = (name: CanonicalField): string => fields[name] ?? '';

    const key = localKey(field('id'), field('subId'), row.index);
    const parent = parentKey(key);

    // Publisher and place share one cell unless a place column is mapped
    const publisher = 'place' in fields
        ? { name: field('publisher'), place: field('place') }
        : splitPublisher(field('publisher'));

    const decomposed: DecomposedField = schema.decomposition
        ? decomposeCombinedField(field(schema.decomposition.field), schema.decomposition)
        : { year: '', issue: '', page: '' };

    return {
        yid: schema.prefix + key,
        sheet: row.sheet,
        rowIndex: row.index,
        code: schema.code,
        fields,
        title: field('title'),
        authors: parsePersonNames(field('author')),
        translators: parsePersonNames(field('translator')),
        publisher: publisher.name,
        place: publisher.place,
        year: field('year') || decomposed.year,
        issue: field('issue') || decomposed.issue,
        page: field('page') || decomposed.page,
        language: field('language') || schema.language,
        type: field('type'),
        partOf: parent === null ? null : schema.prefix + parent,
        refs: parseRefs(field('refs'), schema.categoryPrefix, schema.code),
    };
}
