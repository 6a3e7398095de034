import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { SourceRow } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { parseTsv } from '../utils/tsv.js';

/**
 * Raised when a sheet named in the configuration cannot be read.
 */
export class WorkbookError extends Error {
    constructor(
        message: string,
        public readonly sheet: string
    ) {
        super(message);
        this.name = 'WorkbookError';
    }
}

/**
 * Path of a sheet inside a workbook directory.
 */
export function sheetPath(workbook: string, sheet: string): string {
    return join(workbook, `${sheet}.tsv`);
}

/**
 * List the sheets available in a workbook directory.
 */
export function listSheets(workbook: string): string[] {
    if (!existsSync(workbook)) return [];
    return readdirSync(workbook)
        .filter((file) => file.endsWith('.tsv'))
        .map((file) => file.slice(0, -'.tsv'.length))
        .sort();
}

/**
 * Load one sheet as raw rows. The first line holds the column labels;
 * data rows are numbered from 0 below it. Cell values are passed on
 * untouched, normalization is the normalizer's job.
 *
 * @throws WorkbookError when the sheet file is missing or unreadable
 */
export function loadSheetRows(workbook: string, sheet: string): SourceRow[] {
    const path = sheetPath(workbook, sheet);

    let content: string;
    try {
        content = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new WorkbookError(
            `Cannot read sheet "${sheet}" from ${path}: ${error instanceof Error ? error.message : String(error)}`,
            sheet
        );
    }

    const { header, lines } = parseTsv(content);
    const rows = lines.map(({ index, values }): SourceRow => ({
        sheet,
        index,
        cells: Array.from(
            { length: Math.max(header.length, values.length) },
            (_, i) => [header[i] ?? '', values[i] ?? ''] as const
        ),
    }));

    getLogger().debug({ sheet, rows: rows.length, columns: header.length }, 'Sheet loaded');
    return rows;
}
