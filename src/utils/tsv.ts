import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * A tab-separated table: the header line and the data lines that follow,
 * each kept at its 0-based data-row index. Blank lines leave a gap.
 */
export interface TsvTable {
    header: string[];
    lines: Array<{ index: number; values: string[] }>;
}

/**
 * Parse tab-separated text. Values are returned untrimmed.
 */
export function parseTsv(content: string): TsvTable {
    const rawLines = content.replace(/^﻿/, '').split('\n').map((line) => line.replace(/\r$/, ''));
    const headerLine = rawLines[0] ?? '';
    const header = headerLine.split('\t').map((label) => label.trim());

    const lines: TsvTable['lines'] = [];
    rawLines.slice(1).forEach((line, index) => {
        if (line.trim() === '') return;
        lines.push({ index, values: line.split('\t') });
    });

    return { header, lines };
}

/**
 * Read a tab-separated file into header-keyed records with trimmed values.
 * Missing trailing cells read as ''.
 */
export function readTsvRecords(filePath: string): { header: string[]; records: Record<string, string>[] } {
    const { header, lines } = parseTsv(readFileSync(filePath, 'utf-8'));
    const records = lines.map(({ values }) => {
        const record: Record<string, string> = {};
        header.forEach((label, i) => {
            record[label] = (values[i] ?? '').trim();
        });
        return record;
    });
    return { header, records };
}

function escapeCell(value: string): string {
    return value.replace(/[\t\r\n]+/g, ' ');
}

/**
 * Write header-keyed records as a tab-separated file, creating its directory.
 */
export function writeTsvRecords(filePath: string, header: string[], records: Array<Record<string, string>>): void {
    const lines = [header.join('\t')];
    for (const record of records) {
        lines.push(header.map((label) => escapeCell(record[label] ?? '')).join('\t'));
    }
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, lines.join('\n') + '\n', 'utf-8');
}
