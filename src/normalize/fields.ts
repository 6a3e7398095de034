import type { DerivationKind, DerivationRef, PersonName } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Collapse whitespace runs to one space and trim.
 */
export function collapseWhitespace(value: string): string {
    return value.replace(/\s+/gu, ' ').trim();
}

// ─── Person names ───────────────────────────────────────

const LANGUAGE_TAGS = /^(.*?)\s*\(\s*([A-Za-z]{2,3}(?:\s*,\s*[A-Za-z]{2,3})*)\s*\)$/u;

/**
 * Parse `;`-separated person names, each optionally tagged with language
 * codes: `"Kandel Michael (EN); Doe Jan (DE,FR)"`.
 */
export function parsePersonNames(cell: string): PersonName[] {
    const names: PersonName[] = [];
    for (const part of cell.split(';')) {
        const text = collapseWhitespace(part);
        if (text === '') continue;

        const tagged = LANGUAGE_TAGS.exec(text);
        const name = tagged?.[1];
        const tags = tagged?.[2];
        if (name && tags) {
            names.push({
                name,
                languages: tags.split(',').map((tag) => tag.trim().toUpperCase()),
            });
        } else {
            names.push({ name: text, languages: [] });
        }
    }
    return names;
}

// ─── Publisher ──────────────────────────────────────────

/**
 * Split a publisher cell written as `Name (City)` or `City: Name`.
 */
export function splitPublisher(cell: string): { name: string; place: string } {
    const name = (cell.split(' (')[0] ?? '').split(': ').at(-1) ?? '';

    let place = '';
    const trailing = /\((.+?)\)$/u.exec(cell);
    if (trailing?.[1]) {
        place = (trailing[1].split(':')[0] ?? '').split(')')[0] ?? '';
    } else {
        place = /^(.*?):/u.exec(cell)?.[1] ?? '';
    }

    return { name: name.trim(), place: place.trim() };
}

// ─── Local keys ─────────────────────────────────────────

/**
 * Row-local key: the id, extended by the sub-id when there is one,
 * or the row index when the id is empty.
 */
export function localKey(id: string, subId: string, rowIndex: number): string {
    const main = id.replace(/\s+/gu, '');
    if (main === '') {
        return String(rowIndex);
    }
    const sub = subId.replace(/\s+/gu, '').replace(/^\./u, '');
    return sub === '' ? main : `${main}.${sub}`;
}

/**
 * Local key of the enclosing record: `355.2` → `355`.
 */
export function parentKey(key: string): string | null {
    const cut = key.lastIndexOf('.');
    return cut > 0 ? key.slice(0, cut) : null;
}

/** Widest range expanded; wider ones are taken to be typos */
export const MAX_RANGE_SIZE = 1000;

/**
 * Expand a range of sibling keys: `355.9.1÷9.4` → `355.9.1` … `355.9.4`.
 * Keys that do not end in a number are returned as they are, and so is
 * the first key of a range wider than `MAX_RANGE_SIZE`.
 */
export function expandRange(source: string): string[] {
    const [first, last] = source.split('÷', 2);
    if (first === undefined || last === undefined) {
        return [source];
    }

    const cut = first.lastIndexOf('.');
    const stem = cut > 0 ? first.slice(0, cut + 1) : '';
    const from = Number(cut > 0 ? first.slice(cut + 1) : first);
    const to = Number(last.slice(last.lastIndexOf('.') + 1));
    if (!Number.isInteger(from) || !Number.isInteger(to) || to < from) {
        return [first];
    }
    if (to - from + 1 > MAX_RANGE_SIZE) {
        getLogger().warn({ range: source, size: to - from + 1 }, 'Reference range too wide, keeping its first key');
        return [first];
    }

    return Array.from({ length: to - from + 1 }, (_, i) => `${stem}${from + i}`);
}

// ─── Derivation references ──────────────────────────────

const REF_MARKER = '↑';
const REF_TOKEN = /^(?:([A-Za-z]+):?\s*)?(\.?\d+(?:\.\d+)*(?:÷\d+(?:\.\d+)*)?)([-<>!?]*)$/u;

const MARK_KINDS: Record<string, DerivationKind> = {
    '>': 'reduced',
    '<': 'extended',
    '!': 'altered',
};

/**
 * Parse a reference cell: `↑PL:355; 356>`, `↑355.2-+.22`.
 *
 * A code carries forward to later references in the cell; a reference
 * starting with `.` continues the main key of the one before it.
 * References marked `-` (citation only) or `?` (uncertain) are dropped.
 */
export function parseRefs(cell: string, categoryPrefix: string, sheetCode: string): DerivationRef[] {
    const text = cell.trim();
    if (!text.startsWith(REF_MARKER)) {
        return [];
    }

    const body = (text.slice(REF_MARKER.length).split(' (')[0] ?? '').replace(/\.\s+(\d)/gu, '.$1');
    const refs: DerivationRef[] = [];
    const seen = new Set<string>();
    let code = sheetCode;
    let lastMain = '';

    for (const token of body.split(/\s*[+;,]\s*/u)) {
        const match = REF_TOKEN.exec(token.trim());
        if (!match) continue;

        const [, tokenCode, rawNumber = '', marks = ''] = match;
        if (tokenCode) {
            code = tokenCode;
        }

        let number = rawNumber;
        if (number.startsWith('.')) {
            if (lastMain === '') continue;
            number = lastMain + number;
        }
        lastMain = number.split('.')[0] ?? '';

        if (marks.includes('-') || marks.includes('?')) continue;

        const kinds = [...new Set([...marks].flatMap((mark) => MARK_KINDS[mark] ?? []))];
        for (const key of expandRange(number)) {
            const target = categoryPrefix + code + key;
            if (seen.has(target)) continue;
            seen.add(target);
            refs.push({ target, kinds, translation: code !== sheetCode });
        }
    }

    return refs;
}
