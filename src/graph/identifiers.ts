import { createHash } from 'node:crypto';

/**
 * Identifier minting. Every identifier is a pure function of a natural
 * key, so the same input produces the same graph on every run.
 */

const KEY_SEPARATOR = '\u001f';

function normalizeKeyPart(part: string): string {
    return part.normalize('NFC').replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Short stable hash of a natural key: first 12 hex chars of SHA-256.
 */
export function naturalKeyHash(...parts: string[]): string {
    return createHash('sha256')
        .update(parts.map(normalizeKeyPart).join(KEY_SEPARATOR))
        .digest('hex')
        .slice(0, 12);
}

export const workId = (yid: string): string => `F1_${yid}`;
export const workCreationId = (yid: string): string => `F27_${yid}`;
export const expressionId = (yid: string): string => `F2_${yid}`;
export const expressionCreationId = (yid: string): string => `F28_${yid}`;
export const manifestationId = (yid: string): string => `F3_${yid}`;
export const manifestationCreationId = (yid: string): string => `F30_${yid}`;

/**
 * Periodical issues are shared by every record appearing in them.
 */
export function issueKey(publisher: string, year: string, issue: string): string {
    return `J${naturalKeyHash(publisher, year, issue)}`;
}

export const personId = (name: string, language: string): string => `E21_P${naturalKeyHash(name, language)}`;
export const publisherId = (name: string): string => `F11_C${naturalKeyHash(name)}`;
export const placeId = (externalId: string): string => `E53_GN${externalId}`;
export const typeId = (id: string): string => `E55_${id}`;
export const languageId = (iso6393: string): string => `E56_${iso6393.toLowerCase()}`;
export const timeSpanId = (year: string): string => `E52_${year}`;
export const titleId = (yid: string): string => `E35_${yid}`;
export const yidIdentifierId = (yid: string): string => `E42_YID_${yid}`;

/** Type of the record identifiers */
export const YID_TYPE_ID = 'E55_YID';

// External resources, as prefixed names expanded at export
export const geoNamesResource = (externalId: string): string => `gn:${externalId}`;
export const wikidataResource = (qid: string): string => `wd:${qid}`;
