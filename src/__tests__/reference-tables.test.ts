import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ReferenceTables, UNRESOLVED, isUnresolved, type VocabularyData } from '../reference/reference-tables.js';
import { loadReferenceTables } from '../reference/vocabulary-loader.js';
import { VocabularyError } from '../utils/errors.js';
import { FIXTURE_VOCABULARIES, VOCABULARY } from './helpers.js';

function tablesWith(patch: Partial<VocabularyData>): ReferenceTables {
    return new ReferenceTables({ ...VOCABULARY, ...patch });
}

describe('ReferenceTables', () => {
    const tables = new ReferenceTables(VOCABULARY);

    describe('types', () => {
        it('should resolve type codes case-insensitively', () => {
            const entry = tables.lookup('type', ' Article ');
            expect(isUnresolved(entry)).toBe(false);
            if (isUnresolved(entry)) return;
            expect(entry.id).toBe('E55_article');
            expect(entry.label).toBe('Article');
        });

        it('should redirect an override to its target entry', () => {
            const entry = tables.lookup('type', 'ART');
            if (isUnresolved(entry)) throw new Error('expected a type');
            expect(entry.id).toBe('E55_article');
            expect(entry.code).toBe('art');
            expect(entry.target).toBe('article');
        });

        it('should let an override win over a canonical code of the same name', () => {
            const custom = tablesWith({
                types: [
                    { code: 'article', id: 'article', label: 'Article' },
                    { code: 'book', id: 'book', label: 'Book', override: 'article' },
                ],
            });
            const entry = custom.lookup('type', 'book');
            if (isUnresolved(entry)) throw new Error('expected a type');
            expect(entry.id).toBe('E55_article');
        });

        it('should reject an override pointing at an unknown type', () => {
            expect(() => tablesWith({ types: [{ code: 'poem', id: '', label: '', override: 'verse' }] })).toThrow(
                VocabularyError
            );
        });
    });

    describe('languages', () => {
        it('should resolve two- and three-letter codes to the same entry', () => {
            const short = tables.lookup('language', 'pl');
            const long = tables.lookup('language', 'POL');
            if (isUnresolved(short) || isUnresolved(long)) throw new Error('expected a language');
            expect(short.id).toBe('E56_pol');
            expect(long.id).toBe('E56_pol');
            expect(short.iso6391).toBe('PL');
        });

        it('should redirect known misspellings', () => {
            const entry = tables.lookup('language', 'ge');
            if (isUnresolved(entry)) throw new Error('expected a language');
            expect(entry.id).toBe('E56_deu');
            expect(entry.code).toBe('GE');
            expect(entry.target).toBe('DE');
        });

        it('should let an override win over a canonical code', () => {
            const custom = tablesWith({ languageErrors: [{ is: 'PL', shouldbe: 'de' }] });
            const entry = custom.lookup('language', 'PL');
            if (isUnresolved(entry)) throw new Error('expected a language');
            expect(entry.id).toBe('E56_deu');
        });

        it('should name override targets missing from the language table', () => {
            expect(() => tablesWith({ languageErrors: [{ is: 'XX', shouldbe: 'zz' }] })).toThrow(
                'Language codes ZZ from the override list are not in the language table (<language errors>)'
            );
        });

        it('should list canonical entries only', () => {
            expect(tables.entries('language').map((entry) => entry.code)).toEqual(['PL', 'EN', 'DE', 'RU']);
            expect(tables.entries('type').map((entry) => entry.code)).toEqual(['article', 'book']);
        });
    });

    describe('places', () => {
        it('should map a place list to its ids in order', () => {
            const entry = tables.lookup('place', 'Warszawa, Kraków');
            if (isUnresolved(entry)) throw new Error('expected a place');
            expect(entry.members.map((member) => member.externalId)).toEqual(['756135', '3094802']);
            expect(entry.members.map((member) => member.name)).toEqual(['Warszawa', 'Kraków']);
            expect(entry.id).toBe('E53_GN756135 E53_GN3094802');
        });

        it('should collapse whitespace before looking a place up', () => {
            expect(isUnresolved(tables.lookup('place', '  Warszawa,   Kraków '))).toBe(false);
        });

        it('should skip places without ids', () => {
            const custom = tablesWith({ places: [{ place: 'Nowhere', externalIds: [] }] });
            expect(custom.lookup('place', 'Nowhere')).toBe(UNRESOLVED);
        });

        it('should pair names and ids by position when their counts differ', () => {
            const custom = tablesWith({ places: [{ place: 'Warszawa, Kraków, Gdańsk', externalIds: ['1', '2'] }] });
            const entry = custom.lookup('place', 'Warszawa, Kraków, Gdańsk');
            if (isUnresolved(entry)) throw new Error('expected a place');
            expect(entry.members).toEqual([
                { name: 'Warszawa', externalId: '1' },
                { name: 'Kraków', externalId: '2' },
            ]);
        });
    });

    it('should return the sentinel for unknown and empty codes', () => {
        expect(tables.lookup('language', 'XX')).toBe(UNRESOLVED);
        expect(tables.lookup('type', '')).toBe(UNRESOLVED);
        expect(tables.lookup('place', 'Atlantyda')).toBe(UNRESOLVED);
    });
});

describe('loadReferenceTables', () => {
    it('should load the four vocabulary files', () => {
        const tables = loadReferenceTables(FIXTURE_VOCABULARIES);

        const type = tables.lookup('type', 'art');
        const language = tables.lookup('language', 'eng');
        const place = tables.lookup('place', 'Kraków');
        if (isUnresolved(type) || isUnresolved(language) || isUnresolved(place)) {
            throw new Error('expected every lookup to resolve');
        }
        expect(type.id).toBe('E55_article');
        expect(language.id).toBe('E56_eng');
        expect(place.id).toBe('E53_GN3094802');
    });

    it('should reject a file missing a required column', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bibkg-vocab-'));
        const types = path.join(dir, 'types.tsv');
        fs.writeFileSync(types, 'code\tlabel\narticle\tArticle\n');

        expect(() => loadReferenceTables({ ...FIXTURE_VOCABULARIES, types })).toThrow(
            `Missing required column(s) id (${types})`
        );
    });

    it('should report an unreadable file as a vocabulary error', () => {
        const places = path.join(os.tmpdir(), 'bibkg-missing-dir', 'places.tsv');
        expect(() => loadReferenceTables({ ...FIXTURE_VOCABULARIES, places })).toThrow(VocabularyError);
    });
});
