import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { getApiKey, resolveConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('resolveConfig', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bibkg-config-'));
    });

    function writeConfig(config: unknown): void {
        fs.writeFileSync(path.join(tmpDir, 'bibkg.config.json'), JSON.stringify(config), 'utf-8');
    }

    it('should return the defaults without a config file', async () => {
        const config = await resolveConfig({}, { searchFrom: tmpDir, env: {} });
        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should merge a partial config file into the defaults', async () => {
        writeConfig({
            workbook: './sheets',
            vocabularies: { places: './places.tsv' },
            cache: { fetch: true },
        });

        const config = await resolveConfig({}, { searchFrom: tmpDir, env: {} });

        expect(config.workbook).toBe('./sheets');
        expect(config.vocabularies).toEqual({ ...DEFAULT_CONFIG.vocabularies, places: './places.tsv' });
        expect(config.cache).toEqual({ path: DEFAULT_CONFIG.cache.path, fetch: true });
        expect(config.categories).toEqual(DEFAULT_CONFIG.categories);
    });

    it('should let flags win over the environment and the environment over the file', async () => {
        writeConfig({ logLevel: 'warn', cache: { fetch: false }, languageDetection: { enabled: false } });

        const config = await resolveConfig(
            { logLevel: 'error' },
            {
                searchFrom: tmpDir,
                env: { BIBKG_LOG_LEVEL: 'debug', BIBKG_FETCH_PLACES: 'yes', BIBKG_DETECT_LANGUAGE: 'on' },
            }
        );

        expect(config.logLevel).toBe('error');
        expect(config.cache.fetch).toBe(true);
        expect(config.languageDetection.enabled).toBe(true);
    });

    it('should ignore an unknown log level in the environment', async () => {
        const config = await resolveConfig({}, { searchFrom: tmpDir, env: { BIBKG_LOG_LEVEL: 'verbose' } });
        expect(config.logLevel).toBe('info');
    });

    it('should read a false flag from the environment', async () => {
        const config = await resolveConfig({ cache: { fetch: true } }, { searchFrom: tmpDir, env: {} });
        expect(config.cache.fetch).toBe(true);

        writeConfig({ cache: { fetch: true } });
        const fromEnv = await resolveConfig({}, { searchFrom: tmpDir, env: { BIBKG_FETCH_PLACES: '0' } });
        expect(fromEnv.cache.fetch).toBe(false);
    });

    it('should reject an unknown key in the config file', async () => {
        writeConfig({ workbok: './typo' });
        await expect(resolveConfig({}, { searchFrom: tmpDir, env: {} })).rejects.toThrow(ConfigError);
    });

    it('should reject a config file that is not JSON', async () => {
        fs.writeFileSync(path.join(tmpDir, 'bibkg.config.json'), '{ not json', 'utf-8');
        await expect(resolveConfig({}, { searchFrom: tmpDir, env: {} })).rejects.toThrow(ConfigError);
    });

    it('should reject an invalid category', async () => {
        writeConfig({
            categories: {
                fiction: {
                    prefix: 'F1',
                    columns: { kind: 'labels', labels: { title: 'title' } },
                    rows: { start: 0, end: null },
                    decomposition: null,
                },
            },
        });

        await expect(resolveConfig({}, { searchFrom: tmpDir, env: {} })).rejects.toThrow(
            'categories.fiction.prefix: Prefix must be letters only'
        );
    });

    it('should reject a base IRI that is not a URL', async () => {
        await expect(resolveConfig({ baseIri: 'not a url' }, { searchFrom: tmpDir, env: {} })).rejects.toThrow(
            ConfigError
        );
    });
});

describe('getApiKey', () => {
    it('should trim the value', () => {
        expect(getApiKey('GEONAMES_USERNAME', { GEONAMES_USERNAME: ' test-user ' })).toBe('test-user');
    });

    it('should treat a blank value as missing', () => {
        expect(getApiKey('GEONAMES_USERNAME', { GEONAMES_USERNAME: '  ' })).toBeUndefined();
        expect(getApiKey('GEONAMES_USERNAME', {})).toBeUndefined();
    });
});
