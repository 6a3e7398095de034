import { describe, it, expect, vi, beforeEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { GeoCache, MISS, isMiss, type GazetteerClient } from '../cache/geo-cache.js';
import { GeoNamesClient, toCacheEntry } from '../sources/geonames.js';
import type { CacheEntry } from '../types/index.js';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { fixturePath } from './helpers.js';

const WARSAW: CacheEntry = { name: 'Warsaw', country: 'Poland', localName: 'Warszawa', wikidataId: 'Q270' };
const KRAKOW: CacheEntry = { name: 'Kraków', country: 'Poland' };

function stubClient(impl: (id: string) => Promise<CacheEntry>) {
    const fetchPlace = vi.fn(impl);
    const client: GazetteerClient = { name: 'stub', fetchPlace };
    return { client, fetchPlace };
}

describe('GeoCache', () => {
    let cachePath: string;

    beforeEach(() => {
        const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bibkg-cache-'));
        cachePath = path.join(tmpDir, 'geocache.json');
    });

    describe('get/put', () => {
        it('should return MISS for unknown ids', () => {
            const cache = new GeoCache(cachePath);
            expect(cache.get('756135')).toBe(MISS);
            expect(isMiss(cache.get('756135'))).toBe(true);
        });

        it('should return what was put, however often it is read', () => {
            const cache = new GeoCache(cachePath);
            cache.put('756135', WARSAW);
            expect(cache.get('756135')).toEqual(WARSAW);
            expect(cache.get('756135')).toEqual(WARSAW);
            expect(cache.has('756135')).toBe(true);
            expect(cache.size).toBe(1);
        });
    });

    describe('load', () => {
        it('should read an existing cache file', () => {
            const cache = GeoCache.load(fixturePath('geocache.json'));
            expect(cache.get('756135')).toEqual(WARSAW);
        });

        it('should start empty without a file', () => {
            expect(GeoCache.load(cachePath).size).toBe(0);
        });

        it('should start empty when the file is malformed', () => {
            fs.writeFileSync(cachePath, '{"756135": {"name": 42}}');
            expect(GeoCache.load(cachePath).size).toBe(0);
        });

        it('should start empty when the file is not JSON', () => {
            fs.writeFileSync(cachePath, 'not json');
            expect(GeoCache.load(cachePath).size).toBe(0);
        });
    });

    describe('lookup', () => {
        it('should never call the gazetteer with fetching disabled', async () => {
            const { client, fetchPlace } = stubClient(async () => WARSAW);
            const cache = new GeoCache(cachePath, { fetch: false, client });

            expect(await cache.lookup('756135')).toBe(MISS);
            expect(fetchPlace).not.toHaveBeenCalled();
        });

        it('should fetch a missing id once and keep the answer', async () => {
            const { client, fetchPlace } = stubClient(async () => WARSAW);
            const cache = new GeoCache(cachePath, { fetch: true, client });

            expect(await cache.lookup('756135')).toEqual(WARSAW);
            expect(await cache.lookup('756135')).toEqual(WARSAW);
            expect(fetchPlace).toHaveBeenCalledTimes(1);
            expect(cache.getStats()).toMatchObject({ entries: 1, fetched: 1, failed: 0, dirty: true });
        });

        it('should treat a failed fetch as a miss and not retry it', async () => {
            const { client, fetchPlace } = stubClient(async () => {
                throw new HttpError('HTTP 503: Service Unavailable', 503, true);
            });
            const cache = new GeoCache(cachePath, { fetch: true, client });

            expect(await cache.lookup('3094802')).toBe(MISS);
            expect(await cache.lookup('3094802')).toBe(MISS);
            expect(fetchPlace).toHaveBeenCalledTimes(1);
            expect(cache.getStats().failed).toBe(1);
        });

        it('should refuse fetching without a client', () => {
            expect(() => new GeoCache(cachePath, { fetch: true })).toThrow('fetching enabled without a gazetteer client');
        });
    });

    describe('flush', () => {
        it('should not write with fetching disabled', () => {
            const cache = new GeoCache(cachePath);
            cache.put('756135', WARSAW);
            expect(cache.flush()).toBe(false);
            expect(fs.existsSync(cachePath)).toBe(false);
        });

        it('should write sorted entries that load back', async () => {
            const { client } = stubClient(async (id) => (id === '756135' ? WARSAW : KRAKOW));
            const cache = new GeoCache(cachePath, { fetch: true, client });
            await cache.lookup('3094802');
            await cache.lookup('756135');

            expect(cache.flush()).toBe(true);
            expect(cache.flush()).toBe(false);

            const written: unknown = JSON.parse(fs.readFileSync(cachePath, 'utf-8'));
            expect(Object.keys(written ?? {})).toEqual(['756135', '3094802']);
            expect(GeoCache.load(cachePath).get('3094802')).toEqual(KRAKOW);
        });

        it('should delete the file on clear', async () => {
            const cache = new GeoCache(cachePath, { fetch: true, client: stubClient(async () => WARSAW).client });
            await cache.lookup('756135');
            cache.flush();

            cache.clear();
            expect(fs.existsSync(cachePath)).toBe(false);
            expect(cache.size).toBe(0);
        });
    });
});

describe('GeoNamesClient', () => {
    function clientReturning(data: unknown) {
        const http = new HttpClient();
        const get = vi.spyOn(http, 'get').mockResolvedValue({ status: 200, data, ok: true });
        return { client: new GeoNamesClient('test-user', http), get };
    }

    it('should pick the preferred Polish name and the Wikidata id', () => {
        const entry = toCacheEntry({
            name: 'Warsaw',
            countryName: 'Poland',
            alternateNames: [
                { name: 'Warschau', lang: 'de' },
                { name: 'Warszawka', lang: 'pl' },
                { name: 'Warszawa', lang: 'pl', isPreferredName: true },
                { name: 'Q270', lang: 'wkdt' },
            ],
        });
        expect(entry).toEqual(WARSAW);
    });

    it('should request the full record for an id', async () => {
        const { client, get } = clientReturning({ geonameId: 3094802, name: 'Kraków', countryName: 'Poland' });

        expect(await client.fetchPlace('3094802')).toEqual(KRAKOW);
        expect(get).toHaveBeenCalledWith(
            'http://api.geonames.org/getJSON?geonameId=3094802&username=test-user&style=FULL',
            { source: 'geonames' }
        );
    });

    it('should turn an error status in the body into an HttpError', async () => {
        const { client } = clientReturning({ status: { message: 'user does not exist.', value: 10 } });
        await expect(client.fetchPlace('1')).rejects.toThrow('GeoNames error 10: user does not exist.');
    });

    it('should reject an unexpected response', async () => {
        const { client } = clientReturning('<html></html>');
        await expect(client.fetchPlace('1')).rejects.toBeInstanceOf(HttpError);
    });
});
