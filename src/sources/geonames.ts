import { z } from 'zod';
import type { GazetteerClient } from '../cache/geo-cache.js';
import type { CacheEntry } from '../types/index.js';
import { createHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';

const GEONAMES_BASE = 'http://api.geonames.org';

/**
 * GeoNames `get` response (subset of relevant fields).
 */
const geoNamesPlaceSchema = z.object({
    geonameId: z.number().optional(),
    name: z.string(),
    countryName: z.string().default(''),
    alternateNames: z
        .array(
            z.object({
                name: z.string(),
                lang: z.string().optional(),
                isPreferredName: z.boolean().optional(),
            })
        )
        .default([]),
});

/**
 * GeoNames reports failures in the body, often with HTTP 200.
 */
const geoNamesStatusSchema = z.object({
    status: z.object({
        message: z.string(),
        value: z.number(),
    }),
});

type GeoNamesPlace = z.infer<typeof geoNamesPlaceSchema>;

/**
 * Pick the Polish name (a preferred one if listed) and the Wikidata id
 * from the alternate names.
 */
export function toCacheEntry(place: GeoNamesPlace): CacheEntry {
    const entry: CacheEntry = { name: place.name, country: place.countryName };

    const polish = place.alternateNames.filter((alt) => alt.lang === 'pl');
    const localName = polish.find((alt) => alt.isPreferredName === true) ?? polish[0];
    if (localName) {
        entry.localName = localName.name;
    }

    const wikidata = place.alternateNames.find((alt) => alt.lang === 'wkdt');
    if (wikidata) {
        entry.wikidataId = wikidata.name;
    }

    return entry;
}

/**
 * GeoNames gazetteer client. Needs a registered GeoNames username.
 *
 * @see https://www.geonames.org/export/web-services.html
 */
export class GeoNamesClient implements GazetteerClient {
    readonly name = 'GeoNames';
    private httpClient: HttpClient;

    constructor(
        private readonly username: string,
        httpClient?: HttpClient
    ) {
        this.httpClient = httpClient ?? createHttpClient();
    }

    async fetchPlace(externalId: string): Promise<CacheEntry> {
        const params = new URLSearchParams({
            geonameId: externalId,
            username: this.username,
            style: 'FULL',
        });

        const response = await this.httpClient.get(`${GEONAMES_BASE}/getJSON?${params}`, {
            source: 'geonames',
        });

        const failure = geoNamesStatusSchema.safeParse(response.data);
        if (failure.success) {
            throw new HttpError(
                `GeoNames error ${failure.data.status.value}: ${failure.data.status.message}`,
                response.status,
                false,
                response.data
            );
        }

        const parsed = geoNamesPlaceSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new HttpError(`Unexpected GeoNames response for ${externalId}`, response.status, false, response.data);
        }

        return toCacheEntry(parsed.data);
    }
}
