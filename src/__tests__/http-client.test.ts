import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError, redactUrl } from '../utils/http-client.js';

function jsonResponse(status: number, body: unknown, statusText = 'OK') {
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText,
        headers: new Map([['content-type', 'application/json']]),
        json: async () => body,
    };
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, initialBackoffMs: 1 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('geonames')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should count requests per source and reset', async () => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse(200, { ok: true })));

            await client.get('https://api.example.com/a');
            await client.get('https://api.example.com/b');

            expect(client.getAllRequestCounts()).toEqual({ default: 2 });
            client.resetCounts();
            expect(client.getAllRequestCounts()).toEqual({});
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false, { error: 'missing' });
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
            expect(error.response).toEqual({ error: 'missing' });
        });
    });

    describe('responses', () => {
        it('should return parsed JSON and send its user agent', async () => {
            const mockFetch = vi.fn().mockResolvedValue(jsonResponse(200, { name: 'Kraków' }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await new HttpClient({ version: '9.9.9' }).get('https://api.example.com/place');

            expect(response).toMatchObject({ status: 200, ok: true, data: { name: 'Kraków' } });
            expect(mockFetch).toHaveBeenCalledWith(
                'https://api.example.com/place',
                expect.objectContaining({
                    method: 'GET',
                    headers: { 'User-Agent': 'bibkg/9.9.9', Accept: 'application/json' },
                })
            );
        });

        it('should retry a retryable status', async () => {
            const mockFetch = vi
                .fn()
                .mockResolvedValueOnce(jsonResponse(503, {}, 'Service Unavailable'))
                .mockResolvedValueOnce(jsonResponse(200, { name: 'Warsaw' }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/place');

            expect(response.data).toEqual({ name: 'Warsaw' });
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should not retry a client error', async () => {
            const mockFetch = vi.fn().mockResolvedValue(jsonResponse(404, {}, 'Not Found'));
            vi.stubGlobal('fetch', mockFetch);

            await expect(client.get('https://api.example.com/missing')).rejects.toMatchObject({
                name: 'HttpError',
                status: 404,
                retryable: false,
            });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should retry a reset connection found on the error cause', async () => {
            const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
            const mockFetch = vi
                .fn()
                .mockRejectedValueOnce(new TypeError('fetch failed', { cause: reset }))
                .mockResolvedValueOnce(jsonResponse(200, { name: 'Warsaw' }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/place');

            expect(response.status).toBe(200);
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should wrap other network errors', async () => {
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

            await expect(client.get('https://api.example.com/place')).rejects.toThrow('Network error: fetch failed');
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests based on source rate limits', async () => {
            const mockFetch = vi.fn().mockResolvedValue(jsonResponse(200, { data: 'ok' }));
            vi.stubGlobal('fetch', mockFetch);

            const start = Date.now();

            // GeoNames allows one request per second
            await Promise.all([
                client.request('https://api.example.com/1', { source: 'geonames' }),
                client.request('https://api.example.com/2', { source: 'geonames' }),
            ]);

            expect(Date.now() - start).toBeGreaterThanOrEqual(900);
            expect(client.getRequestCount('geonames')).toBe(2);
        });
    });
});

describe('redactUrl', () => {
    it('should mask credential parameters', () => {
        expect(redactUrl('http://api.geonames.org/getJSON?geonameId=1&username=test-user')).toBe(
            'http://api.geonames.org/getJSON?geonameId=1&username=***'
        );
    });

    it('should leave other URLs alone', () => {
        expect(redactUrl('not a url')).toBe('not a url');
        expect(redactUrl('https://api.example.com/place?id=1')).toBe('https://api.example.com/place?id=1');
    });
});
