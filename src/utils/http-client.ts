import { getLogger } from './logger.js';

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const MAX_RETRIES = 3;
const MAX_BACKOFF_MS = 30000;

/** Query parameters carrying credentials, masked in logs */
const SECRET_PARAMS = ['username', 'key', 'token'];

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        await sleep(waitMs);
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };
const RATE_LIMITS: Record<string, RateLimit> = {
    geonames: { tokensPerSecond: 1, maxBurst: 1 },    // free accounts: hourly credit budget
};

export interface HttpRequestOptions {
    timeout?: number;

    /** Rate-limit bucket; defaults to `default` */
    source?: string;
}

/**
 * A successful response. `data` is parsed JSON or text; callers validate it.
 */
export interface HttpResponse {
    status: number;
    data: unknown;
    ok: true;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Low-level network error code, looked up on the error and its cause
 * (undici wraps socket errors in a `TypeError`).
 */
function networkErrorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    return error.cause === undefined ? undefined : networkErrorCode(error.cause);
}

/**
 * URL with credential parameters masked.
 */
export function redactUrl(url: string): string {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return url;
    }
    for (const param of SECRET_PARAMS) {
        if (parsed.searchParams.has(param)) {
            parsed.searchParams.set(param, '***');
        }
    }
    return parsed.toString();
}

/** What to do after one attempt */
type Attempt = { done: true; response: HttpResponse } | { done: false; retryAfterMs: number | null; reason: object };

/**
 * JSON-over-GET client with per-source rate limiting and retry of
 * transient failures.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly initialBackoff: number;

    constructor(options?: { timeout?: number; version?: string; initialBackoffMs?: number }) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.initialBackoff = options?.initialBackoffMs ?? 1000;
        this.userAgent = `bibkg/${options?.version ?? '0.1.0'}`;
    }

    /**
     * Rate-limited GET, retried with exponential backoff on 429, 5xx and
     * connection resets.
     *
     * @throws HttpError on a non-retryable status, a timeout, or when the
     *   retries run out
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { timeout = this.defaultTimeout, source = 'default' } = options;

        await this.getBucket(source).acquire();
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        for (let attempt = 0; ; attempt++) {
            const outcome = await this.attempt(url, timeout, attempt < MAX_RETRIES);
            if (outcome.done) {
                return outcome.response;
            }

            const backoff = outcome.retryAfterMs ?? this.calculateBackoff(attempt);
            getLogger().warn(
                { ...outcome.reason, attempt: attempt + 1, backoffMs: Math.round(backoff), url: redactUrl(url) },
                'Transient HTTP failure, backing off'
            );
            await sleep(backoff);
        }
    }

    async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
        return this.request(url, options);
    }

    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    resetCounts(): void {
        this.requestCounts.clear();
    }

    private async attempt(url: string, timeout: number, mayRetry: boolean): Promise<Attempt> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        let response: Response;
        try {
            response = await fetch(url, {
                method: 'GET',
                headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
                signal: controller.signal,
            });
        } catch (error) {
            const errorCode = networkErrorCode(error);
            const retryable = errorCode !== undefined && RETRYABLE_ERROR_CODES.has(errorCode);
            if (retryable && mayRetry) {
                return { done: false, retryAfterMs: null, reason: { errorCode } };
            }
            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${redactUrl(url)}`, 0, true);
            }
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0,
                retryable
            );
        } finally {
            clearTimeout(timeoutId);
        }

        const contentType = response.headers.get('content-type') ?? '';
        const data: unknown = contentType.includes('json') ? await response.json() : await response.text();

        if (response.ok) {
            return { done: true, response: { status: response.status, data, ok: true } };
        }

        const retryable = RETRYABLE_STATUS_CODES.has(response.status);
        if (retryable && mayRetry) {
            return {
                done: false,
                retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
                reason: { status: response.status },
            };
        }
        throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, data);
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const limit = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(limit.tokensPerSecond, limit.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private calculateBackoff(attempt: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoff * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(MAX_BACKOFF_MS, exponential + jitter);
    }
}

/**
 * Retry-After in milliseconds, given as seconds or an HTTP date.
 */
function parseRetryAfter(header: string | null | undefined): number | null {
    if (!header) return null;

    const seconds = Number(header);
    if (Number.isFinite(seconds)) return seconds * 1000;

    const date = new Date(header);
    return isNaN(date.getTime()) ? null : Math.max(0, date.getTime() - Date.now());
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createHttpClient(options?: { timeout?: number; version?: string; initialBackoffMs?: number }): HttpClient {
    return new HttpClient(options);
}
