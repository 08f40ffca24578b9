import type { RetryPolicy } from '../types/index.js';
import { getComponentLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    jitter: 0.5,
};

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

        // Reserve the token now so concurrent callers queue behind each other
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

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    nominatim: { tokensPerSecond: 1, maxBurst: 1 },    // public OSM usage policy: 1/s
    locationiq: { tokensPerSecond: 2, maxBurst: 2 },   // free plan
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    retry?: RetryPolicy;
}

/**
 * HTTP response wrapper. `data` is parsed JSON or text; callers validate its shape.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with classification.
 * `retryable` stays true when a retryable failure outlived the retry policy.
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

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    retry?: RetryPolicy;
    rateLimits?: Record<string, RateLimit>;
}

/**
 * Centralized HTTP client with per-source rate limiting and policy-driven retries.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly retryPolicy: RetryPolicy;
    private readonly rateLimits: Record<string, RateLimit>;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        this.userAgent = options?.email
            ? `citegeo/${version} (mailto:${options.email})`
            : `citegeo/${version}`;
        this.retryPolicy = options?.retry ?? DEFAULT_RETRY_POLICY;
        this.rateLimits = { ...RATE_LIMITS, ...options?.rateLimits };
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            retry = this.retryPolicy,
        } = options;
        const logger = getComponentLogger('http');

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        const maxAttempts = Math.max(1, retry.maxAttempts);
        let lastError: HttpError | null = null;

        for (let attempt = 0; attempt < maxAttempts; attempt++) {
            // Every attempt, retries included, spends a rate limit token
            await this.getBucket(source).acquire();
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            const isLastAttempt = attempt === maxAttempts - 1;
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await fetch(url, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });

                const contentType = response.headers.get('content-type') ?? '';
                const data: unknown = contentType.includes('json')
                    ? await response.json()
                    : await response.text();

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);
                    lastError = new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );

                    if (retryable && !isLastAttempt) {
                        const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = Math.min(retry.maxDelayMs, retryAfter ?? computeBackoff(retry, attempt));

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff);
                        continue;
                    }

                    throw lastError;
                }

                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const timedOut = error instanceof Error && error.name === 'AbortError';
                const code = errorCode(error);
                const retryable = timedOut || (code !== undefined && RETRYABLE_ERROR_CODES.has(code));

                lastError = timedOut
                    ? new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true)
                    : new HttpError(
                        `Network error: ${error instanceof Error ? error.message : String(error)}`,
                        0,
                        retryable
                    );

                if (retryable && !isLastAttempt) {
                    const backoff = computeBackoff(retry, attempt);
                    logger.warn(
                        { errorCode: code ?? (timedOut ? 'TIMEOUT' : undefined), attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                throw lastError;
            } finally {
                clearTimeout(timeoutId);
            }
        }

        throw lastError ?? new HttpError(`Max retries exceeded for ${url}`, 0, true);
    }

    /**
     * Convenience method for GET requests.
     */
    async get(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = this.rateLimits[source] ?? this.rateLimits['default'] ?? { tokensPerSecond: 5, maxBurst: 5 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

/**
 * Exponential backoff with jitter for a 0-based attempt number.
 */
export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
    const exponential = policy.baseDelayMs * Math.pow(2, attempt);
    const jitter = random() * exponential * policy.jitter;
    return Math.min(policy.maxDelayMs, exponential + jitter);
}

/**
 * Parse a Retry-After header given either as seconds or as an HTTP date.
 */
export function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    const seconds = Number(header);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);

    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

/**
 * Pull a system error code off a fetch failure; undici nests it under `cause`.
 */
function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    const cause = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
    return undefined;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
