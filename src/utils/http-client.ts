import { CardLinkError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

export interface HttpClientOptions {
    timeout?: number;
    maxRetries?: number;
    initialBackoff?: number;
    maxBackoff?: number;
    version?: string;
    /** Replaces the real delay between retries (tests) */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * HTTP response wrapper. The body is kept as text.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    body: string;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends CardLinkError {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: string
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Network error code from a failed fetch. Node's fetch puts the socket
 * error on `cause`.
 */
function errorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (candidate instanceof Error && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * GET-only HTTP client with timeout and retry for fetching catalog exports.
 */
export class HttpClient {
    private readonly timeout: number;
    private readonly maxRetries: number;
    private readonly initialBackoff: number;
    private readonly maxBackoff: number;
    private readonly userAgent: string;
    private readonly wait: (ms: number) => Promise<void>;

    constructor(options: HttpClientOptions = {}) {
        this.timeout = options.timeout ?? 30000;
        this.maxRetries = options.maxRetries ?? 3;
        this.initialBackoff = options.initialBackoff ?? 1000;
        this.maxBackoff = options.maxBackoff ?? 30000;
        this.userAgent = `cardlink/${options.version ?? '0.1.0'}`;
        this.wait = options.sleep ?? sleep;
    }

    /**
     * GET a URL, retrying on 429/5xx and connection resets.
     */
    async get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
        const logger = getLogger('http');

        for (let attempt = 0; ; attempt++) {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), this.timeout);

            let response: Response;
            try {
                response = await fetch(url, {
                    method: 'GET',
                    headers: { 'User-Agent': this.userAgent, ...headers },
                    signal: controller.signal,
                });
            } catch (error) {
                clearTimeout(timeoutId);

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${this.timeout}ms: ${url}`, 0, true);
                }

                const code = errorCode(error);
                const retryable = code !== undefined && RETRYABLE_ERROR_CODES.has(code);
                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt);
                    logger.warn({ errorCode: code, attempt: attempt + 1, backoffMs: backoff, url }, 'Retryable network error, backing off');
                    await this.wait(backoff);
                    continue;
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            }

            let body: string;
            try {
                body = await response.text();
            } catch (error) {
                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${this.timeout}ms: ${url}`, 0, true);
                }
                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    false
                );
            } finally {
                clearTimeout(timeoutId);
            }

            if (response.ok) {
                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });
                return { status: response.status, headers: responseHeaders, body };
            }

            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            if (retryable && attempt < this.maxRetries) {
                const backoff = this.parseRetryAfter(response.headers.get('retry-after')) ?? this.calculateBackoff(attempt);
                logger.warn({ status: response.status, attempt: attempt + 1, backoffMs: backoff, url }, 'Retryable HTTP error, backing off');
                await this.wait(backoff);
                continue;
            }

            throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, body);
        }
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoff * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(this.maxBackoff, exponential + jitter);
    }
}
