import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * HTTP client options.
 */
export interface HttpClientOptions {
    timeout?: number;
    maxRetries?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;
    version?: string;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Read a Node/undici error code, which fetch nests under `cause`.
 */
function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    if ('cause' in error) return errorCode(error.cause);
    return undefined;
}

/**
 * Download client with timeout and retry logic.
 */
export class HttpClient {
    private readonly defaultTimeout: number;
    private readonly maxRetries: number;
    private readonly initialBackoff: number;
    private readonly maxBackoff: number;
    private readonly userAgent: string;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        this.maxRetries = options.maxRetries ?? 3;
        this.initialBackoff = options.initialBackoffMs ?? 1000;
        this.maxBackoff = options.maxBackoffMs ?? 30000;
        this.userAgent = `wordlist-oracle/${options.version ?? '1.0.0'}`;
    }

    /**
     * GET a binary resource, retrying transient failures.
     */
    async getBuffer(url: string, timeout = this.defaultTimeout): Promise<Buffer> {
        const logger = getLogger();

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await fetch(url, {
                    method: 'GET',
                    headers: { 'User-Agent': this.userAgent },
                    signal: controller.signal,
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < this.maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt);

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable
                    );
                }

                return Buffer.from(await response.arrayBuffer());
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const code = errorCode(error);
                const retryable = code ? RETRYABLE_ERROR_CODES.has(code) : false;

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt);
                    logger.warn(
                        { errorCode: code, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
            }
        }

        // Unreachable: the last attempt either returns or throws
        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
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

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
