/**
 * Retry configuration
 */
export interface RetryConfig {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
}

/**
 * Default retry configuration: one retry after a flat one-second pause
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 1,
    initialDelayMs: 1000,
    maxDelayMs: 60000,
    backoffMultiplier: 1
};

/**
 * Sleep for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
    if (ms <= 0) {
        return Promise.resolve();
    }
    return new Promise(resolve => setTimeout(resolve, ms));
}

function readField(error: unknown, field: string): unknown {
    if (typeof error !== 'object' || error === null || !(field in error)) {
        return undefined;
    }
    return Reflect.get(error, field);
}

/**
 * Extract an HTTP status code from an SDK or axios error, if it carries one
 */
export function getErrorStatus(error: unknown): number | undefined {
    const candidates = [
        readField(error, 'status'),
        readField(error, 'statusCode'),
        readField(readField(error, 'response'), 'status')
    ];

    for (const candidate of candidates) {
        if (typeof candidate === 'number') {
            return candidate;
        }
        if (typeof candidate === 'string' && /^\d{3}$/.test(candidate)) {
            return Number(candidate);
        }
    }
    return undefined;
}

function errorText(error: unknown): string {
    const message = readField(error, 'message');
    const text = typeof message === 'string' ? message : '';
    return `${String(error)} ${text}`.toLowerCase();
}

/**
 * Check if an error is a rate limit error
 */
export function isRateLimitError(error: unknown): boolean {
    if (!error) {
        return false;
    }

    // HTTP 429 status code
    if (getErrorStatus(error) === 429) {
        return true;
    }

    // Common rate limit error messages
    const rateLimitKeywords = [
        'rate limit',
        'rate_limit',
        'too many requests',
        'quota exceeded',
        'resource exhausted',
        'throttle',
        'throttled'
    ];

    const text = errorText(error);
    return rateLimitKeywords.some(keyword => text.includes(keyword));
}

/**
 * Check if an error is an authentication or authorization failure
 */
export function isAuthError(error: unknown): boolean {
    const status = getErrorStatus(error);
    if (status === 401 || status === 403) {
        return true;
    }
    const text = errorText(error);
    return text.includes('api key not valid') || text.includes('invalid api key');
}

/**
 * Check if an error is a timeout
 */
export function isTimeoutError(error: unknown): boolean {
    const name = readField(error, 'name');
    const code = readField(error, 'code');
    if (name === 'AbortError' || name === 'APIConnectionTimeoutError' || code === 'ECONNABORTED') {
        return true;
    }
    return getErrorStatus(error) === 408 || errorText(error).includes('timed out');
}

/**
 * Delay before the retry that follows attempt number `attempt` (0-based)
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
    const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
    return Math.min(delay, config.maxDelayMs);
}
