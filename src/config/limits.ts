/**
 * Centralized Configuration: Limits & Thresholds
 */


export const RATE_LIMITS = {
    /** Maximum requests per window per IP */
    MAX_REQUESTS: 300,
    /** Time window for rate limiting */
    WINDOW: '1 minute',
} as const;


export const QUERY_LIMITS = {
    /** Largest top_n a caller may ask for */
    MAX_TOP_N: 50,
    /** Longest period (days) a single request may cover */
    MAX_PERIOD_DAYS: 366,
    /** Longest history window for the time-series view */
    MAX_HISTORICAL_DAYS: 730,
} as const;


export const SHUTDOWN_LIMITS = {
    /** Graceful shutdown timeout in milliseconds */
    SHUTDOWN_TIMEOUT_MS: 10_000,
} as const;
