
export class ForecastServiceError extends Error {
    readonly statusCode: number;
    readonly code: string;
    readonly context?: Record<string, unknown>;
    readonly isRecoverable: boolean;

    constructor(
        message: string,
        options: {
            statusCode?: number;
            code?: string;
            context?: Record<string, unknown>;
            isRecoverable?: boolean;
            cause?: unknown;
        } = {}
    ) {
        super(message, { cause: options.cause });
        this.name = 'ForecastServiceError';
        this.statusCode = options.statusCode ?? 500;
        this.code = options.code ?? 'INTERNAL_ERROR';
        this.context = options.context;
        this.isRecoverable = options.isRecoverable ?? false;
    }


    toJSON() {
        return {
            error: this.message,
            code: this.code,
            ...(process.env.NODE_ENV !== 'production' && this.context ? { context: this.context } : {}),
        };
    }
}


/**
 * Model artifacts (manifest, coefficients, info) are missing or unreadable.
 * Raised at startup; the service keeps running in historical-only mode.
 */
export class ConfigurationError extends ForecastServiceError {
    constructor(reason: string, options: { context?: Record<string, unknown>; cause?: unknown } = {}) {
        super(`Forecasting model is not configured: ${reason}`, {
            statusCode: 503,
            code: 'MODEL_NOT_CONFIGURED',
            isRecoverable: false,
            ...options,
        });
        this.name = 'ConfigurationError';
    }
}


/** No stored history precedes the requested period, so lags have nothing to read. */
export class NoContextError extends ForecastServiceError {
    constructor(contextStart: string, contextEnd: string) {
        super(`No historical sales found between ${contextStart} and ${contextEnd} to seed the forecast`, {
            statusCode: 422,
            code: 'NO_CONTEXT',
            isRecoverable: false,
            context: { contextStart, contextEnd },
        });
        this.name = 'NoContextError';
    }
}


export class PredictionFailure extends ForecastServiceError {
    constructor(
        message: string,
        options: { code?: string; context?: Record<string, unknown>; cause?: unknown } = {}
    ) {
        super(message, {
            statusCode: 502,
            code: options.code ?? 'PREDICTION_FAILED',
            isRecoverable: true,
            context: options.context,
            cause: options.cause,
        });
        this.name = 'PredictionFailure';
    }
}


export class ValidationError extends ForecastServiceError {
    constructor(
        message: string,
        options: {
            field?: string;
            context?: Record<string, unknown>;
        } = {}
    ) {
        super(message, {
            statusCode: 400,
            code: 'VALIDATION_ERROR',
            isRecoverable: true,
            context: options.field ? { field: options.field, ...options.context } : options.context,
        });
        this.name = 'ValidationError';
    }
}


export function isForecastServiceError(error: unknown): error is ForecastServiceError {
    return error instanceof ForecastServiceError;
}


/** user-safe error messages by error code */
const FRIENDLY_MESSAGES: Record<string, string> = {
    'VALIDATION_ERROR': 'Please check your input and try again.',
    'NO_CONTEXT': 'There is no sales history before this period to base a forecast on.',
    'PREDICTION_FAILED': 'The forecasting model could not produce a prediction.',
    'FEATURE_MISMATCH': 'The forecasting model rejected the feature layout.',
    'MODEL_NOT_CONFIGURED': 'Forecasting is not available; only historical data can be shown.',
    'INTERNAL_ERROR': 'Something went wrong. Please try again.',
};


export function getFriendlyMessage(error: unknown): string {
    if (isForecastServiceError(error)) {
        // Validation messages name the offending field, which is the useful part
        if (error.code === 'VALIDATION_ERROR') return error.message;
        return FRIENDLY_MESSAGES[error.code] || error.message;
    }

    return FRIENDLY_MESSAGES['INTERNAL_ERROR'];
}


export function toErrorResponse(error: unknown): {
    error: string;
    code: string;
    isRecoverable: boolean;
    context?: Record<string, unknown>;
} {
    if (isForecastServiceError(error)) {
        return {
            error: getFriendlyMessage(error),
            code: error.code,
            isRecoverable: error.isRecoverable,
            ...(process.env.NODE_ENV !== 'production' && error.context ? { context: error.context } : {}),
        };
    }

    return {
        error: getFriendlyMessage(error),
        code: 'INTERNAL_ERROR',
        isRecoverable: false,
    };
}

/**
 * Standardized route error handler for Fastify.
 *
 * @example
 * } catch (error) {
 *     return handleRouteError(error, reply, 'predict-top-categories');
 * }
 */
export function handleRouteError(
    error: unknown,
    reply: { code: (statusCode: number) => { send: (body: unknown) => unknown } },
    context?: string
): unknown {
    const statusCode = isForecastServiceError(error) ? error.statusCode : 500;
    const response = toErrorResponse(error);

    if (context && process.env.NODE_ENV !== 'production') {
        response.context = { ...response.context, operation: context };
    }

    return reply.code(statusCode).send(response);
}
