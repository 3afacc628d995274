/**
 * Forecasting Configuration
 *
 * Centralized tuning for feature synthesis, gap filling and request defaults.
 * Values read from the environment fall back to the documented defaults.
 */

import path from 'path';

function envInt(name: string, fallback: number): number {
    const parsed = parseInt(process.env[name] ?? '', 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function envFloat(name: string, fallback: number): number {
    const parsed = parseFloat(process.env[name] ?? '');
    return Number.isFinite(parsed) ? parsed : fallback;
}

export interface FeatureConfig {
    /** Lag offsets in days, one `<category>_lag_<n>` column each */
    lagDays: readonly number[];
    /** Rolling windows in days, producing `_rolling_avg_` and `_rolling_std_` columns */
    rollingWindows: readonly number[];
    /** Month (1-12) flagged by the `is_<month>` calendar column */
    specialMonth: number;
    /**
     * Value used when a lag or rolling window finds nothing in the combined view.
     * Explicit and fixed so repeated runs produce identical features.
     */
    missingValueDefault: number;
}

export interface ForecastConfig {
    features: FeatureConfig;
    /** Trailing days loaded before a period to seed lags and windows */
    contextDays: number;
    /** Upper bound on a gap-fill chunk; longer runs of missing dates are split */
    maxChunkDays: number;
    defaultForecastDays: number;
    defaultTopCategories: number;
    /** Days of history shown before the forecast in the time-series view */
    defaultHistoricalDays: number;
}

export function loadForecastConfig(): ForecastConfig {
    return {
        features: {
            lagDays: [1, 7, 14, 28],
            rollingWindows: [7, 14, 28],
            specialMonth: 11,
            missingValueDefault: envFloat('MISSING_VALUE_DEFAULT', 0),
        },
        contextDays: envInt('CONTEXT_DAYS', 60),
        maxChunkDays: envInt('MAX_CHUNK_DAYS', 31),
        defaultForecastDays: envInt('DEFAULT_FORECAST_DAYS', 30),
        defaultTopCategories: envInt('DEFAULT_TOP_CATEGORIES', 5),
        defaultHistoricalDays: 180,
    };
}

/** Directory holding feature_columns.json, model.json and model_info.json */
export function resolveModelDir(): string {
    return process.env.MODEL_DIR
        ? path.resolve(process.env.MODEL_DIR)
        : path.join(__dirname, '../../model');
}
