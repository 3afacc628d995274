/**
 * Environment Validation
 *
 * Applies defaults for optional settings at startup and reports what the
 * service will run without. Nothing is strictly required: with no database
 * the routes answer from an empty store, with no model they answer from
 * history only.
 */

import fs from 'fs';
import path from 'path';
import { Logger } from './logger';
import { MANIFEST_FILE } from '../services/model/ModelArtifacts';

interface EnvConfig {
    /** Variable name */
    name: string;
    /** Default value applied when unset */
    default?: string;
    /** Must parse as a positive integer when set */
    positiveInt?: boolean;
}

const ENV_CONFIG: EnvConfig[] = [
    { name: 'PORT', default: '3000', positiveInt: true },

    // Storage
    { name: 'DATABASE_URL' },
    { name: 'DATABASE_POOL_SIZE', positiveInt: true },

    // Forecasting
    { name: 'MODEL_DIR' },
    { name: 'CONTEXT_DAYS', default: '60', positiveInt: true },
    { name: 'MAX_CHUNK_DAYS', default: '31', positiveInt: true },
    { name: 'MISSING_VALUE_DEFAULT', default: '0' },
    { name: 'DEFAULT_FORECAST_DAYS', default: '30', positiveInt: true },
    { name: 'DEFAULT_TOP_CATEGORIES', default: '5', positiveInt: true },

    { name: 'CORS_ORIGINS' },
];

export interface EnvironmentReport {
    databaseConfigured: boolean;
    modelDir: string;
}

/**
 * Validates environment variables and logs warnings/errors.
 * Throws if a numeric variable is malformed.
 */
export function validateEnvironment(modelDir: string): EnvironmentReport {
    const invalid: string[] = [];
    const warnings: string[] = [];

    for (const config of ENV_CONFIG) {
        const value = process.env[config.name];

        if (!value) {
            if (config.default) {
                process.env[config.name] = config.default;
                warnings.push(`${config.name} not set, using default: ${config.default}`);
            }
            continue;
        }

        if (config.positiveInt && !/^[1-9]\d*$/.test(value)) {
            invalid.push(config.name);
        }
    }

    if (process.env.MISSING_VALUE_DEFAULT && !Number.isFinite(Number(process.env.MISSING_VALUE_DEFAULT))) {
        invalid.push('MISSING_VALUE_DEFAULT');
    }

    if (warnings.length > 0) {
        Logger.warn('[ENV] Using default values', { variables: warnings });
    }

    if (invalid.length > 0) {
        Logger.error('[ENV] Malformed numeric environment variables', { invalid });
        throw new Error(`Malformed numeric environment variables: ${invalid.join(', ')}`);
    }

    const databaseConfigured = Boolean(process.env.DATABASE_URL);
    if (!databaseConfigured) {
        Logger.warn('[ENV] DATABASE_URL not set, serving from an empty in-memory store');
    }

    if (!fs.existsSync(path.join(modelDir, MANIFEST_FILE))) {
        Logger.warn('[ENV] No feature manifest found, forecasts will fall back to history', { modelDir });
    }

    Logger.info('[ENV] Environment validation passed');

    return { databaseConfigured, modelDir };
}
