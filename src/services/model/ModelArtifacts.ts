/**
 * Model Artifact Loading
 *
 * Reads the trained model from a directory:
 *   feature_columns.json  ordered feature manifest
 *   model.json            linear coefficients per target category
 *   model_info.json       descriptive metadata
 *
 * Everything loaded here is frozen and shared read-only across requests.
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { Logger } from '../../utils/logger';
import { ConfigurationError } from '../../utils/errors';
import { LinearPredictor } from './LinearPredictor';
import type { FeatureManifest, ModelInfo, Predictor } from '../forecasting/types';

export const MANIFEST_FILE = 'feature_columns.json';
export const MODEL_FILE = 'model.json';
export const MODEL_INFO_FILE = 'model_info.json';

const manifestSchema = z.array(z.string().min(1)).min(1);

const modelSchema = z.object({
    model_type: z.string().default('LinearRegression'),
    targets: z.array(z.string().min(1)).min(1),
    intercepts: z.array(z.number()),
    coefficients: z.array(z.array(z.number())),
});

const modelInfoSchema = z.object({
    model_type: z.string().optional(),
    training_date: z.string().default('Unknown'),
    feature_count: z.number().int().nonnegative().optional(),
    description: z.string().default(''),
});

export interface LoadedModel {
    manifest: FeatureManifest;
    predictor: Predictor;
    info: ModelInfo;
}

export const UNLOADED_MODEL_INFO: ModelInfo = Object.freeze({
    modelType: 'None',
    trainingDate: 'Unknown',
    featureCount: 0,
    description: 'Model not loaded',
    isLoaded: false,
});

async function readJson<S extends z.ZodTypeAny>(dir: string, file: string, schema: S): Promise<z.infer<S>> {
    const fullPath = path.join(dir, file);
    let raw: string;
    try {
        raw = await fs.readFile(fullPath, 'utf8');
    } catch (error) {
        throw new ConfigurationError(`${file} not found in ${dir}`, { context: { path: fullPath }, cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`${file} is not valid JSON`, { context: { path: fullPath }, cause: error });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        throw new ConfigurationError(`${file} has an unexpected shape`, {
            context: { path: fullPath, issues: result.error.issues.map((issue) => issue.message) },
        });
    }
    return result.data;
}

export async function loadFeatureManifest(dir: string): Promise<FeatureManifest> {
    const columns = await readJson(dir, MANIFEST_FILE, manifestSchema);
    const duplicates = columns.filter((name, i) => columns.indexOf(name) !== i);
    if (duplicates.length > 0) {
        throw new ConfigurationError(`${MANIFEST_FILE} lists duplicate columns`, { context: { duplicates } });
    }
    return Object.freeze([...columns]);
}

/**
 * Loads manifest, coefficients and info, checking that the model's
 * input width matches the manifest.
 *
 * @throws ConfigurationError when any artifact is missing or inconsistent
 */
export async function loadModelArtifacts(dir: string): Promise<LoadedModel> {
    const manifest = await loadFeatureManifest(dir);
    const model = await readJson(dir, MODEL_FILE, modelSchema);
    const info = await readJson(dir, MODEL_INFO_FILE, modelInfoSchema);

    let predictor: LinearPredictor;
    try {
        predictor = new LinearPredictor(model);
    } catch (error) {
        throw new ConfigurationError(error instanceof Error ? error.message : String(error), { cause: error });
    }

    if (predictor.featureCount !== manifest.length) {
        throw new ConfigurationError('model input width does not match the feature manifest', {
            context: { modelFeatures: predictor.featureCount, manifestColumns: manifest.length },
        });
    }

    Logger.info('[Model] Loaded forecasting model', {
        modelType: info.model_type ?? model.model_type,
        targets: predictor.targets.length,
        features: manifest.length,
    });

    return {
        manifest,
        predictor,
        info: Object.freeze({
            modelType: info.model_type ?? model.model_type,
            trainingDate: info.training_date,
            featureCount: info.feature_count ?? manifest.length,
            description: info.description,
            isLoaded: true,
        }),
    };
}
