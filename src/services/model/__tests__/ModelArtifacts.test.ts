import { describe, it, expect, vi } from 'vitest';
import path from 'path';
import { loadFeatureManifest, loadModelArtifacts } from '../ModelArtifacts';
import { ConfigurationError } from '../../../utils/errors';

vi.mock('../../../utils/logger', () => ({
    Logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }
}));

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

describe('loadModelArtifacts', () => {
    it('loads manifest, predictor and info', async () => {
        const model = await loadModelArtifacts(fixture('valid'));

        expect(model.manifest).toEqual(['year', 'A_lag_1', 'B_lag_1']);
        expect(model.predictor.targets).toEqual(['A', 'B']);
        expect(model.info).toEqual({
            modelType: 'LinearRegression',
            trainingDate: '2024-06-01',
            featureCount: 3,
            description: 'fixture model',
            isLoaded: true,
        });
        await expect(model.predictor.predict([[2024, 10, 20]])).resolves.toEqual([[11, 22]]);
    });

    it('freezes the manifest', async () => {
        const model = await loadModelArtifacts(fixture('valid'));
        expect(Object.isFrozen(model.manifest)).toBe(true);
    });

    it('rejects a model narrower than the manifest', async () => {
        await expect(loadModelArtifacts(fixture('width-mismatch'))).rejects.toThrow(
            'Forecasting model is not configured: model input width does not match the feature manifest'
        );
    });

    it('reports a missing directory as a configuration error', async () => {
        const dir = fixture('does-not-exist');
        await expect(loadModelArtifacts(dir)).rejects.toThrow(
            `Forecasting model is not configured: feature_columns.json not found in ${dir}`
        );
    });

    it('reports unparseable JSON', async () => {
        await expect(loadModelArtifacts(fixture('broken-json'))).rejects.toThrow(
            'Forecasting model is not configured: feature_columns.json is not valid JSON'
        );
    });
});

describe('loadFeatureManifest', () => {
    it('rejects duplicate columns', async () => {
        await expect(loadFeatureManifest(fixture('duplicate-columns'))).rejects.toBeInstanceOf(ConfigurationError);
        await expect(loadFeatureManifest(fixture('duplicate-columns'))).rejects.toMatchObject({
            code: 'MODEL_NOT_CONFIGURED',
            context: { duplicates: ['year'] },
        });
    });
});
