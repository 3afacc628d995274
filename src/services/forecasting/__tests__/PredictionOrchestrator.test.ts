import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PredictionOrchestrator } from '../PredictionOrchestrator';
import { InMemoryHistoricalStore } from '../../store/InMemoryHistoricalStore';
import { LinearPredictor } from '../../model/LinearPredictor';
import { UNLOADED_MODEL_INFO, type LoadedModel } from '../../model/ModelArtifacts';
import { NoContextError, PredictionFailure } from '../../../utils/errors';
import { normalizePeriod } from '../../../utils/dates';
import type { ForecastConfig } from '../../../config/forecasting';
import type { Predictor } from '../types';

vi.mock('../../../utils/logger', () => ({
    Logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
        http: vi.fn(),
    }
}));

const config: ForecastConfig = {
    features: { lagDays: [1, 7], rollingWindows: [7], specialMonth: 11, missingValueDefault: 0 },
    contextDays: 60,
    maxChunkDays: 31,
    defaultForecastDays: 30,
    defaultTopCategories: 5,
    defaultHistoricalDays: 180,
};

const info = {
    modelType: 'LinearRegression',
    trainingDate: '2023-12-31',
    featureCount: 1,
    description: 'test model',
    isLoaded: true,
};

/** Yesterday's value plus a fixed step: A(d) = A(d-1) + 10 */
function stepModel(): LoadedModel {
    return {
        manifest: ['A_lag_1'],
        predictor: new LinearPredictor({ targets: ['A'], intercepts: [10], coefficients: [[1]] }),
        info,
    };
}

function withPredictor(predictor: Predictor): LoadedModel {
    return { manifest: ['A_lag_1'], predictor, info };
}

describe('PredictionOrchestrator', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('feeds each predicted day into the next day\'s lag', async () => {
        const store = new InMemoryHistoricalStore([{ date: '2024-01-01', category: 'A', amount: 100 }]);
        const orchestrator = new PredictionOrchestrator({ store, model: stepModel(), config });

        const daily = await orchestrator.forecastDaily('2024-01-02', '2024-01-04');

        expect(daily).toEqual([
            { date: '2024-01-02', values: { A: 110 } },
            { date: '2024-01-03', values: { A: 120 } },
            { date: '2024-01-04', values: { A: 130 } },
        ]);
    });

    it('ranks the forecast and reports it as fully predicted', async () => {
        const store = new InMemoryHistoricalStore([{ date: '2024-01-01', category: 'A', amount: 100 }]);
        const orchestrator = new PredictionOrchestrator({ store, model: stepModel(), config });

        const answer = await orchestrator.forecast({ period: normalizePeriod('2024-01-02', '2024-01-04'), topN: 5 });

        expect(answer.source).toBe('forecast');
        expect(answer.totalAmount).toBe(360);
        expect(answer.topCategories[0].percentageFormatted).toBe('100.00%');
        expect(answer.dataQuality).toEqual({
            historicalPoints: 0,
            predictedPoints: 3,
            missingPoints: 0,
            completenessPct: 0,
            failedChunks: 0,
        });
        expect(answer.modelInfo).toEqual(info);
        expect(answer.degraded).toBeUndefined();
        expect(answer.historical).toBeUndefined();
    });

    it('fills the missing day of the reference scenario from the model', async () => {
        const store = new InMemoryHistoricalStore([
            { date: '2024-01-01', category: 'Electronics', amount: 100 },
            { date: '2024-01-02', category: 'Electronics', amount: 200 },
            { date: '2024-01-03', category: 'Electronics', amount: 150 },
            { date: '2024-01-04', category: 'Electronics', amount: 0 },
            { date: '2024-01-05', category: 'Electronics', amount: 180 },
        ]);
        const model: LoadedModel = {
            manifest: ['Electronics_lag_1'],
            predictor: new LinearPredictor({ targets: ['Electronics'], intercepts: [0], coefficients: [[1]] }),
            info,
        };
        const orchestrator = new PredictionOrchestrator({ store, model, config });
        const period = normalizePeriod('2024-01-03', '2024-01-06');

        const first = await orchestrator.historicalTopCategories(period, 2);
        const second = await orchestrator.historicalTopCategories(period, 2);

        // Jan 6 repeats Jan 5
        expect(first.totalAmount).toBe(510);
        expect(first.dataQuality.predictedPoints).toBe(1);
        expect(first.dataQuality.completenessPct).toBe(75);
        expect(second).toEqual(first);
    });

    it('attaches the preceding period and growth on request', async () => {
        const store = new InMemoryHistoricalStore([
            { date: '2023-12-31', category: 'A', amount: 15 },
            { date: '2024-01-01', category: 'A', amount: 100 },
        ]);
        const orchestrator = new PredictionOrchestrator({ store, model: stepModel(), config });

        const answer = await orchestrator.forecast({
            period: normalizePeriod('2024-01-02', '2024-01-03'),
            topN: 5,
            includeHistorical: true,
        });

        expect(answer.totalAmount).toBe(230);
        expect(answer.historical?.period).toEqual({ start: '2023-12-31', end: '2024-01-01', days: 2 });
        expect(answer.historical?.source).toBe('historical');
        expect(answer.historical?.totalAmount).toBe(115);
        expect(answer.growth).toEqual({ kind: 'finite', percentage: 100 });
    });

    it('reports infinite growth from an empty baseline', async () => {
        const store = new InMemoryHistoricalStore([{ date: '2024-01-01', category: 'A', amount: 0 }]);
        const orchestrator = new PredictionOrchestrator({ store, model: stepModel(), config });

        const answer = await orchestrator.forecast({
            period: normalizePeriod('2024-01-02', '2024-01-02'),
            topN: 5,
            includeHistorical: true,
        });

        expect(answer.totalAmount).toBe(10);
        expect(answer.historical?.totalAmount).toBe(0);
        expect(answer.growth).toEqual({ kind: 'infinite' });
    });

    it('fails the request when nothing precedes the period', async () => {
        const store = new InMemoryHistoricalStore([{ date: '2024-06-01', category: 'A', amount: 100 }]);
        const orchestrator = new PredictionOrchestrator({ store, model: stepModel(), config });

        await expect(
            orchestrator.forecast({ period: normalizePeriod('2024-01-02', '2024-01-03'), topN: 5 })
        ).rejects.toBeInstanceOf(NoContextError);
    });

    it('answers from history when no model is loaded', async () => {
        const store = new InMemoryHistoricalStore([{ date: '2024-01-02', category: 'A', amount: 40 }]);
        const orchestrator = new PredictionOrchestrator({ store, model: null, config });

        const answer = await orchestrator.forecast({ period: normalizePeriod('2024-01-02', '2024-01-03'), topN: 5 });

        expect(orchestrator.isModelLoaded).toBe(false);
        expect(answer.source).toBe('historical');
        expect(answer.totalAmount).toBe(40);
        expect(answer.degraded).toEqual({
            reason: 'model_unavailable',
            message: 'Forecasting model is not loaded',
        });
        expect(answer.modelInfo).toEqual(UNLOADED_MODEL_INFO);
        expect(answer.dataQuality.missingPoints).toBe(1);
    });

    it('surfaces the startup reason in degraded answers', async () => {
        const orchestrator = new PredictionOrchestrator({
            store: new InMemoryHistoricalStore(),
            model: null,
            config,
            unavailableReason: 'Forecasting model is not configured: model.json not found in /models',
        });

        const answer = await orchestrator.forecast({ period: normalizePeriod('2024-01-02', '2024-01-02'), topN: 5 });

        expect(answer.degraded?.message).toBe('Forecasting model is not configured: model.json not found in /models');
    });

    it('falls back to history when the predictor throws', async () => {
        const store = new InMemoryHistoricalStore([
            { date: '2024-01-01', category: 'A', amount: 100 },
            { date: '2024-01-03', category: 'A', amount: 70 },
        ]);
        const predict = vi.fn(async () => {
            throw new Error('inference backend unavailable');
        });
        const orchestrator = new PredictionOrchestrator({
            store,
            model: withPredictor({ targets: ['A'], predict }),
            config,
        });

        const answer = await orchestrator.forecast({ period: normalizePeriod('2024-01-02', '2024-01-03'), topN: 5 });

        expect(answer.degraded).toEqual({ reason: 'prediction_failed', message: 'Predictor invocation failed' });
        expect(answer.source).toBe('historical');
        expect(answer.totalAmount).toBe(70);
        expect(answer.dataQuality.failedChunks).toBe(1);
    });

    it('rejects output rows of the wrong width', async () => {
        const store = new InMemoryHistoricalStore([{ date: '2024-01-01', category: 'A', amount: 100 }]);
        const orchestrator = new PredictionOrchestrator({
            store,
            model: withPredictor({ targets: ['A'], predict: async () => [[1, 2]] }),
            config,
        });

        await expect(orchestrator.forecastDaily('2024-01-02', '2024-01-02')).rejects.toThrow(
            'Predictor returned an unexpected output shape'
        );
    });

    it('rejects non-finite predictions', async () => {
        const store = new InMemoryHistoricalStore([{ date: '2024-01-01', category: 'A', amount: 100 }]);
        const orchestrator = new PredictionOrchestrator({
            store,
            model: withPredictor({ targets: ['A'], predict: async () => [[Number.NaN]] }),
            config,
        });

        await expect(orchestrator.forecastDaily('2024-01-02', '2024-01-02')).rejects.toBeInstanceOf(
            PredictionFailure
        );
    });

    it('passes one manifest-aligned row per predictor call', async () => {
        const store = new InMemoryHistoricalStore([{ date: '2024-01-01', category: 'A', amount: 100 }]);
        const predict = vi.fn(async (matrix: number[][]) => matrix.map((row) => [row[0]]));
        const orchestrator = new PredictionOrchestrator({
            store,
            model: withPredictor({ targets: ['A'], predict }),
            config,
        });

        await orchestrator.forecastDaily('2024-01-02', '2024-01-03');

        expect(predict.mock.calls).toEqual([[[[100]]], [[[100]]]]);
    });
});
