/**
 * Prediction Orchestrator
 *
 * Sequences one forecast request:
 * REQUESTED -> CONTEXT_LOADED -> FEATURES_SYNTHESIZED -> PREDICTED -> AGGREGATED
 *   -> [HISTORICAL_COMPARISON_ATTACHED] -> DONE, or FAILED with a typed cause.
 *
 * Store, model and configuration are injected; nothing here is global. Each
 * call owns its working buffer, so concurrent requests share only the frozen
 * model artifacts.
 */

import { Logger } from '../../utils/logger';
import { isForecastServiceError, NoContextError, PredictionFailure } from '../../utils/errors';
import { normalizePeriod, shiftDateKey } from '../../utils/dates';
import type { ForecastConfig } from '../../config/forecasting';
import { UNLOADED_MODEL_INFO, type LoadedModel } from '../model/ModelArtifacts';
import { FeatureSynthesizer } from './FeatureSynthesizer';
import { GapFillReconciler } from './GapFillReconciler';
import { aggregateRows, calculateGrowthRate, rankCategories } from './CategoryRanker';
import type {
    CategoryAnswer,
    DailyForecast,
    DailyForecaster,
    DateKey,
    DegradedNotice,
    FeatureVector,
    HistoricalStore,
    ModelInfo,
    Period,
} from './types';

export type ForecastStage =
    | 'REQUESTED'
    | 'CONTEXT_LOADED'
    | 'FEATURES_SYNTHESIZED'
    | 'PREDICTED'
    | 'AGGREGATED'
    | 'HISTORICAL_COMPARISON_ATTACHED'
    | 'DONE'
    | 'FAILED';

export interface ForecastRequest {
    period: Period;
    topN: number;
    includeHistorical?: boolean;
}

export interface PredictionOrchestratorDeps {
    store: HistoricalStore;
    /** Null when artifacts failed to load; requests then degrade to history */
    model: LoadedModel | null;
    config: ForecastConfig;
    /** Why the model is missing, surfaced in degraded responses */
    unavailableReason?: string;
}

type StageListener = (stage: ForecastStage) => void;

export class PredictionOrchestrator implements DailyForecaster {
    private readonly store: HistoricalStore;
    private readonly model: LoadedModel | null;
    private readonly config: ForecastConfig;
    private readonly unavailableReason: string;
    private readonly synthesizer: FeatureSynthesizer | null;
    readonly reconciler: GapFillReconciler;

    constructor(deps: PredictionOrchestratorDeps) {
        this.store = deps.store;
        this.model = deps.model;
        this.config = deps.config;
        this.unavailableReason = deps.unavailableReason ?? 'Forecasting model is not loaded';
        this.synthesizer = deps.model
            ? new FeatureSynthesizer(deps.model.manifest, deps.model.predictor.targets, deps.config.features)
            : null;
        this.reconciler = new GapFillReconciler(deps.store, deps.model ? this : null, {
            maxChunkDays: deps.config.maxChunkDays,
        });
    }

    get isModelLoaded(): boolean {
        return this.model !== null;
    }

    modelInfo(): ModelInfo {
        return this.model?.info ?? UNLOADED_MODEL_INFO;
    }

    /** Reconciled history for a period, gaps filled where a model is loaded */
    historicalTopCategories(period: Period, topN: number): Promise<CategoryAnswer> {
        return this.reconciler.topCategories(period, topN);
    }

    async forecast(request: ForecastRequest): Promise<CategoryAnswer> {
        const period = normalizePeriod(request.period.start, request.period.end);
        let stage: ForecastStage = 'REQUESTED';
        const advance: StageListener = (next) => {
            stage = next;
            Logger.debug('[Forecast] Stage', { stage, period });
        };

        if (!this.model) {
            Logger.warn('[Forecast] Model not loaded, returning historical data only', { period });
            return this.degradedAnswer(period, request.topN, {
                reason: 'model_unavailable',
                message: this.unavailableReason,
            });
        }

        try {
            const daily = await this.runDaily(period.start, period.end, advance);

            const ranking = rankCategories(aggregateRows(daily), request.topN);
            advance('AGGREGATED');

            const answer: CategoryAnswer = {
                period,
                source: 'forecast',
                dataQuality: {
                    historicalPoints: 0,
                    predictedPoints: daily.length,
                    missingPoints: period.days - daily.length,
                    completenessPct: 0,
                    failedChunks: 0,
                },
                modelInfo: this.modelInfo(),
                ...ranking,
            };

            if (request.includeHistorical) {
                const baseline = normalizePeriod(
                    shiftDateKey(period.start, -period.days),
                    shiftDateKey(period.start, -1)
                );
                const historical = await this.reconciler.topCategories(baseline, request.topN);
                answer.historical = historical;
                answer.growth = calculateGrowthRate(ranking.totalAmount, historical.totalAmount);
                advance('HISTORICAL_COMPARISON_ATTACHED');
            }

            advance('DONE');
            return answer;
        } catch (error) {
            if (error instanceof PredictionFailure) {
                Logger.warn('[Forecast] Prediction failed, falling back to historical data', {
                    period,
                    stage,
                    code: error.code,
                    error: error.message,
                });
                return this.degradedAnswer(period, request.topN, {
                    reason: 'prediction_failed',
                    message: error.message,
                });
            }

            const failedAt = stage;
            advance('FAILED');
            Logger.error('[Forecast] Request failed', {
                period,
                stage: failedAt,
                code: isForecastServiceError(error) ? error.code : 'INTERNAL_ERROR',
                error: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }

    /**
     * Daily per-category predictions for a contiguous range, used by the
     * reconciler to fill gaps.
     *
     * @throws NoContextError when nothing is stored in the trailing context window
     * @throws PredictionFailure when the predictor throws or returns a bad shape
     */
    forecastDaily(start: DateKey, end: DateKey): Promise<DailyForecast> {
        return this.runDaily(start, end);
    }

    private async runDaily(start: DateKey, end: DateKey, advance?: StageListener): Promise<DailyForecast> {
        if (!this.model || !this.synthesizer) {
            throw new PredictionFailure(this.unavailableReason, { code: 'MODEL_NOT_CONFIGURED' });
        }

        const contextStart = shiftDateKey(start, -this.config.contextDays);
        const contextEnd = shiftDateKey(start, -1);
        const context = await this.store.getRange(contextStart, contextEnd);
        if (context.length === 0) {
            throw new NoContextError(contextStart, contextEnd);
        }
        advance?.('CONTEXT_LOADED');

        const daily: DailyForecast = [];
        await this.synthesizer.synthesize(start, end, context, async (vector) => {
            const values = await this.predictRow(vector);
            daily.push({ date: vector.date, values });
            return values;
        });
        advance?.('FEATURES_SYNTHESIZED');
        advance?.('PREDICTED');

        return daily;
    }

    /** Guards the manifest contract on both sides of the predictor call */
    private async predictRow(vector: FeatureVector): Promise<Record<string, number>> {
        if (!this.model) {
            throw new PredictionFailure(this.unavailableReason, { code: 'MODEL_NOT_CONFIGURED' });
        }
        const { manifest, predictor } = this.model;

        if (vector.values.length !== manifest.length) {
            throw new PredictionFailure('Feature row does not match the manifest', {
                code: 'FEATURE_MISMATCH',
                context: { date: vector.date, expected: manifest.length, actual: vector.values.length },
            });
        }

        let output: number[][];
        try {
            output = await predictor.predict([vector.values]);
        } catch (error) {
            throw new PredictionFailure('Predictor invocation failed', {
                context: { date: vector.date },
                cause: error,
            });
        }

        const row = output[0];
        if (output.length !== 1 || !row || row.length !== predictor.targets.length || !row.every(Number.isFinite)) {
            throw new PredictionFailure('Predictor returned an unexpected output shape', {
                context: { date: vector.date, expectedWidth: predictor.targets.length },
            });
        }

        const values: Record<string, number> = {};
        predictor.targets.forEach((category, i) => {
            values[category] = row[i];
        });
        return values;
    }

    private async degradedAnswer(period: Period, topN: number, notice: DegradedNotice): Promise<CategoryAnswer> {
        const answer = await this.reconciler.topCategories(period, topN);
        return { ...answer, degraded: notice, modelInfo: this.modelInfo() };
    }
}
