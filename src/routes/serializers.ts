/**
 * Wire shapes for forecast responses (snake_case, as consumed by the dashboard).
 */

import { formatGrowthRate } from '../services/forecasting/CategoryRanker';
import { roundTo } from '../utils/format';
import type { CategoryAnswer, ModelInfo, Period } from '../services/forecasting/types';
import type { TimeSeriesResult } from '../services/forecasting/ForecastTimeSeries';

export interface PeriodResponse {
    start: string;
    end: string;
    days: number;
}

export interface ModelInfoResponse {
    model_type: string;
    training_date: string;
    feature_count: number;
    description: string;
    is_loaded: boolean;
}

export interface CategoryAnswerResponse {
    period: PeriodResponse;
    source: CategoryAnswer['source'];
    total_amount: number;
    total_amount_formatted: string;
    top_categories: {
        category: string;
        amount: number;
        amount_formatted: string;
        percentage: number;
        percentage_formatted: string;
    }[];
    data_quality: {
        historical_points: number;
        predicted_points: number;
        missing_points: number;
        completeness_pct: number;
        failed_chunks: number;
    };
    degraded?: CategoryAnswer['degraded'];
    model_info?: ModelInfoResponse;
    historical?: CategoryAnswerResponse;
    /** `percentage` is null when the baseline is zero and current is positive */
    growth?: { percentage: number | null; formatted: string };
}

export function serializePeriod(period: Period): PeriodResponse {
    return { start: period.start, end: period.end, days: period.days };
}

export function serializeModelInfo(info: ModelInfo): ModelInfoResponse {
    return {
        model_type: info.modelType,
        training_date: info.trainingDate,
        feature_count: info.featureCount,
        description: info.description,
        is_loaded: info.isLoaded,
    };
}

export function serializeAnswer(answer: CategoryAnswer): CategoryAnswerResponse {
    const response: CategoryAnswerResponse = {
        period: serializePeriod(answer.period),
        source: answer.source,
        total_amount: roundTo(answer.totalAmount),
        total_amount_formatted: answer.totalAmountFormatted,
        top_categories: answer.topCategories.map((entry) => ({
            category: entry.category,
            amount: roundTo(entry.amount),
            amount_formatted: entry.amountFormatted,
            percentage: roundTo(entry.percentage),
            percentage_formatted: entry.percentageFormatted,
        })),
        data_quality: {
            historical_points: answer.dataQuality.historicalPoints,
            predicted_points: answer.dataQuality.predictedPoints,
            missing_points: answer.dataQuality.missingPoints,
            completeness_pct: roundTo(answer.dataQuality.completenessPct),
            failed_chunks: answer.dataQuality.failedChunks,
        },
    };

    if (answer.degraded) response.degraded = answer.degraded;
    if (answer.modelInfo) response.model_info = serializeModelInfo(answer.modelInfo);
    if (answer.historical) response.historical = serializeAnswer(answer.historical);
    if (answer.growth) {
        response.growth = {
            percentage: answer.growth.kind === 'finite' ? roundTo(answer.growth.percentage) : null,
            formatted: formatGrowthRate(answer.growth),
        };
    }

    return response;
}

export function serializeTimeSeries(result: TimeSeriesResult) {
    return {
        period: serializePeriod(result.period),
        historical_period: serializePeriod(result.historicalPeriod),
        categories: result.categories,
        historical: result.historical,
        predicted: result.predicted,
        ...(result.degraded ? { degraded: result.degraded } : {}),
    };
}
