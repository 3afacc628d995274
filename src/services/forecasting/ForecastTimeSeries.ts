/**
 * Time-series view for charts: recorded daily amounts before a period and
 * predicted daily amounts inside it, restricted to the top-N categories.
 */

import { Logger } from '../../utils/logger';
import { PredictionFailure } from '../../utils/errors';
import { normalizePeriod, shiftDateKey } from '../../utils/dates';
import { aggregateRows, rankCategories } from './CategoryRanker';
import type { PredictionOrchestrator } from './PredictionOrchestrator';
import type { DailySalesRow, DegradedNotice, HistoricalStore, Period } from './types';

export interface TimeSeriesPoint {
    date: string;
    values: Record<string, number>;
}

export interface TimeSeriesResult {
    period: Period;
    historicalPeriod: Period;
    categories: string[];
    historical: TimeSeriesPoint[];
    predicted: TimeSeriesPoint[];
    degraded?: DegradedNotice;
}

export interface TimeSeriesRequest {
    period: Period;
    topN: number;
    historicalDays: number;
}

function toSeries(rows: readonly DailySalesRow[], categories: readonly string[]): TimeSeriesPoint[] {
    return rows.map((row) => ({
        date: row.date,
        values: Object.fromEntries(categories.map((category) => [category, row.values[category] ?? 0])),
    }));
}

export class ForecastTimeSeries {
    constructor(
        private readonly store: HistoricalStore,
        private readonly orchestrator: PredictionOrchestrator
    ) {}

    async build(request: TimeSeriesRequest): Promise<TimeSeriesResult> {
        const period = normalizePeriod(request.period.start, request.period.end);
        const historicalPeriod = normalizePeriod(
            shiftDateKey(period.start, -Math.max(1, request.historicalDays)),
            shiftDateKey(period.start, -1)
        );

        const historicalRows = await this.store.getRange(historicalPeriod.start, historicalPeriod.end);

        let predictedRows: DailySalesRow[] = [];
        let degraded: DegradedNotice | undefined;

        if (this.orchestrator.isModelLoaded) {
            try {
                predictedRows = await this.orchestrator.forecastDaily(period.start, period.end);
            } catch (error) {
                if (!(error instanceof PredictionFailure)) throw error;
                Logger.warn('[TimeSeries] Prediction failed, returning history only', { period, error: error.message });
                degraded = { reason: 'prediction_failed', message: error.message };
            }
        } else {
            degraded = { reason: 'model_unavailable', message: this.orchestrator.modelInfo().description };
        }

        // Rank on the forecast when there is one, otherwise on history
        const rankingSource = predictedRows.length > 0 ? predictedRows : historicalRows;
        const categories = rankCategories(aggregateRows(rankingSource), request.topN)
            .topCategories.map((entry) => entry.category);

        return {
            period,
            historicalPeriod,
            categories,
            historical: toSeries(historicalRows, categories),
            predicted: toSeries(predictedRows, categories),
            ...(degraded ? { degraded } : {}),
        };
    }
}
