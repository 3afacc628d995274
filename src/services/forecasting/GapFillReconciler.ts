/**
 * Gap-Fill Reconciler
 *
 * Answers "top categories for a period" when recorded history covers only
 * part of it. Missing dates are grouped into contiguous chunks, each chunk is
 * forecast separately, and predicted rows are merged under recorded ones with
 * a provenance tag per date.
 */

import { Logger } from '../../utils/logger';
import { NoContextError, PredictionFailure } from '../../utils/errors';
import { eachDateKey } from '../../utils/dates';
import { chunkDates, chunkMissingDates } from './DateRangeChunker';
import { aggregateRows, rankCategories } from './CategoryRanker';
import type {
    CategoryAnswer,
    DailyForecaster,
    DailySalesRow,
    DataQuality,
    DateKey,
    HistoricalStore,
    Period,
    TaggedSalesRow,
} from './types';

export interface ReconcilerOptions {
    maxChunkDays?: number;
}

export interface ReconciledPeriod {
    period: Period;
    rows: TaggedSalesRow[];
    dataQuality: DataQuality;
}

export class GapFillReconciler {
    constructor(
        private readonly store: HistoricalStore,
        /** Null when no model is loaded; gaps then stay unfilled */
        private readonly forecaster: DailyForecaster | null,
        private readonly options: ReconcilerOptions = {}
    ) {}

    async reconcile(period: Period): Promise<ReconciledPeriod> {
        const recorded = new Map<DateKey, DailySalesRow>();
        for (const row of await this.store.getRange(period.start, period.end)) {
            if (row.date >= period.start && row.date <= period.end) {
                recorded.set(row.date, row);
            }
        }

        const merged = new Map<DateKey, TaggedSalesRow>();
        for (const [date, row] of recorded) {
            merged.set(date, { date, values: row.values, provenance: 'historical' });
        }

        const missing = eachDateKey(period.start, period.end).filter((date) => !recorded.has(date));
        let failedChunks = 0;

        if (missing.length > 0 && this.forecaster) {
            const chunks = chunkMissingDates(missing, { maxChunkDays: this.options.maxChunkDays });
            Logger.debug('[GapFill] Filling missing dates', {
                period,
                missingDates: missing.length,
                chunks: chunks.length,
            });

            for (const chunk of chunks) {
                try {
                    const predicted = await this.forecaster.forecastDaily(chunk.start, chunk.end);
                    const byDate = new Map(predicted.map((row) => [row.date, row]));

                    for (const date of chunkDates(chunk)) {
                        const row = byDate.get(date);
                        // recorded rows always win
                        if (!row || recorded.has(date)) continue;
                        // Categories absent from the prediction count as zero for this date.
                        // TODO: decide whether absent categories should be re-forecast instead of zeroed
                        merged.set(date, { date, values: row.values, provenance: 'predicted' });
                    }
                } catch (error) {
                    if (!(error instanceof PredictionFailure || error instanceof NoContextError)) {
                        throw error;
                    }
                    failedChunks++;
                    Logger.warn('[GapFill] Chunk prediction failed, leaving dates unfilled', {
                        chunk,
                        code: error.code,
                        error: error.message,
                    });
                }
            }
        } else if (missing.length > 0) {
            Logger.debug('[GapFill] No forecaster available, using recorded dates only', {
                period,
                missingDates: missing.length,
            });
        }

        const rows = Array.from(merged.values()).sort((a, b) => (a.date < b.date ? -1 : 1));
        const historicalPoints = rows.filter((row) => row.provenance === 'historical').length;
        const predictedPoints = rows.length - historicalPoints;
        const filled = historicalPoints + predictedPoints;

        return {
            period,
            rows,
            dataQuality: {
                historicalPoints,
                predictedPoints,
                missingPoints: period.days - filled,
                completenessPct: filled === 0 ? 0 : (historicalPoints / filled) * 100,
                failedChunks,
            },
        };
    }

    async topCategories(period: Period, topN: number): Promise<CategoryAnswer> {
        const { rows, dataQuality } = await this.reconcile(period);

        return {
            period,
            source: dataQuality.predictedPoints > 0 ? 'reconciled' : 'historical',
            dataQuality,
            ...rankCategories(aggregateRows(rows), topN),
        };
    }
}
