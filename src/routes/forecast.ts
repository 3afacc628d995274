/**
 * Forecast Routes - Fastify Plugin
 *
 * Category revenue forecasts, reconciled history, preset ranges and the
 * chart time series. Built through a factory so tests can inject an
 * orchestrator over an in-memory store.
 */

import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { handleRouteError, ValidationError } from '../utils/errors';
import { resolveDateRange, resolveRangePreset } from '../utils/dates';
import { roundTo } from '../utils/format';
import { QUERY_LIMITS } from '../config/limits';
import type { ForecastConfig } from '../config/forecasting';
import type { PredictionOrchestrator } from '../services/forecasting/PredictionOrchestrator';
import type { ForecastTimeSeries } from '../services/forecasting/ForecastTimeSeries';
import type { Period } from '../services/forecasting/types';
import { serializeAnswer, serializeModelInfo, serializeTimeSeries } from './serializers';

const dateParam = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be YYYY-MM-DD').optional();

const booleanParam = z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => value === 'true' || value === '1');

export interface ForecastRouteOptions {
    config: ForecastConfig;
    /** Source of "today" for default and preset ranges */
    now?: () => Date;
}

/**
 * Parses a querystring, turning zod issues into a 400 ValidationError
 * that names the first offending parameter.
 */
function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.infer<S> {
    const result = schema.safeParse(query);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'query';
        throw new ValidationError(`${field}: ${issue?.message ?? 'invalid value'}`, { field });
    }
    return result.data;
}

function assertPeriodLength(period: Period): Period {
    if (period.days > QUERY_LIMITS.MAX_PERIOD_DAYS) {
        throw new ValidationError(`Period may cover at most ${QUERY_LIMITS.MAX_PERIOD_DAYS} days`, {
            field: 'days',
            context: { requested: period.days },
        });
    }
    return period;
}

export function createForecastRoutes(
    orchestrator: PredictionOrchestrator,
    timeSeries: ForecastTimeSeries,
    options: ForecastRouteOptions
): FastifyPluginAsync {
    const { config } = options;
    const now = options.now ?? (() => new Date());

    const rangeQuerySchema = z.object({
        start_date: dateParam,
        end_date: dateParam,
        days: z.coerce.number().int().min(1).max(QUERY_LIMITS.MAX_PERIOD_DAYS).default(config.defaultForecastDays),
        top_n: z.coerce.number().int().min(1).max(QUERY_LIMITS.MAX_TOP_N).default(config.defaultTopCategories),
    });

    const predictQuerySchema = rangeQuerySchema.extend({
        include_historical: booleanParam,
    });

    const presetQuerySchema = z.object({
        range: z.enum(['week', 'month', 'quarter', 'year', 'custom']).default('month'),
        start_date: dateParam,
        end_date: dateParam,
        top_n: z.coerce.number().int().min(1).max(QUERY_LIMITS.MAX_TOP_N).default(config.defaultTopCategories),
    });

    const timeSeriesQuerySchema = rangeQuerySchema.extend({
        historical_days: z.coerce
            .number()
            .int()
            .min(1)
            .max(QUERY_LIMITS.MAX_HISTORICAL_DAYS)
            .default(config.defaultHistoricalDays),
    });

    const resolvePeriod = (query: { start_date?: string; end_date?: string; days: number }): Period =>
        assertPeriodLength(resolveDateRange(
            { startDate: query.start_date, endDate: query.end_date, days: query.days },
            now()
        ));

    return async (fastify) => {
        /**
         * GET /predict-top-categories
         *
         * Forecast top categories for a period, optionally with the preceding
         * period of equal length and the growth between them.
         */
        fastify.get('/predict-top-categories', async (request, reply) => {
            try {
                const query = parseQuery(predictQuerySchema, request.query);
                const period = resolvePeriod(query);

                const answer = await orchestrator.forecast({
                    period,
                    topN: query.top_n,
                    includeHistorical: query.include_historical,
                });
                return serializeAnswer(answer);
            } catch (error) {
                Logger.error('Failed to predict top categories', { error });
                return handleRouteError(error, reply, 'predict-top-categories');
            }
        });

        /** GET /historical-top-categories */
        fastify.get('/historical-top-categories', async (request, reply) => {
            try {
                const query = parseQuery(rangeQuerySchema, request.query);
                const period = resolvePeriod(query);

                const answer = await orchestrator.historicalTopCategories(period, query.top_n);
                return serializeAnswer(answer);
            } catch (error) {
                Logger.error('Failed to fetch historical top categories', { error });
                return handleRouteError(error, reply, 'historical-top-categories');
            }
        });

        /**
         * GET /categories/top
         *
         * Dashboard shortcut: forecast for a forward-looking preset range.
         * `custom` takes explicit start_date and end_date.
         */
        fastify.get('/categories/top', async (request, reply) => {
            try {
                const query = parseQuery(presetQuerySchema, request.query);

                let period: Period;
                if (query.range === 'custom') {
                    if (!query.start_date || !query.end_date) {
                        throw new ValidationError('start_date and end_date are required for a custom range', {
                            field: 'range',
                        });
                    }
                    period = resolvePeriod({ start_date: query.start_date, end_date: query.end_date, days: 1 });
                } else {
                    period = resolveRangePreset(query.range, now());
                }

                const answer = await orchestrator.forecast({ period, topN: query.top_n });
                return {
                    range: query.range,
                    start_date: answer.period.start,
                    end_date: answer.period.end,
                    top_categories: answer.topCategories.map((entry) => ({
                        category: entry.category,
                        revenue: roundTo(entry.amount),
                    })),
                    ...(answer.degraded ? { degraded: answer.degraded } : {}),
                };
            } catch (error) {
                Logger.error('Failed to fetch top categories for range', { error });
                return handleRouteError(error, reply, 'categories-top');
            }
        });

        /** GET /categories/time-series-plot */
        fastify.get('/categories/time-series-plot', async (request, reply) => {
            try {
                const query = parseQuery(timeSeriesQuerySchema, request.query);
                const period = resolvePeriod(query);

                const result = await timeSeries.build({
                    period,
                    topN: query.top_n,
                    historicalDays: query.historical_days,
                });
                return serializeTimeSeries(result);
            } catch (error) {
                Logger.error('Failed to build category time series', { error });
                return handleRouteError(error, reply, 'time-series-plot');
            }
        });

        fastify.get('/model-info', async () => serializeModelInfo(orchestrator.modelInfo()));
    };
}
