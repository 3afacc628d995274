/**
 * Route Registration Configuration
 *
 * Centralized route registration for the Fastify application.
 */

import { FastifyInstance } from 'fastify';
import type { ForecastConfig } from './forecasting';
import type { PredictionOrchestrator } from '../services/forecasting/PredictionOrchestrator';
import type { ForecastTimeSeries } from '../services/forecasting/ForecastTimeSeries';
import { createForecastRoutes } from '../routes/forecast';
import { createHealthRoutes } from '../routes/health';

export const API_PREFIX = '/api/v1';

export interface RouteDeps {
    orchestrator: PredictionOrchestrator;
    timeSeries: ForecastTimeSeries;
    config: ForecastConfig;
    now?: () => Date;
}

/**
 * Registers all API routes with Fastify
 */
export async function registerRoutes(fastify: FastifyInstance, deps: RouteDeps): Promise<void> {
    await fastify.register(
        createHealthRoutes({ isModelLoaded: () => deps.orchestrator.isModelLoaded }),
        { prefix: '/health' }
    );

    await fastify.register(
        createForecastRoutes(deps.orchestrator, deps.timeSeries, { config: deps.config, now: deps.now }),
        { prefix: API_PREFIX }
    );
}
