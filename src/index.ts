import 'dotenv/config';

import { buildApp } from './app';
import { loadForecastConfig, resolveModelDir } from './config/forecasting';
import { Logger } from './utils/logger';
import { validateEnvironment } from './utils/env';
import { getPool } from './utils/db';
import { initGracefulShutdown } from './utils/shutdown';
import { ConfigurationError } from './utils/errors';
import { loadModelArtifacts, type LoadedModel } from './services/model/ModelArtifacts';
import { PredictionOrchestrator } from './services/forecasting/PredictionOrchestrator';
import { ForecastTimeSeries } from './services/forecasting/ForecastTimeSeries';
import { InMemoryHistoricalStore } from './services/store/InMemoryHistoricalStore';
import { PgHistoricalStore } from './services/store/PgHistoricalStore';
import type { HistoricalStore } from './services/forecasting/types';

async function loadModel(modelDir: string): Promise<{ model: LoadedModel | null; reason?: string }> {
    try {
        return { model: await loadModelArtifacts(modelDir) };
    } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        Logger.warn('[Startup] Model unavailable, serving historical data only', {
            modelDir,
            error: error.message,
            context: error.context,
        });
        return { model: null, reason: error.message };
    }
}

async function start(): Promise<void> {
    const modelDir = resolveModelDir();
    const env = validateEnvironment(modelDir);
    const config = loadForecastConfig();

    const store: HistoricalStore = env.databaseConfigured
        ? new PgHistoricalStore(getPool())
        : new InMemoryHistoricalStore();

    const { model, reason } = await loadModel(modelDir);
    const orchestrator = new PredictionOrchestrator({ store, model, config, unavailableReason: reason });
    const timeSeries = new ForecastTimeSeries(store, orchestrator);

    const app = await buildApp({ orchestrator, timeSeries, config });
    initGracefulShutdown(app);

    const port = parseInt(process.env.PORT || '3000', 10);
    await app.listen({ port, host: '0.0.0.0' });
    Logger.info(`[Startup] Forecast service listening on port ${port}`, {
        modelLoaded: orchestrator.isModelLoaded,
        store: env.databaseConfigured ? 'postgres' : 'memory',
    });
}

start().catch((error: unknown) => {
    Logger.error('[Startup] Failed to start server', {
        error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
});
