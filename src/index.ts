import app from './app';
import { logger } from './config/logger';
import { settings } from './config/settings';
import { pool, testConnection } from './config/database';
import { redis, testRedisConnection } from './config/redis';
import { OllamaNarrativeGenerator } from './services/llmService';

const PORT = parseInt(process.env.PORT || '3000');

const start = async (): Promise<void> => {
    const databaseReady = await testConnection();
    if (!databaseReady) {
        logger.error('Database unavailable, refusing to start');
        process.exit(1);
    }

    // the stats cache is optional; requests fall through to the database without it
    await testRedisConnection();

    const modelReachable = await new OllamaNarrativeGenerator().healthCheck();
    if (!modelReachable) {
        logger.warn(`Narrative model not reachable at ${settings.ollamaHost}; generation requests will fail until it is`);
    }

    const server = app.listen(PORT, () => {
        logger.info(`${settings.appName} running on port ${PORT}`, { jurisdiction: settings.jurisdiction });
        logger.info(`Health check: http://localhost:${PORT}/health`);
        logger.info(`API Base URL: http://localhost:${PORT}/api`);
    });

    const shutdown = (signal: string) => {
        logger.info(`${signal} signal received: closing HTTP server`);
        server.close(() => {
            logger.info('HTTP server closed');
            Promise.all([pool.end(), redis.quit()])
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error('Error during shutdown', { error: String(error) });
                    process.exit(1);
                });
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
};

start().catch((error: unknown) => {
    logger.error('Failed to start server', { error: String(error) });
    process.exit(1);
});
