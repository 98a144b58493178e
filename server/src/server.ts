import { createApp } from './app.js';
import { getConfig, listMissingIntegrations } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { closeHttpClient } from './lib/http/http-client.js';
import { closeRedisClient, getRedisClient } from './lib/redis/redis-client.js';
import { createGuideDeps } from './services/guide/guide.factory.js';

const config = getConfig();

for (const key of listMissingIntegrations(config)) {
    logger.warn({ event: 'integration_disabled', key }, `${key} is not set. The related feature is disabled.`);
}

const redis = config.redisUrl ? await getRedisClient({ url: config.redisUrl }) : null;

const app = createApp(createGuideDeps(config, redis));
const server = app.listen(config.port, () => {
    logger.info({ event: 'server_started', port: config.port }, `Server listening on http://localhost:${config.port}`);
});

async function releaseResources(): Promise<void> {
    const results = await Promise.allSettled([closeHttpClient(), closeRedisClient()]);
    for (const result of results) {
        if (result.status === 'rejected') {
            logger.warn({
                event: 'shutdown_cleanup_failed',
                error: result.reason instanceof Error ? result.reason.message : String(result.reason),
            }, 'Cleanup step failed');
        }
    }
}

function shutdown(signal: NodeJS.Signals) {
    logger.info({ event: 'shutdown', signal }, `Received ${signal}. Shutting down...`);
    server.close(() => {
        logger.info('Server closed');
        releaseResources().then(
            () => process.exit(0),
            () => process.exit(1)
        );
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
