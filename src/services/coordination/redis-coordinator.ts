import { createClient } from 'redis';
import { config } from '../../config';
import { errorDetails, logger } from '../logging';

type RedisClient = ReturnType<typeof createClient>;

/**
 * Shared state across server instances. Without REDIS_URL every check passes locally.
 */
export class RedisCoordinator {
    private client: RedisClient | null = null;
    private connected = false;

    async init(): Promise<void> {
        if (!config.redis.url) {
            logger.warn('Redis disabled (REDIS_URL not set), webhook de-duplication is off');
            return;
        }

        this.client = createClient({ url: config.redis.url });
        this.client.on('error', (error) => logger.error('Redis client error', errorDetails(error)));
        await this.client.connect();
        this.connected = true;
        logger.info('Redis coordinator connected');
    }

    async close(): Promise<void> {
        if (this.client && this.connected) {
            await this.client.quit();
            this.connected = false;
        }
    }

    /**
     * True the first time a webhook key is seen within the idempotency window
     */
    async markWebhookProcessed(key: string): Promise<boolean> {
        if (!this.client || !this.connected) return true;
        const result = await this.client.set(
            `idem:webhook:${key}`,
            '1',
            { NX: true, EX: config.redis.webhookIdempotencyTtlSeconds }
        );
        return result === 'OK';
    }
}

export const redisCoordinator = new RedisCoordinator();
