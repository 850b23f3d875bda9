/**
 * Redis connection for BullMQ
 */
import { Redis } from 'ioredis';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { errorMessage } from '../utils/errors.js';

let redisConnection: Redis | null = null;

export function getRedisConnection(): Redis {
    if (!redisConnection) {
        const connection = new Redis(config.redisUrl, {
            maxRetriesPerRequest: null, // Required for BullMQ
            enableReadyCheck: false,
        });

        connection.on('connect', () => {
            logger.info('Redis connected');
        });

        connection.on('ready', () => {
            logger.info('Redis ready');
        });

        connection.on('error', (error: Error) => {
            logger.error('Redis error', error);
        });

        connection.on('close', () => {
            logger.warn('Redis connection closed');
        });

        connection.on('reconnecting', () => {
            logger.info('Redis reconnecting');
        });

        redisConnection = connection;
    }

    return redisConnection;
}

export async function isRedisConnected(): Promise<boolean> {
    try {
        if (!redisConnection) return false;
        const result = await redisConnection.ping();
        return result === 'PONG';
    } catch (error) {
        logger.warn('Redis ping failed', { error: errorMessage(error) });
        return false;
    }
}

export async function closeRedisConnection(): Promise<void> {
    if (redisConnection) {
        await redisConnection.quit();
        redisConnection = null;
        logger.info('Redis connection closed');
    }
}
