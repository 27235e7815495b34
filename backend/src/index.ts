import { buildApp } from './app';
import { config } from './config';
import { postgresPostRepository } from './controllers/postController';
import { PostgresRecordStore } from './services/recordStore';
import redditService from './services/redditService';
import { ScrapeService } from './services/scrapeService';
import pool from './utils/database';
import logger from './utils/logger';
import { connectRedis } from './utils/redis';

const scrapeService = new ScrapeService(redditService, new PostgresRecordStore());

const start = async () => {
  try {
    await connectRedis();

    // Test database connection
    await pool.query('SELECT NOW()');
    logger.info('✅ PostgreSQL connected');

    const fastify = await buildApp({
      scrapeService,
      posts: postgresPostRepository,
      checkServices: async () => {
        await pool.query('SELECT 1');
        const redis = await connectRedis();
        await redis.ping();
      },
      rateLimitStatus: () => redditService.getRateLimitStatus(),
    });

    await fastify.listen({ port: config.port, host: '0.0.0.0' });

    logger.info(`🚀 Reddit Media Harvester API running on http://localhost:${config.port}`);
    logger.info(`📊 Health check: http://localhost:${config.port}/api/health`);
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
};

void start();
