import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { config } from './config';
import { PostController, PostRepository } from './controllers/postController';
import { ScrapeController } from './controllers/scrapeController';
import { RateLimitStatus } from './services/redditService';
import { ScrapeService } from './services/scrapeService';
import { errorMessage } from './utils/errors';

export interface AppDependencies {
  scrapeService: ScrapeService;
  posts: PostRepository;
  checkServices: () => Promise<void>;
  rateLimitStatus: () => RateLimitStatus;
  logger?: boolean;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: deps.logger === false ? false : { level: config.logLevel },
  });

  const scrapeController = new ScrapeController(deps.scrapeService);
  const postController = new PostController(deps.posts);

  // CORS
  await fastify.register(cors, {
    origin: config.frontendUrl,
  });

  // Health check
  fastify.get('/api/health', async (request, reply) => {
    try {
      await deps.checkServices();

      return {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        services: {
          database: 'connected',
          redis: 'connected',
          reddit: {
            rateLimit: deps.rateLimitStatus(),
          },
        },
      };
    } catch (error) {
      return reply.status(503).send({
        status: 'unhealthy',
        error: errorMessage(error),
      });
    }
  });

  // Scrape routes
  fastify.post('/api/scrape/subreddit', scrapeController.syncSubreddit.bind(scrapeController));
  fastify.post('/api/scrape/batch', scrapeController.batchSync.bind(scrapeController));

  // Read routes
  fastify.get('/api/subreddits', postController.getSubreddits.bind(postController));
  fastify.get('/api/posts/recent', postController.getRecent.bind(postController));
  fastify.get('/api/posts/:postId/comments', postController.getComments.bind(postController));
  fastify.get('/api/posts/:postId/images', postController.getImages.bind(postController));
  fastify.get('/api/stats', postController.getStats.bind(postController));

  return fastify;
}
