import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ScrapeService } from '../services/scrapeService';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

// Route handlers only validate input and shape the response; the scrape service does the work.

const subredditName = z.string().min(1).regex(/^\w+$/, 'Invalid subreddit name');

const scrapeOptionsSchema = z.object({
  postsPerPage: z.number().int().min(1).max(100).optional(),
  pages: z.number().int().min(1).max(10).optional(),
  maxComments: z.number().int().min(0).max(100).optional(),
});

export const syncSubredditSchema = scrapeOptionsSchema.extend({
  subreddit: subredditName,
});

export const batchSyncSchema = scrapeOptionsSchema.extend({
  subreddits: z.array(subredditName).min(1).max(10),
});

export class ScrapeController {
  constructor(private readonly scrapeService: ScrapeService) {}

  /**
   * Scrape one subreddit and store its records
   */
  async syncSubreddit(request: FastifyRequest, reply: FastifyReply) {
    try {
      const { subreddit, ...options } = syncSubredditSchema.parse(request.body);

      const result = await this.scrapeService.syncSubreddit(subreddit, options);

      return reply.status(result.success ? 200 : 502).send({
        success: result.success,
        message: `Synced ${result.postsCount} posts, ${result.commentsCount} comments and ${result.imagesCount} images from r/${subreddit}`,
        data: result,
      });
    } catch (error) {
      return this.handleError(reply, error, 'Sync subreddit error');
    }
  }

  /**
   * Batch sync multiple subreddits
   */
  async batchSync(request: FastifyRequest, reply: FastifyReply) {
    try {
      const { subreddits, ...options } = batchSyncSchema.parse(request.body);

      const results = await this.scrapeService.syncMultipleSubreddits(subreddits, options);

      const summary = {
        total: subreddits.length,
        successful: 0,
        totalPosts: 0,
        totalComments: 0,
        totalImages: 0,
      };

      results.forEach(result => {
        if (result.success) summary.successful++;
        summary.totalPosts += result.postsCount;
        summary.totalComments += result.commentsCount;
        summary.totalImages += result.imagesCount;
      });

      return reply.send({
        success: true,
        message: `Batch sync completed: ${summary.successful}/${summary.total} subreddits, ${summary.totalPosts} posts`,
        summary,
        details: Object.fromEntries(results),
      });
    } catch (error) {
      return this.handleError(reply, error, 'Batch sync error');
    }
  }

  private handleError(reply: FastifyReply, error: unknown, context: string) {
    if (error instanceof z.ZodError) {
      return reply.status(400).send({
        success: false,
        error: 'Validation error',
        details: error.errors,
      });
    }

    logger.error({ err: error }, context);
    return reply.status(500).send({
      success: false,
      error: errorMessage(error),
    });
  }
}
