import { config } from '../config';
import {
  CommunityScrapeResult,
  RedditPost,
  RedditThread,
  ScrapeOptions,
  SyncResult,
} from '../types';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import { aggregateThread } from './aggregatorService';
import { RecordStore } from './recordStore';

/**
 * The part of the Reddit client the scraper needs.
 */
export interface ForumClient {
  fetchHotPosts(subreddit: string, limit: number): Promise<RedditPost[]>;
  fetchThread(subreddit: string, postId: string): Promise<RedditThread>;
}

export interface ScrapeSummary {
  subreddit: string;
  posts: number;
  comments: number;
  images: number;
  postsWithImages: number;
  failedPosts: number;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function summarize(result: CommunityScrapeResult): ScrapeSummary {
  return {
    subreddit: result.subreddit,
    posts: result.posts.length,
    comments: result.comments.length,
    images: result.images.length,
    postsWithImages: result.posts.filter(post => post.has_images).length,
    failedPosts: result.errors.length,
  };
}

export class ScrapeService {
  private readonly defaults: ScrapeOptions;
  private readonly batchDelayMs: number;

  constructor(
    private readonly client: ForumClient,
    private readonly store: RecordStore,
    options: Partial<ScrapeOptions> & { batchDelayMs?: number } = {}
  ) {
    this.defaults = {
      postsPerPage: options.postsPerPage ?? config.scrape.postsPerPage,
      pages: options.pages ?? config.scrape.pages,
      maxComments: options.maxComments ?? config.scrape.maxComments,
    };
    this.batchDelayMs = options.batchDelayMs ?? 1000;
  }

  /**
   * Collect posts, comments and images from a subreddit's hot listing.
   * A post whose thread cannot be fetched is reported in `errors` and the
   * rest of the listing is still processed.
   */
  async scrapeSubreddit(subreddit: string, options: Partial<ScrapeOptions> = {}): Promise<CommunityScrapeResult> {
    const { postsPerPage, pages, maxComments } = { ...this.defaults, ...options };
    const result: CommunityScrapeResult = {
      subreddit,
      posts: [],
      comments: [],
      images: [],
      errors: [],
    };

    logger.info(`🔄 Scraping subreddit: r/${subreddit}`);
    const posts = await this.client.fetchHotPosts(subreddit, postsPerPage * pages);

    for (const [index, post] of posts.entries()) {
      logger.debug(`  Processing post ${index + 1}: ${post.title.slice(0, 50)}...`);

      try {
        const thread = await this.client.fetchThread(subreddit, post.id);
        const records = aggregateThread(thread, { subreddit, maxComments });

        result.posts.push(records.post);
        result.comments.push(...records.comments);
        result.images.push(...records.images);
      } catch (error) {
        const message = errorMessage(error);
        result.errors.push({ postId: post.id, message });
        logger.error({ err: error, postId: post.id }, `❌ Error processing post ${post.id}`);
      }
    }

    const summary = summarize(result);
    logger.info(
      summary,
      `✅ r/${subreddit}: ${summary.posts} posts, ${summary.comments} comments, ${summary.images} images`
    );

    return result;
  }

  /**
   * Scrape a subreddit and persist its records
   */
  async syncSubreddit(subreddit: string, options: Partial<ScrapeOptions> = {}): Promise<SyncResult> {
    try {
      const result = await this.scrapeSubreddit(subreddit, options);
      await this.store.saveCommunity(result);

      return {
        success: true,
        postsCount: result.posts.length,
        commentsCount: result.comments.length,
        imagesCount: result.images.length,
        errors: result.errors.map(error => `Failed to process post ${error.postId}: ${error.message}`),
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ err: error }, `❌ Scrape failed for r/${subreddit}`);

      return {
        success: false,
        postsCount: 0,
        commentsCount: 0,
        imagesCount: 0,
        errors: [message],
      };
    }
  }

  /**
   * Batch sync multiple subreddits, one after another
   */
  async syncMultipleSubreddits(
    subreddits: string[],
    options: Partial<ScrapeOptions> = {}
  ): Promise<Map<string, SyncResult>> {
    logger.info(`🔄 Batch syncing ${subreddits.length} subreddits...`);

    const results = new Map<string, SyncResult>();

    for (const [index, subreddit] of subreddits.entries()) {
      results.set(subreddit, await this.syncSubreddit(subreddit, options));

      // Small delay to avoid rate limiting
      if (index < subreddits.length - 1 && this.batchDelayMs > 0) {
        await sleep(this.batchDelayMs);
      }
    }

    return results;
  }
}
