import axios, { AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { config } from '../config';
import { RedditPost, RedditThread } from '../types';
import { RedditApiError, RedditAuthError, RedditNotFoundError, RedditRateLimitError } from '../utils/errors';
import logger from '../utils/logger';
import { JsonCache, redisCache } from '../utils/redis';
import { listingSchema, parseCommentForest, parseListingPosts, rawPostSchema } from '../utils/redditParser';

const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
const API_BASE_URL = 'https://oauth.reddit.com';
const MAX_PAGE_SIZE = 100;
const LISTING_CACHE_TTL = 600;

const authResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  expires_in: z.number(),
});

const threadResponseSchema = z.tuple([listingSchema, listingSchema]);

const cachedPostsSchema = z.array(rawPostSchema);

export interface RedditServiceOptions {
  clientId?: string;
  clientSecret?: string;
  userAgent?: string;
  rateLimitPerMinute?: number;
  minRequestIntervalMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  http?: AxiosInstance;
  cache?: JsonCache | null;
}

export interface RateLimitStatus {
  requestCount: number;
  limit: number;
  resetsIn: number;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function toRedditError(error: unknown): unknown {
  if (!isAxiosError(error) || !error.response) {
    return error;
  }

  const { status } = error.response;
  if (status === 429) return new RedditRateLimitError('Rate limited by Reddit');
  if (status === 404) return new RedditNotFoundError('Resource not found');
  if (status === 401 || status === 403) return new RedditAuthError(`Reddit API rejected credentials: ${status}`);
  return new RedditApiError(`Reddit API error: ${status}`, status);
}

/**
 * Reddit API client. Authenticates with client credentials and keeps under
 * both the local per-minute budget and the limits Reddit reports in headers.
 */
export class RedditService {
  private client: AxiosInstance;
  private cache: JsonCache | null;
  private accessToken: string | null = null;
  private tokenExpiry: number = 0;
  private requestCount: number = 0;
  private lastResetTime: number = Date.now();
  private lastRequestTime: number = 0;
  private redditRateLimitRemaining: number = 60;
  private redditRateLimitReset: number = 0;
  private readonly clientId?: string;
  private readonly clientSecret?: string;
  private readonly userAgent: string;
  private readonly RATE_LIMIT: number;
  private readonly MIN_REQUEST_INTERVAL: number;
  private readonly MAX_RETRIES: number;
  private readonly RETRY_BASE_DELAY: number;

  constructor(options: RedditServiceOptions = {}) {
    this.clientId = options.clientId ?? config.reddit.clientId;
    this.clientSecret = options.clientSecret ?? config.reddit.clientSecret;
    this.userAgent = options.userAgent ?? config.reddit.userAgent;
    this.RATE_LIMIT = options.rateLimitPerMinute ?? config.reddit.rateLimitPerMinute;
    this.MIN_REQUEST_INTERVAL = options.minRequestIntervalMs ?? config.reddit.minRequestIntervalMs;
    this.MAX_RETRIES = options.maxRetries ?? 3;
    this.RETRY_BASE_DELAY = options.retryBaseDelayMs ?? 5000;
    this.cache = options.cache === undefined ? redisCache : options.cache;

    this.client =
      options.http ??
      axios.create({
        timeout: 10000,
      });
  }

  /**
   * Authenticate with Reddit API
   */
  private async authenticate(): Promise<string> {
    const now = Date.now();

    // Return cached token if still valid
    if (this.accessToken && now < this.tokenExpiry) {
      return this.accessToken;
    }

    if (!this.clientId || !this.clientSecret) {
      throw new RedditAuthError(
        'Reddit API credentials not configured. Please set REDDIT_CLIENT_ID and REDDIT_CLIENT_SECRET in .env'
      );
    }

    try {
      const response = await this.client.post(TOKEN_URL, 'grant_type=client_credentials', {
        auth: {
          username: this.clientId,
          password: this.clientSecret,
        },
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': this.userAgent,
        },
      });

      const auth = authResponseSchema.parse(response.data);
      this.accessToken = auth.access_token;
      this.tokenExpiry = now + auth.expires_in * 1000 - 60000; // 1 min buffer

      logger.info('✅ Reddit API authenticated');
      return auth.access_token;
    } catch (error) {
      logger.error({ err: error }, 'Reddit authentication failed');
      if (error instanceof RedditApiError) throw error;
      throw new RedditAuthError('Failed to authenticate with Reddit API');
    }
  }

  /**
   * Wait for minimum interval between requests
   */
  private async waitForRequestInterval(): Promise<void> {
    const timeSinceLastRequest = Date.now() - this.lastRequestTime;

    if (timeSinceLastRequest < this.MIN_REQUEST_INTERVAL) {
      const waitTime = this.MIN_REQUEST_INTERVAL - timeSinceLastRequest;
      logger.debug(`⏳ Waiting ${waitTime}ms between requests...`);
      await sleep(waitTime);
    }

    this.lastRequestTime = Date.now();
  }

  /**
   * Rate limiting check using Reddit's X-Ratelimit headers and local tracking
   */
  private async checkRateLimit(): Promise<void> {
    const now = Date.now();
    const timeSinceReset = now - this.lastResetTime;

    // Reset counter every minute
    if (timeSinceReset >= 60000) {
      this.requestCount = 0;
      this.lastResetTime = now;
    }

    if (this.redditRateLimitRemaining <= 1 && this.redditRateLimitReset > now) {
      const waitTime = this.redditRateLimitReset - now;
      logger.info(`⏳ Reddit rate limit reached. Waiting ${Math.ceil(waitTime / 1000)}s...`);
      await sleep(waitTime);
      this.redditRateLimitRemaining = 60;
    }

    if (this.requestCount >= this.RATE_LIMIT) {
      const waitTime = Math.max(0, 60000 - timeSinceReset);
      logger.info(`⏳ Local rate limit reached. Waiting ${Math.ceil(waitTime / 1000)}s...`);
      await sleep(waitTime);
      this.requestCount = 0;
      this.lastResetTime = Date.now();
    }

    await this.waitForRequestInterval();

    this.requestCount++;
  }

  /**
   * Update rate limit info from Reddit response headers
   */
  private updateRateLimitFromHeaders(remaining: unknown, reset: unknown): void {
    if (typeof remaining === 'string' || typeof remaining === 'number') {
      this.redditRateLimitRemaining = Number(remaining);
    }
    if (typeof reset === 'string' || typeof reset === 'number') {
      // Reddit reports seconds until the window resets
      this.redditRateLimitReset = Date.now() + Number(reset) * 1000;
    }

    logger.debug(
      { remaining: this.redditRateLimitRemaining, resetsAt: new Date(this.redditRateLimitReset).toISOString() },
      '📊 Reddit rate limit'
    );
  }

  /**
   * Make request with retry on 429 errors (exponential backoff)
   */
  private async makeRequestWithRetry<T>(requestFn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await requestFn();
      } catch (error) {
        const mapped = toRedditError(error);

        if (mapped instanceof RedditRateLimitError && attempt < this.MAX_RETRIES) {
          const waitTime = this.RETRY_BASE_DELAY * Math.pow(2, attempt);
          logger.warn(`⚠️  429 Too Many Requests. Retrying in ${waitTime / 1000}s... (attempt ${attempt + 1}/${this.MAX_RETRIES})`);
          await sleep(waitTime);
          continue;
        }

        throw mapped;
      }
    }
  }

  private async get(path: string, params: Record<string, string | number>): Promise<unknown> {
    const token = await this.authenticate();

    return this.makeRequestWithRetry(async () => {
      await this.checkRateLimit();
      const response = await this.client.get(`${API_BASE_URL}${path}`, {
        headers: {
          Authorization: `Bearer ${token}`,
          'User-Agent': this.userAgent,
        },
        params: { ...params, raw_json: 1 },
      });

      this.updateRateLimitFromHeaders(response.headers['x-ratelimit-remaining'], response.headers['x-ratelimit-reset']);
      return response.data;
    });
  }

  /**
   * Fetch up to `limit` hot posts from a subreddit, following listing pages.
   */
  async fetchHotPosts(subreddit: string, limit: number): Promise<RedditPost[]> {
    const cacheKey = `reddit:hot:${subreddit}:${limit}`;

    if (this.cache) {
      const cached = cachedPostsSchema.safeParse(await this.cache.get(cacheKey));
      if (cached.success) {
        logger.debug(`📦 Cache hit for r/${subreddit}`);
        return cached.data;
      }
    }

    const posts: RedditPost[] = [];
    let after: string | null = null;

    while (posts.length < limit) {
      const pageSize = Math.min(limit - posts.length, MAX_PAGE_SIZE);
      const params: Record<string, string | number> = { limit: pageSize };
      if (after) params.after = after;

      const listing = listingSchema.parse(await this.get(`/r/${subreddit}/hot`, params));
      const page = parseListingPosts(listing);
      posts.push(...page);

      after = listing.data.after ?? null;
      if (!after || page.length === 0) break;
    }

    const result = posts.slice(0, limit);

    if (this.cache) {
      await this.cache.set(cacheKey, result, LISTING_CACHE_TTL);
    }

    logger.info(`✅ Fetched ${result.length} posts from r/${subreddit}`);
    return result;
  }

  /**
   * Fetch a post together with its comment forest.
   */
  async fetchThread(subreddit: string, postId: string): Promise<RedditThread> {
    const response = threadResponseSchema.parse(await this.get(`/r/${subreddit}/comments/${postId}`, {}));
    const [postListing, commentListing] = response;

    const [post] = parseListingPosts(postListing);
    if (!post) {
      throw new RedditNotFoundError(`Post ${postId} not found in r/${subreddit}`);
    }

    const comments = parseCommentForest(commentListing.data.children);
    logger.debug(`✅ Fetched ${comments.length} top-level comments for post ${postId}`);

    return { post, comments };
  }

  /**
   * Get rate limit status
   */
  getRateLimitStatus(): RateLimitStatus {
    const resetsIn = Math.max(0, 60000 - (Date.now() - this.lastResetTime));

    return {
      requestCount: this.requestCount,
      limit: this.RATE_LIMIT,
      resetsIn: Math.ceil(resetsIn / 1000),
    };
  }
}

export default new RedditService();
