import { query as defaultQuery, QueryFn } from '../utils/database';
import { Subreddit } from '../types';

export class SubredditModel {
  /**
   * Record that a subreddit was scraped, creating it on first sight
   */
  static async markScraped(name: string, query: QueryFn = defaultQuery): Promise<number> {
    const result = await query<{ id: number }>(
      `INSERT INTO subreddits (name, last_scraped_at)
       VALUES ($1, NOW())
       ON CONFLICT (name) DO UPDATE SET last_scraped_at = EXCLUDED.last_scraped_at
       RETURNING id`,
      [name]
    );

    return result.rows[0].id;
  }

  /**
   * Get all subreddits
   */
  static async findAll(query: QueryFn = defaultQuery): Promise<Subreddit[]> {
    const result = await query<Subreddit>(
      'SELECT * FROM subreddits ORDER BY name ASC'
    );

    return result.rows;
  }
}
