import { query as defaultQuery, QueryFn } from '../utils/database';
import { PostRecord, SubredditStats } from '../types';

const POST_COLUMNS = [
  'post_id',
  'subreddit',
  'post_title',
  'post_score',
  'post_url',
  'post_content_url',
  'post_text',
  'timestamp',
  'post_upvote_ratio',
  'post_ups',
  'post_total_awards_received',
  'post_link_flair_text',
  'post_author',
  'post_num_comments',
  'has_images',
  'num_images',
  'is_gallery',
  'content_type',
] as const;

const placeholders = POST_COLUMNS.map((_, i) => `$${i + 1}`).join(', ');
const updates = POST_COLUMNS.filter(column => column !== 'post_id')
  .map(column => `${column} = EXCLUDED.${column}`)
  .join(',\n        ');

export class PostModel {
  /**
   * Insert a post, or refresh it if it was scraped before
   */
  static async upsert(post: PostRecord, query: QueryFn = defaultQuery): Promise<void> {
    await query(
      `INSERT INTO posts (${POST_COLUMNS.join(', ')})
      VALUES (${placeholders})
      ON CONFLICT (post_id) DO UPDATE SET
        ${updates}`,
      POST_COLUMNS.map(column => post[column])
    );
  }

  /**
   * Get recent posts, optionally for a single subreddit
   */
  static async findRecent(limit: number = 50, subreddit?: string, query: QueryFn = defaultQuery): Promise<PostRecord[]> {
    const result = subreddit
      ? await query<PostRecord>(
          `SELECT * FROM posts
           WHERE subreddit = $1
           ORDER BY timestamp DESC
           LIMIT $2`,
          [subreddit, limit]
        )
      : await query<PostRecord>(
          `SELECT * FROM posts
           ORDER BY timestamp DESC
           LIMIT $1`,
          [limit]
        );

    return result.rows;
  }

  static async findById(postId: string, query: QueryFn = defaultQuery): Promise<PostRecord | null> {
    const result = await query<PostRecord>('SELECT * FROM posts WHERE post_id = $1', [postId]);
    return result.rows.length > 0 ? result.rows[0] : null;
  }

  /**
   * Per-subreddit counts of posts, comments and images
   */
  static async getStats(query: QueryFn = defaultQuery): Promise<SubredditStats[]> {
    const result = await query<SubredditStats>(`
      SELECT
        p.subreddit,
        COUNT(*)::int AS total_posts,
        COUNT(*) FILTER (WHERE p.has_images)::int AS posts_with_images,
        COUNT(*) FILTER (WHERE p.is_gallery)::int AS gallery_posts,
        COALESCE(SUM(c.comment_count), 0)::int AS total_comments,
        COALESCE(SUM(i.image_count), 0)::int AS total_images
      FROM posts p
      LEFT JOIN (
        SELECT post_id, COUNT(*) AS comment_count FROM comments GROUP BY post_id
      ) c ON c.post_id = p.post_id
      LEFT JOIN (
        SELECT post_id, COUNT(*) AS image_count FROM images GROUP BY post_id
      ) i ON i.post_id = p.post_id
      GROUP BY p.subreddit
      ORDER BY total_posts DESC
    `);

    return result.rows;
  }
}
