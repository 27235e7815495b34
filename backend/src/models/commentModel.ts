import { query as defaultQuery, QueryFn } from '../utils/database';
import { CommentRecord } from '../types';

const COMMENT_COLUMNS = [
  'comment_id',
  'post_id',
  'subreddit',
  'comment_text',
  'comment_score',
  'comment_author',
  'comment_created_utc',
  'parent_id',
  'reply_to_id',
  'comment_sentiment',
  'has_images',
  'num_images',
  'image_urls',
] as const;

const placeholders = COMMENT_COLUMNS.map((_, i) => `$${i + 1}`).join(', ');
const updates = COMMENT_COLUMNS.filter(column => column !== 'comment_id')
  .map(column => `${column} = EXCLUDED.${column}`)
  .join(',\n        ');

export class CommentModel {
  static async upsert(comment: CommentRecord, query: QueryFn = defaultQuery): Promise<void> {
    await query(
      `INSERT INTO comments (${COMMENT_COLUMNS.join(', ')})
      VALUES (${placeholders})
      ON CONFLICT (comment_id) DO UPDATE SET
        ${updates}`,
      COMMENT_COLUMNS.map(column => comment[column])
    );
  }

  static async findByPost(postId: string, query: QueryFn = defaultQuery): Promise<CommentRecord[]> {
    const result = await query<CommentRecord>(
      `SELECT * FROM comments
       WHERE post_id = $1
       ORDER BY comment_created_utc ASC`,
      [postId]
    );

    return result.rows;
  }
}
