import { query as defaultQuery, QueryFn } from '../utils/database';
import { ImageRecord } from '../types';

export class ImageModel {
  static async create(image: ImageRecord, query: QueryFn = defaultQuery): Promise<void> {
    await query(
      `INSERT INTO images (
        subreddit, post_id, comment_id, image_index,
        image_url, image_source, image_type, media_id
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        image.subreddit,
        image.post_id,
        image.comment_id,
        image.image_index,
        image.image_url,
        image.image_source,
        image.image_type,
        image.media_id,
      ]
    );
  }

  /**
   * Images carry no natural key; a re-scraped post replaces its whole set.
   */
  static async deleteByPost(postId: string, query: QueryFn = defaultQuery): Promise<void> {
    await query('DELETE FROM images WHERE post_id = $1', [postId]);
  }

  static async findByPost(postId: string, query: QueryFn = defaultQuery): Promise<ImageRecord[]> {
    const result = await query<ImageRecord>(
      `SELECT subreddit, post_id, comment_id, image_index,
              image_url, image_source, image_type, media_id
       FROM images
       WHERE post_id = $1
       ORDER BY comment_id NULLS FIRST, image_index`,
      [postId]
    );

    return result.rows;
  }
}
