import { CommentModel } from '../models/commentModel';
import { ImageModel } from '../models/imageModel';
import { PostModel } from '../models/postModel';
import { SubredditModel } from '../models/subredditModel';
import { CommunityScrapeResult } from '../types';
import { withTransaction } from '../utils/database';
import logger from '../utils/logger';

/**
 * Where scraped records end up.
 */
export interface RecordStore {
  saveCommunity(result: CommunityScrapeResult): Promise<void>;
}

export class PostgresRecordStore implements RecordStore {
  /**
   * Write one subreddit's records in a single transaction. Posts go first
   * and comments before images so every foreign key resolves.
   */
  async saveCommunity(result: CommunityScrapeResult): Promise<void> {
    await withTransaction(async (query) => {
      await SubredditModel.markScraped(result.subreddit, query);

      for (const post of result.posts) {
        await PostModel.upsert(post, query);
        await ImageModel.deleteByPost(post.post_id, query);
      }

      for (const comment of result.comments) {
        await CommentModel.upsert(comment, query);
      }

      for (const image of result.images) {
        await ImageModel.create(image, query);
      }
    });

    logger.info(
      `💾 Stored r/${result.subreddit}: ${result.posts.length} posts, ${result.comments.length} comments, ${result.images.length} images`
    );
  }
}
