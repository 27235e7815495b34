import { CommentRecord, ImageDescriptor, ImageRecord, PostRecord, RedditPost, RedditThread, ThreadRecords } from '../types';
import { isImageUrl } from '../utils/imageUrl';
import { DELETED_AUTHOR, walkCommentTree } from './commentWalker';
import { collectPostImages } from './postImageService';

export const DEFAULT_MAX_COMMENTS = 5;

export interface AggregateOptions {
  subreddit: string;
  maxComments?: number;
}

export function buildPostRecord(post: RedditPost, images: ImageDescriptor[], subreddit: string): PostRecord {
  return {
    subreddit,
    post_id: post.id,
    post_title: post.title,
    post_score: post.score,
    post_url: `https://reddit.com${post.permalink}`,
    post_content_url: post.url,
    post_text: post.selftext,
    timestamp: post.created_utc,
    post_upvote_ratio: post.upvote_ratio,
    post_ups: post.ups,
    post_total_awards_received: post.total_awards_received,
    post_link_flair_text: post.link_flair_text,
    post_author: post.author ?? DELETED_AUTHOR,
    post_num_comments: post.num_comments,
    has_images: images.length > 0,
    num_images: images.length,
    is_gallery: post.is_gallery,
    content_type: isImageUrl(post.url) ? 'image' : 'text',
  };
}

function toPostImageRecords(postId: string, images: ImageDescriptor[], subreddit: string): ImageRecord[] {
  return images.map((image, index) => ({
    subreddit,
    post_id: postId,
    comment_id: null,
    image_index: index,
    image_url: image.url,
    image_source: image.source,
    image_type: image.type,
    media_id: image.media_id ?? null,
  }));
}

/**
 * Turn one fetched thread into post, comment and image records.
 *
 * Only the first `maxComments` top-level comments (in the order they were
 * fetched) are walked, each with all of its replies. Top-level nodes
 * without a body do not count towards the cap.
 */
export function aggregateThread(thread: RedditThread, options: AggregateOptions): ThreadRecords {
  const { subreddit, maxComments = DEFAULT_MAX_COMMENTS } = options;
  const { post } = thread;

  const postImages = collectPostImages(post);
  const images: ImageRecord[] = toPostImageRecords(post.id, postImages, subreddit);
  const comments: CommentRecord[] = [];

  const visited = new Set<string>();
  const emitted = new Set<string>();
  let topLevelCount = 0;

  for (const topLevel of thread.comments) {
    if (topLevelCount >= maxComments) break;
    if (topLevel.body === null) continue;

    const walk = walkCommentTree(topLevel, post.id, visited);

    for (const comment of walk.comments) {
      if (emitted.has(comment.comment_id)) continue;
      emitted.add(comment.comment_id);
      comments.push({ ...comment, subreddit });
    }

    for (const image of walk.images) {
      images.push({ ...image, subreddit });
    }

    topLevelCount++;
  }

  return {
    post: buildPostRecord(post, postImages, subreddit),
    comments,
    images,
  };
}
