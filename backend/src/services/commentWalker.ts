import { CommentRecord, ImageRecord, RedditComment } from '../types';
import { extractImageUrls } from '../utils/imageUrl';

export const DELETED_AUTHOR = '[deleted]';
export const SENTIMENT_PLACEHOLDER = 'N/A';
export const IMAGE_URL_DELIMITER = '|';

// The walker does not know which subreddit it runs in; the aggregator stamps it.
export type UnstampedCommentRecord = Omit<CommentRecord, 'subreddit'>;
export type UnstampedImageRecord = Omit<ImageRecord, 'subreddit'>;

export interface WalkResult {
  comments: UnstampedCommentRecord[];
  images: UnstampedImageRecord[];
}

/**
 * Strip the type prefix from a fullname (`t1_abc` -> `abc`).
 * Returns null when there is nothing to strip.
 */
export function toReplyToId(parentId: string | null | undefined): string | null {
  if (!parentId) {
    return null;
  }

  const segment = parentId.split('_')[1];
  return segment ? segment : null;
}

export function packImageUrls(urls: string[]): string | null {
  return urls.length > 0 ? urls.join(IMAGE_URL_DELIMITER) : null;
}

function toCommentRecord(comment: RedditComment, body: string, postId: string, imageUrls: string[]): UnstampedCommentRecord {
  return {
    post_id: postId,
    comment_id: comment.id,
    comment_text: body,
    comment_score: comment.score,
    comment_author: comment.author ?? DELETED_AUTHOR,
    comment_created_utc: comment.created_utc,
    parent_id: comment.parent_id,
    reply_to_id: toReplyToId(comment.parent_id),
    comment_sentiment: SENTIMENT_PLACEHOLDER,
    has_images: imageUrls.length > 0,
    num_images: imageUrls.length,
    image_urls: packImageUrls(imageUrls),
  };
}

/**
 * Visit a comment and every reply below it, depth-first, once per node.
 *
 * Runs off an explicit stack so deep threads do not grow the call stack.
 * A node counts as visited as soon as it is reached; pass the same
 * `visited` set to several walks to keep them from emitting a node twice.
 *
 * Nodes without a body are dropped together with their replies.
 */
export function walkCommentTree(
  root: RedditComment,
  postId: string,
  visited: Set<string> = new Set()
): WalkResult {
  const comments: UnstampedCommentRecord[] = [];
  const images: UnstampedImageRecord[] = [];
  const stack: RedditComment[] = [root];

  while (stack.length > 0) {
    const comment = stack.pop();
    if (comment === undefined || visited.has(comment.id)) continue;
    visited.add(comment.id);

    if (comment.body === null) continue;

    const imageUrls = extractImageUrls(comment.body);
    comments.push(toCommentRecord(comment, comment.body, postId, imageUrls));

    imageUrls.forEach((url, index) => {
      images.push({
        post_id: postId,
        comment_id: comment.id,
        image_index: index,
        image_url: url,
        image_source: 'comment_text',
        image_type: 'embedded_link',
        media_id: null,
      });
    });

    // Reverse so the first reply is popped first
    for (let i = comment.replies.length - 1; i >= 0; i--) {
      stack.push(comment.replies[i]);
    }
  }

  return { comments, images };
}
