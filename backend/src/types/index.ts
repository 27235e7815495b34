// Core types for the Reddit media harvester

export type TimeFilter = 'hour' | 'day' | 'week' | 'month' | 'year' | 'all';

/**
 * Gallery entry as found in a submission's media_metadata. Only the
 * largest preview (`s.u`) is read.
 */
export interface GalleryMediaItem {
  status?: string;
  e?: string;
  m?: string;
  s?: {
    u?: string;
    x?: number;
    y?: number;
  };
}

export type GalleryMediaMetadata = Record<string, GalleryMediaItem>;

export interface RedditPost {
  id: string;
  subreddit: string;
  title: string;
  selftext: string;
  author: string | null;
  score: number;
  ups: number;
  upvote_ratio: number;
  total_awards_received: number;
  link_flair_text: string | null;
  num_comments: number;
  created_utc: number;
  url: string;
  permalink: string;
  is_gallery: boolean;
  media_metadata: GalleryMediaMetadata | null;
}

/**
 * A node of a materialized comment forest. `body` is null for nodes that
 * are not real comments (removed placeholders and the like).
 */
export interface RedditComment {
  id: string;
  body: string | null;
  author: string | null;
  score: number;
  created_utc: number;
  parent_id: string;
  replies: RedditComment[];
}

export interface RedditThread {
  post: RedditPost;
  comments: RedditComment[];
}

export type ImageSource = 'post_url' | 'gallery' | 'post_text' | 'comment_text';

export type ImageType = 'direct_link' | 'reddit_gallery' | 'embedded_link';

export interface ImageDescriptor {
  source: ImageSource;
  type: ImageType;
  url: string;
  media_id?: string;
}

export interface PostRecord {
  subreddit: string;
  post_id: string;
  post_title: string;
  post_score: number;
  post_url: string;
  post_content_url: string;
  post_text: string;
  timestamp: number;
  post_upvote_ratio: number;
  post_ups: number;
  post_total_awards_received: number;
  post_link_flair_text: string | null;
  post_author: string;
  post_num_comments: number;
  has_images: boolean;
  num_images: number;
  is_gallery: boolean;
  content_type: 'image' | 'text';
}

export interface CommentRecord {
  subreddit: string;
  post_id: string;
  comment_id: string;
  comment_text: string;
  comment_score: number;
  comment_author: string;
  comment_created_utc: number;
  parent_id: string;
  reply_to_id: string | null;
  comment_sentiment: string;
  has_images: boolean;
  num_images: number;
  image_urls: string | null;
}

export interface ImageRecord {
  subreddit: string;
  post_id: string;
  comment_id: string | null;
  image_index: number;
  image_url: string;
  image_source: ImageSource;
  image_type: ImageType;
  media_id: string | null;
}

export interface ThreadRecords {
  post: PostRecord;
  comments: CommentRecord[];
  images: ImageRecord[];
}

export interface PostError {
  postId: string;
  message: string;
}

export interface CommunityScrapeResult {
  subreddit: string;
  posts: PostRecord[];
  comments: CommentRecord[];
  images: ImageRecord[];
  errors: PostError[];
}

export interface ScrapeOptions {
  postsPerPage: number;
  pages: number;
  maxComments: number;
}

export interface SyncResult {
  success: boolean;
  postsCount: number;
  commentsCount: number;
  imagesCount: number;
  errors: string[];
}

export interface Subreddit {
  id?: number;
  name: string;
  last_scraped_at?: Date | null;
}

export interface SubredditStats {
  subreddit: string;
  total_posts: number;
  posts_with_images: number;
  gallery_posts: number;
  total_comments: number;
  total_images: number;
}
