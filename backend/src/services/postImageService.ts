import { ImageDescriptor, RedditPost } from '../types';
import { extractImageUrls, isImageUrl, toFullResolutionUrl } from '../utils/imageUrl';

type PostImageSource = Pick<RedditPost, 'url' | 'is_gallery' | 'media_metadata' | 'selftext'>;

/**
 * Gather every image a post references: its content URL, its gallery
 * entries, then links in its body text. The order fixes image_index.
 */
export function collectPostImages(post: PostImageSource): ImageDescriptor[] {
  const images: ImageDescriptor[] = [];

  if (isImageUrl(post.url)) {
    images.push({
      source: 'post_url',
      type: 'direct_link',
      url: post.url,
    });
  }

  if (post.is_gallery && post.media_metadata) {
    for (const [mediaId, media] of Object.entries(post.media_metadata)) {
      const previewUrl = media.s?.u;
      if (previewUrl === undefined) continue;

      images.push({
        source: 'gallery',
        type: 'reddit_gallery',
        url: toFullResolutionUrl(previewUrl),
        media_id: mediaId,
      });
    }
  }

  for (const url of extractImageUrls(post.selftext)) {
    images.push({
      source: 'post_text',
      type: 'embedded_link',
      url,
    });
  }

  return images;
}
