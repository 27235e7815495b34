const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp'];

// Reddit-hosted media: direct, preview and external preview subdomains
const REDDIT_IMAGE_PATTERNS = [
  /i\.redd\.it/,
  /preview\.redd\.it/,
  /external-preview\.redd\.it/,
];

const IMGUR_IMAGE_PATTERNS = [
  /i\.imgur\.com/,
  /imgur\.com\/\w+\.(jpg|jpeg|png|gif)/,
];

// Stops at whitespace and the characters that usually close a link in prose or markup
const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/g;

/**
 * Check whether a URL points to an image, judging by its shape only.
 */
export function isImageUrl(url: string | null | undefined): boolean {
  if (!url) {
    return false;
  }

  const lower = url.toLowerCase();
  if (IMAGE_EXTENSIONS.some(ext => lower.endsWith(ext))) {
    return true;
  }

  if (REDDIT_IMAGE_PATTERNS.some(pattern => pattern.test(url))) {
    return true;
  }

  return IMGUR_IMAGE_PATTERNS.some(pattern => pattern.test(url));
}

/**
 * Extract image URLs from free text, in order of appearance.
 * Repeated URLs are kept.
 */
export function extractImageUrls(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }

  const urls = text.match(URL_PATTERN) ?? [];
  return urls.filter(url => isImageUrl(url));
}

/**
 * Swap the preview host for the direct host to get the full resolution image.
 */
export function toFullResolutionUrl(previewUrl: string): string {
  return previewUrl.replaceAll('preview.redd.it', 'i.redd.it');
}
