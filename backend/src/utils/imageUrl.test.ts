import { describe, expect, it } from 'vitest';
import { extractImageUrls, isImageUrl, toFullResolutionUrl } from './imageUrl';

describe('isImageUrl', () => {
  it.each([
    'https://example.com/photo.jpg',
    'https://example.com/photo.JPEG',
    'https://example.com/a/b/c.Png',
    'http://example.com/anim.gif',
    'https://example.com/pic.webp',
    'https://example.com/scan.BMP',
  ])('accepts image extension %s', (url) => {
    expect(isImageUrl(url)).toBe(true);
  });

  it.each([
    'https://i.redd.it/abc123',
    'https://preview.redd.it/xyz?width=640&format=pjpg',
    'https://external-preview.redd.it/thing?auto=webp',
    'https://i.imgur.com/AbCdEf',
    'https://imgur.com/abc123.png?1',
  ])('accepts known image host %s', (url) => {
    expect(isImageUrl(url)).toBe(true);
  });

  it.each([
    'https://example.com/page',
    'https://imgur.com/gallery/abc123',
    'https://www.reddit.com/r/pics/comments/p1/title/',
    'https://example.com/photo.jpg.html',
    'https://example.com/photo.svg',
  ])('rejects %s', (url) => {
    expect(isImageUrl(url)).toBe(false);
  });

  it('returns false for empty or missing input', () => {
    expect(isImageUrl('')).toBe(false);
    expect(isImageUrl(null)).toBe(false);
    expect(isImageUrl(undefined)).toBe(false);
  });
});

describe('extractImageUrls', () => {
  it('keeps only image links, in order of appearance', () => {
    const text = 'see https://imgur.com/abc123.png and https://example.com/page';
    expect(extractImageUrls(text)).toEqual(['https://imgur.com/abc123.png']);
  });

  it('preserves duplicates', () => {
    const text = 'https://i.redd.it/a.jpg twice https://i.redd.it/a.jpg';
    expect(extractImageUrls(text)).toEqual(['https://i.redd.it/a.jpg', 'https://i.redd.it/a.jpg']);
  });

  it('stops a URL at markup delimiters but not at a closing parenthesis', () => {
    const text = '[pic](https://example.com/x.png) <https://example.com/y.gif> "https://example.com/z.jpg"';
    // the first match keeps its trailing ")" and so no longer ends in an image extension
    expect(extractImageUrls(text)).toEqual(['https://example.com/y.gif', 'https://example.com/z.jpg']);
  });

  it('only returns substrings of the input', () => {
    const text = 'a https://i.imgur.com/q1 b http://example.com/c.webp\nhttps://nope.example.com';
    const urls = extractImageUrls(text);

    expect(urls).toEqual(['https://i.imgur.com/q1', 'http://example.com/c.webp']);
    for (const url of urls) {
      expect(text).toContain(url);
      expect(isImageUrl(url)).toBe(true);
    }
  });

  it('returns an empty list for empty or missing text', () => {
    expect(extractImageUrls('')).toEqual([]);
    expect(extractImageUrls(null)).toEqual([]);
    expect(extractImageUrls('no links here')).toEqual([]);
  });
});

describe('toFullResolutionUrl', () => {
  it('moves a preview URL to the direct host, keeping path and query', () => {
    expect(toFullResolutionUrl('https://preview.redd.it/xyz.png?width=1080&s=abc')).toBe(
      'https://i.redd.it/xyz.png?width=1080&s=abc'
    );
  });
});
