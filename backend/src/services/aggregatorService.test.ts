import { describe, expect, it } from 'vitest';
import { makeComment, makePost, makeReply } from '../test/factories';
import { RedditThread, ThreadRecords } from '../types';
import { aggregateThread, buildPostRecord } from './aggregatorService';

function checkReferentialIntegrity(records: ThreadRecords) {
  const commentIds = new Set(records.comments.map(comment => comment.comment_id));

  for (const image of records.images) {
    expect(image.post_id).toBe(records.post.post_id);
    if (image.image_source === 'comment_text') {
      expect(image.comment_id).not.toBeNull();
      expect(commentIds.has(image.comment_id ?? '')).toBe(true);
    } else {
      expect(image.comment_id).toBeNull();
    }
  }
}

describe('buildPostRecord', () => {
  it('maps post fields and derived flags', () => {
    const post = makePost({
      id: 'p9',
      title: 'Sunset',
      permalink: '/r/pics/comments/p9/sunset/',
      url: 'https://i.redd.it/sunset.jpg',
      author: null,
      link_flair_text: 'OC',
      score: 120,
      ups: 125,
      upvote_ratio: 0.97,
      num_comments: 14,
      total_awards_received: 2,
    });

    const record = buildPostRecord(
      post,
      [{ source: 'post_url', type: 'direct_link', url: 'https://i.redd.it/sunset.jpg' }],
      'pics'
    );

    expect(record).toEqual({
      subreddit: 'pics',
      post_id: 'p9',
      post_title: 'Sunset',
      post_score: 120,
      post_url: 'https://reddit.com/r/pics/comments/p9/sunset/',
      post_content_url: 'https://i.redd.it/sunset.jpg',
      post_text: '',
      timestamp: 1700000000,
      post_upvote_ratio: 0.97,
      post_ups: 125,
      post_total_awards_received: 2,
      post_link_flair_text: 'OC',
      post_author: '[deleted]',
      post_num_comments: 14,
      has_images: true,
      num_images: 1,
      is_gallery: false,
      content_type: 'image',
    });
  });

  it('marks a post without an image content URL as text', () => {
    const record = buildPostRecord(makePost(), [], 'pics');

    expect(record.content_type).toBe('text');
    expect(record.has_images).toBe(false);
    expect(record.num_images).toBe(0);
  });
});

describe('aggregateThread', () => {
  it('yields exactly one post_url image for a direct image post', () => {
    const thread: RedditThread = { post: makePost({ url: 'https://i.redd.it/abc.jpg' }), comments: [] };

    const { images } = aggregateThread(thread, { subreddit: 'pics' });

    expect(images).toEqual([
      {
        subreddit: 'pics',
        post_id: 'p1',
        comment_id: null,
        image_index: 0,
        image_url: 'https://i.redd.it/abc.jpg',
        image_source: 'post_url',
        image_type: 'direct_link',
        media_id: null,
      },
    ]);
  });

  it('carries the media id of gallery images', () => {
    const thread: RedditThread = {
      post: makePost({
        is_gallery: true,
        media_metadata: { xyz: { s: { u: 'https://preview.redd.it/xyz.png?width=640&s=sig' } } },
      }),
      comments: [],
    };

    const { post, images } = aggregateThread(thread, { subreddit: 'pics' });

    expect(post.is_gallery).toBe(true);
    expect(post.num_images).toBe(1);
    expect(images).toHaveLength(1);
    expect(images[0]).toMatchObject({
      image_source: 'gallery',
      image_type: 'reddit_gallery',
      image_url: 'https://i.redd.it/xyz.png?width=640&s=sig',
      media_id: 'xyz',
    });
  });

  it('walks only the first maxComments top-level comments', () => {
    const comments = ['t1', 't2', 't3', 't4', 't5', 't6'].map(id =>
      makeComment(id, { replies: [makeReply(`${id}r`, id)] })
    );

    const records = aggregateThread({ post: makePost(), comments }, { subreddit: 'pics', maxComments: 5 });

    expect(records.comments.map(comment => comment.comment_id)).toEqual([
      't1', 't1r', 't2', 't2r', 't3', 't3r', 't4', 't4r', 't5', 't5r',
    ]);
  });

  it('defaults to five top-level comments', () => {
    const comments = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map(id => makeComment(id));

    const records = aggregateThread({ post: makePost(), comments }, { subreddit: 'pics' });

    expect(records.comments).toHaveLength(5);
  });

  it('does not count bodyless top-level nodes towards the cap', () => {
    const comments = [
      makeComment('gone', { body: null }),
      makeComment('a'),
      makeComment('b'),
    ];

    const records = aggregateThread({ post: makePost(), comments }, { subreddit: 'pics', maxComments: 2 });

    expect(records.comments.map(comment => comment.comment_id)).toEqual(['a', 'b']);
  });

  it('never emits a comment twice across top-level walks', () => {
    const shared = makeReply('shared', 'a', { body: 'https://i.imgur.com/s1' });
    const comments = [
      makeComment('a', { replies: [shared] }),
      makeComment('b', { replies: [shared] }),
      shared,
    ];

    const records = aggregateThread({ post: makePost(), comments }, { subreddit: 'pics', maxComments: 5 });

    expect(records.comments.map(comment => comment.comment_id)).toEqual(['a', 'shared', 'b']);
    expect(records.images.filter(image => image.comment_id === 'shared')).toHaveLength(1);
  });

  it('gives the same result when run twice over the same forest', () => {
    const thread: RedditThread = {
      post: makePost(),
      comments: [
        makeComment('a', { replies: [makeReply('b', 'a'), makeReply('c', 'a')] }),
        makeComment('d'),
      ],
    };

    const first = aggregateThread(thread, { subreddit: 'pics' });
    const second = aggregateThread(thread, { subreddit: 'pics' });

    expect(second.comments).toHaveLength(first.comments.length);
    expect(second).toEqual(first);
  });

  it('stamps the subreddit on every record and keeps foreign keys consistent', () => {
    const thread: RedditThread = {
      post: makePost({
        url: 'https://i.redd.it/cover.jpg',
        selftext: 'also https://i.imgur.com/body1',
      }),
      comments: [
        makeComment('a', {
          body: 'https://i.redd.it/a1.png and https://i.redd.it/a2.png',
          replies: [makeReply('b', 'a', { body: 'reply with https://imgur.com/xyz.gif' })],
        }),
        makeComment('c', { body: 'no pictures' }),
      ],
    };

    const records = aggregateThread(thread, { subreddit: 'EarthPorn' });

    expect(records.post.subreddit).toBe('EarthPorn');
    expect(records.comments.every(comment => comment.subreddit === 'EarthPorn')).toBe(true);
    expect(records.images.every(image => image.subreddit === 'EarthPorn')).toBe(true);
    expect(records.images.map(image => [image.image_source, image.comment_id, image.image_index])).toEqual([
      ['post_url', null, 0],
      ['post_text', null, 1],
      ['comment_text', 'a', 0],
      ['comment_text', 'a', 1],
      ['comment_text', 'b', 0],
    ]);
    expect(records.post.num_images).toBe(2);
    checkReferentialIntegrity(records);
  });
});
