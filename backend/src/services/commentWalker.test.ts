import { describe, expect, it } from 'vitest';
import { makeComment, makeReply } from '../test/factories';
import { packImageUrls, toReplyToId, walkCommentTree } from './commentWalker';

describe('toReplyToId', () => {
  it('strips the type prefix', () => {
    expect(toReplyToId('t1_abc')).toBe('abc');
    expect(toReplyToId('t3_p1')).toBe('p1');
  });

  it('returns null for empty or malformed ids', () => {
    expect(toReplyToId('')).toBeNull();
    expect(toReplyToId(null)).toBeNull();
    expect(toReplyToId('abc')).toBeNull();
    expect(toReplyToId('t1_')).toBeNull();
  });
});

describe('packImageUrls', () => {
  it('joins with a pipe, or returns null for none', () => {
    expect(packImageUrls(['https://i.redd.it/a.jpg', 'https://i.redd.it/b.jpg'])).toBe(
      'https://i.redd.it/a.jpg|https://i.redd.it/b.jpg'
    );
    expect(packImageUrls([])).toBeNull();
  });
});

describe('walkCommentTree', () => {
  it('flattens a thread depth-first in reply order', () => {
    const root = makeComment('a', {
      replies: [
        makeReply('b', 'a', { replies: [makeReply('c', 'b')] }),
        makeReply('d', 'a'),
      ],
    });

    const { comments } = walkCommentTree(root, 'p1');

    expect(comments.map(comment => comment.comment_id)).toEqual(['a', 'b', 'c', 'd']);
    expect(comments.map(comment => comment.reply_to_id)).toEqual(['p1', 'a', 'b', 'a']);
  });

  it('builds the comment record', () => {
    const root = makeComment('a', {
      body: 'see https://imgur.com/abc123.png and https://example.com/page',
      author: null,
      score: 42,
      created_utc: 1700000500,
    });

    const { comments, images } = walkCommentTree(root, 'p1');

    expect(comments).toEqual([
      {
        post_id: 'p1',
        comment_id: 'a',
        comment_text: 'see https://imgur.com/abc123.png and https://example.com/page',
        comment_score: 42,
        comment_author: '[deleted]',
        comment_created_utc: 1700000500,
        parent_id: 't3_p1',
        reply_to_id: 'p1',
        comment_sentiment: 'N/A',
        has_images: true,
        num_images: 1,
        image_urls: 'https://imgur.com/abc123.png',
      },
    ]);
    expect(images).toEqual([
      {
        post_id: 'p1',
        comment_id: 'a',
        image_index: 0,
        image_url: 'https://imgur.com/abc123.png',
        image_source: 'comment_text',
        image_type: 'embedded_link',
        media_id: null,
      },
    ]);
  });

  it('indexes images per comment', () => {
    const root = makeComment('a', {
      body: 'https://i.redd.it/1.jpg https://i.redd.it/2.jpg',
      replies: [makeReply('b', 'a', { body: 'https://i.redd.it/3.jpg' })],
    });

    const { images } = walkCommentTree(root, 'p1');

    expect(images.map(image => [image.comment_id, image.image_index])).toEqual([
      ['a', 0],
      ['a', 1],
      ['b', 0],
    ]);
  });

  it('visits a node referenced twice only once', () => {
    const shared = makeReply('s', 'a', { body: 'https://i.redd.it/s.png' });
    const root = makeComment('a', {
      replies: [shared, makeReply('b', 'a', { replies: [shared] })],
    });

    const { comments, images } = walkCommentTree(root, 'p1');

    expect(comments.map(comment => comment.comment_id)).toEqual(['a', 's', 'b']);
    expect(images).toHaveLength(1);
  });

  it('terminates on a cyclic structure', () => {
    const a = makeComment('a');
    const b = makeReply('b', 'a');
    a.replies.push(b);
    b.replies.push(a);

    expect(walkCommentTree(a, 'p1').comments.map(comment => comment.comment_id)).toEqual(['a', 'b']);
  });

  it('skips nodes already in the shared visited set', () => {
    const visited = new Set(['b']);
    const root = makeComment('a', { replies: [makeReply('b', 'a', { replies: [makeReply('c', 'b')] })] });

    const { comments } = walkCommentTree(root, 'p1', visited);

    expect(comments.map(comment => comment.comment_id)).toEqual(['a']);
    expect([...visited].sort()).toEqual(['a', 'b']);
  });

  // Current behaviour: replies under a bodyless placeholder are dropped with it.
  it('does not descend into a node without a body', () => {
    const root = makeComment('a', {
      replies: [
        makeReply('gone', 'a', { body: null, replies: [makeReply('orphan', 'gone')] }),
        makeReply('b', 'a'),
      ],
    });

    const { comments } = walkCommentTree(root, 'p1');

    expect(comments.map(comment => comment.comment_id)).toEqual(['a', 'b']);
  });

  it('emits nothing for a bodyless root', () => {
    const root = makeComment('a', { body: null, replies: [makeReply('b', 'a')] });
    expect(walkCommentTree(root, 'p1')).toEqual({ comments: [], images: [] });
  });

  it('handles very deep threads without recursion', () => {
    const root = makeComment('c0');
    let current = root;
    for (let i = 1; i < 20000; i++) {
      const next = makeReply(`c${i}`, current.id);
      current.replies.push(next);
      current = next;
    }

    const { comments } = walkCommentTree(root, 'p1');

    expect(comments).toHaveLength(20000);
    expect(comments[19999].comment_id).toBe('c19999');
  });
});
