import { z } from 'zod';
import { RedditComment, RedditPost } from '../types';

const DELETED = '[deleted]';

const galleryItemSchema = z
  .object({
    status: z.string().optional(),
    e: z.string().optional(),
    m: z.string().optional(),
    s: z
      .object({
        u: z.string().optional(),
        x: z.number().optional(),
        y: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const authorSchema = z
  .string()
  .nullish()
  .transform(author => (!author || author === DELETED ? null : author));

export const rawPostSchema = z.object({
  id: z.string(),
  subreddit: z.string().default(''),
  title: z.string().default(''),
  selftext: z.string().nullish().transform(text => text ?? ''),
  author: authorSchema,
  score: z.number().default(0),
  ups: z.number().default(0),
  upvote_ratio: z.number().default(0),
  total_awards_received: z.number().default(0),
  link_flair_text: z.string().nullish().transform(flair => flair ?? null),
  num_comments: z.number().default(0),
  created_utc: z.number().default(0),
  url: z.string().default(''),
  permalink: z.string().default(''),
  is_gallery: z.boolean().nullish().transform(flag => flag === true),
  media_metadata: z.record(galleryItemSchema).nullish().transform(metadata => metadata ?? null),
});

const rawCommentSchema = z.object({
  id: z.string(),
  body: z.unknown().optional(),
  author: authorSchema,
  score: z.number().default(0),
  created_utc: z.number().default(0),
  parent_id: z.string().default(''),
  replies: z.unknown().optional(),
});

const thingSchema = z.object({
  kind: z.string(),
  data: z.unknown(),
});

export const listingSchema = z.object({
  kind: z.string().optional(),
  data: z.object({
    children: z.array(thingSchema),
    after: z.string().nullish(),
  }),
});

export type RawListing = z.infer<typeof listingSchema>;
export type RawThing = z.infer<typeof thingSchema>;

export function parseSubmission(raw: unknown): RedditPost {
  return rawPostSchema.parse(raw);
}

/**
 * Posts of a listing page; anything that is not a link (`t3`) is ignored.
 */
export function parseListingPosts(listing: RawListing): RedditPost[] {
  return listing.data.children
    .filter(child => child.kind === 't3')
    .map(child => parseSubmission(child.data));
}

/**
 * Build the comment forest from the children of a comments listing.
 * "Load more" stubs (`more`) are dropped rather than expanded, and a
 * comment whose body is missing is kept with `body: null`.
 */
export function parseCommentForest(children: RawThing[]): RedditComment[] {
  const comments: RedditComment[] = [];

  for (const child of children) {
    if (child.kind !== 't1') continue;

    const data = rawCommentSchema.parse(child.data);
    const replies = listingSchema.safeParse(data.replies);

    comments.push({
      id: data.id,
      body: typeof data.body === 'string' ? data.body : null,
      author: data.author,
      score: data.score,
      created_utc: data.created_utc,
      parent_id: data.parent_id,
      replies: replies.success ? parseCommentForest(replies.data.data.children) : [],
    });
  }

  return comments;
}
