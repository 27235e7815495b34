import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { CommentModel } from '../models/commentModel';
import { ImageModel } from '../models/imageModel';
import { PostModel } from '../models/postModel';
import { SubredditModel } from '../models/subredditModel';
import { CommentRecord, ImageRecord, PostRecord, Subreddit, SubredditStats } from '../types';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

// Read side: records that earlier scrapes stored.

export interface PostRepository {
  findRecent(limit: number, subreddit?: string): Promise<PostRecord[]>;
  findById(postId: string): Promise<PostRecord | null>;
  findComments(postId: string): Promise<CommentRecord[]>;
  findImages(postId: string): Promise<ImageRecord[]>;
  findSubreddits(): Promise<Subreddit[]>;
  getStats(): Promise<SubredditStats[]>;
}

export const postgresPostRepository: PostRepository = {
  findRecent: (limit, subreddit) => PostModel.findRecent(limit, subreddit),
  findById: (postId) => PostModel.findById(postId),
  findComments: (postId) => CommentModel.findByPost(postId),
  findImages: (postId) => ImageModel.findByPost(postId),
  findSubreddits: () => SubredditModel.findAll(),
  getStats: () => PostModel.getStats(),
};

const recentQuerySchema = z.object({
  subreddit: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional().default(50),
});

const postParamsSchema = z.object({
  postId: z.string().min(1),
});

export class PostController {
  constructor(private readonly posts: PostRepository) {}

  /**
   * Get recent posts
   */
  async getRecent(request: FastifyRequest, reply: FastifyReply) {
    try {
      const { subreddit, limit } = recentQuerySchema.parse(request.query);
      const posts = await this.posts.findRecent(limit, subreddit);

      return reply.send({
        success: true,
        count: posts.length,
        data: posts,
      });
    } catch (error) {
      return this.handleError(reply, error, 'Get recent posts error');
    }
  }

  async getComments(request: FastifyRequest, reply: FastifyReply) {
    try {
      const { postId } = postParamsSchema.parse(request.params);
      if (!(await this.posts.findById(postId))) {
        return reply.status(404).send({ success: false, error: `Post ${postId} not found` });
      }

      const comments = await this.posts.findComments(postId);
      return reply.send({
        success: true,
        count: comments.length,
        data: comments,
      });
    } catch (error) {
      return this.handleError(reply, error, 'Get comments error');
    }
  }

  async getImages(request: FastifyRequest, reply: FastifyReply) {
    try {
      const { postId } = postParamsSchema.parse(request.params);
      if (!(await this.posts.findById(postId))) {
        return reply.status(404).send({ success: false, error: `Post ${postId} not found` });
      }

      const images = await this.posts.findImages(postId);
      return reply.send({
        success: true,
        count: images.length,
        data: images,
      });
    } catch (error) {
      return this.handleError(reply, error, 'Get images error');
    }
  }

  /**
   * Get all scraped subreddits
   */
  async getSubreddits(request: FastifyRequest, reply: FastifyReply) {
    try {
      const subreddits = await this.posts.findSubreddits();

      return reply.send({
        success: true,
        count: subreddits.length,
        data: subreddits,
      });
    } catch (error) {
      return this.handleError(reply, error, 'Get subreddits error');
    }
  }

  /**
   * Get statistics
   */
  async getStats(request: FastifyRequest, reply: FastifyReply) {
    try {
      const stats = await this.posts.getStats();

      return reply.send({
        success: true,
        data: stats,
      });
    } catch (error) {
      return this.handleError(reply, error, 'Get stats error');
    }
  }

  private handleError(reply: FastifyReply, error: unknown, context: string) {
    if (error instanceof z.ZodError) {
      return reply.status(400).send({
        success: false,
        error: 'Validation error',
        details: error.errors,
      });
    }

    logger.error({ err: error }, context);
    return reply.status(500).send({
      success: false,
      error: errorMessage(error),
    });
  }
}
