export class RedditApiError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'RedditApiError';
  }
}

export class RedditRateLimitError extends RedditApiError {
  constructor(message: string) {
    super(message, 429);
    this.name = 'RedditRateLimitError';
  }
}

export class RedditNotFoundError extends RedditApiError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'RedditNotFoundError';
  }
}

export class RedditAuthError extends RedditApiError {
  constructor(message: string) {
    super(message, 401);
    this.name = 'RedditAuthError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
