/**
 * One subreddit per line; blank lines and `#` comments are ignored and an
 * optional `r/` prefix is dropped.
 */
export function parseSubredditList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
    .map(line => line.replace(/^\/?r\//, ''));
}
