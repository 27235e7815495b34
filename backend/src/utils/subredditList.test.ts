import { describe, expect, it } from 'vitest';
import { parseSubredditList } from './subredditList';

describe('parseSubredditList', () => {
  it('reads one name per line', () => {
    expect(parseSubredditList('pics\n  EarthPorn  \r\n\n# disabled\nr/aww\n/r/itookapicture\n')).toEqual([
      'pics',
      'EarthPorn',
      'aww',
      'itookapicture',
    ]);
  });

  it('returns nothing for an empty file', () => {
    expect(parseSubredditList('\n\n')).toEqual([]);
  });
});
