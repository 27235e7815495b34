#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { config } from './config';
import { PostgresRecordStore } from './services/recordStore';
import redditService from './services/redditService';
import { ScrapeService, summarize } from './services/scrapeService';
import pool from './utils/database';
import logger from './utils/logger';
import redisClient, { connectRedis } from './utils/redis';
import { parseSubredditList } from './utils/subredditList';

async function loadSubreddits(): Promise<string[]> {
  const fromArgs = process.argv.slice(2).filter(arg => !arg.startsWith('--'));
  if (fromArgs.length > 0) {
    return fromArgs;
  }

  return parseSubredditList(await readFile(config.scrape.subredditsFile, 'utf8'));
}

async function run(): Promise<number> {
  const subreddits = await loadSubreddits();
  if (subreddits.length === 0) {
    logger.error(`❌ No subreddits given. Pass names as arguments or list them in ${config.scrape.subredditsFile}`);
    return 1;
  }

  await connectRedis();
  const store = new PostgresRecordStore();
  const scrapeService = new ScrapeService(redditService, store);
  let failures = 0;

  for (const subreddit of subreddits) {
    logger.info(`=== Processing subreddit: r/${subreddit} ===`);

    try {
      const result = await scrapeService.scrapeSubreddit(subreddit);
      await store.saveCommunity(result);

      const summary = summarize(result);
      logger.info(summary, `Summary for r/${subreddit}`);
    } catch (error) {
      failures++;
      logger.error({ err: error }, `❌ ERROR processing r/${subreddit}`);
    }
  }

  logger.info(`=== Scraping complete: ${subreddits.length - failures}/${subreddits.length} subreddits stored ===`);
  return failures === subreddits.length ? 1 : 0;
}

run()
  .then(async (code) => {
    await pool.end();
    if (redisClient.isOpen) await redisClient.quit();
    process.exit(code);
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Scrape run failed');
    process.exit(1);
  });
