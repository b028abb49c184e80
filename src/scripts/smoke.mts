#!/usr/bin/env node
import { isSourceId } from '../constants/sources.js';
import { describeError } from '../errors.js';
import { collectArticles } from '../services/collector.js';
import { validateArticles } from '../services/records.js';

async function main() {
  const arg = process.argv[2] ?? 'hackernews';
  if (!isSourceId(arg)) {
    console.error('[SMOKE] Unknown source:', arg);
    process.exit(1);
  }

  console.log('[SMOKE] Fetching listing for source:', arg);

  try {
    const candidates = await collectArticles(arg);
    const { articles, rejected } = validateArticles(candidates);
    console.log('[SMOKE] Candidates extracted:', candidates.length);
    console.log('[SMOKE] Valid articles:', articles.length, 'rejected:', rejected.length);
    console.log('[SMOKE] Sample:', articles.slice(0, 3));
    process.exit(articles.length ? 0 : 1);
  } catch (err) {
    console.error('[SMOKE] Error:', describeError(err));
    process.exit(1);
  }
}

main().catch((e) => {
  console.error('[SMOKE] Uncaught error:', describeError(e));
  process.exit(1);
});
