import axios from 'axios';
import { getConfig, type AppConfig } from '../config.js';
import { logger } from '../logger.js';
import { createSourceRegistry, getSource, type HttpFetcher, type SourceRegistry } from '../sources/index.js';
import type { RawArticleInput, SourceId } from '../types.js';

/**
 * HTTP fetcher for listing pages: bounded timeout, fixed user agent, text body.
 */
export function createHttpFetcher(cfg: AppConfig = getConfig()): HttpFetcher {
  const client = axios.create({
    timeout: cfg.scraper.timeoutMs,
    responseType: 'text',
    headers: {
      'User-Agent': cfg.scraper.userAgent,
      Accept: 'text/html,application/xhtml+xml',
    },
  });

  return async (url: string) => {
    const { data } = await client.get<string>(url);
    return data;
  };
}

export interface CollectOptions {
  /** Used to build the registry when none is given. */
  http?: HttpFetcher;
  registry?: SourceRegistry;
  now?: () => Date;
  maxItems?: number;
}

/**
 * Fetch one source listing and turn it into raw article candidates.
 * Every candidate of the run shares one UTC collection timestamp.
 */
export async function collectArticles(source: SourceId, opts: CollectOptions = {}): Promise<RawArticleInput[]> {
  const cfg = getConfig();
  const registry = opts.registry ?? createSourceRegistry(opts.http ?? createHttpFetcher(cfg));
  const maxItems = opts.maxItems ?? cfg.scraper.maxItems;
  const target = getSource(registry, source);

  logger.info({ source, url: target.url }, 'Fetching source listing');
  const html = await target.fetch();
  const extracted = target.extractArticles(html).slice(0, maxItems);
  const collectedAt = (opts.now ?? (() => new Date()))();

  logger.info({ source, articles: extracted.length }, 'Extracted articles from listing');
  return extracted.map((item) => ({
    title: item.title,
    link: item.link,
    source,
    collectedAt,
  }));
}
