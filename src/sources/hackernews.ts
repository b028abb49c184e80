import { SOURCE_CATALOG } from '../constants/sources.js';
import { cleanTitle, loadHtml, resolveLink, uniqueByLink } from './extract.js';
import type { ExtractedArticle, HttpFetcher, NewsSource } from './types.js';

const descriptor = SOURCE_CATALOG.hackernews;

/**
 * Story rows are `tr.athing`; the headline link sits in `span.titleline`.
 * Self posts link to `item?id=…`, resolved against the site root.
 */
export function extractHackerNews(html: string): ExtractedArticle[] {
  const $ = loadHtml(html);
  const items: ExtractedArticle[] = [];

  $('tr.athing').each((_, row) => {
    const anchor = $(row).find('span.titleline > a').first();
    const title = cleanTitle(anchor.text());
    const link = resolveLink(anchor.attr('href'), descriptor.url);
    if (title && link) items.push({ title, link });
  });

  return uniqueByLink(items);
}

export function createHackerNewsSource(http: HttpFetcher): NewsSource<'hackernews'> {
  return {
    ...descriptor,
    id: 'hackernews',
    fetch: () => http(descriptor.url),
    extractArticles: extractHackerNews,
  };
}
