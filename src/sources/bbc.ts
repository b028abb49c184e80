import { SOURCE_CATALOG } from '../constants/sources.js';
import { cleanTitle, loadHtml, resolveLink, uniqueByLink } from './extract.js';
import type { ExtractedArticle, HttpFetcher, NewsSource } from './types.js';

const descriptor = SOURCE_CATALOG.bbc;

/**
 * Current layout: headlines are `h2[data-testid]` wrapped by their link.
 * Older layout: `article` cards with an `h3` title.
 */
export function extractBbc(html: string): ExtractedArticle[] {
  const $ = loadHtml(html);
  const items: ExtractedArticle[] = [];

  $('h2[data-testid]').each((_, heading) => {
    const title = cleanTitle($(heading).text());
    const link = resolveLink($(heading).closest('a').attr('href'), descriptor.url);
    if (title && link) items.push({ title, link });
  });

  if (!items.length) {
    $('article').each((_, card) => {
      const heading = $(card).find('h3').first();
      if (!heading.length) return;
      const anchor = heading.closest('a').length ? heading.closest('a') : $(card).find('a').first();
      const title = cleanTitle(heading.text());
      const link = resolveLink(anchor.attr('href'), descriptor.url);
      if (title && link) items.push({ title, link });
    });
  }

  return uniqueByLink(items);
}

export function createBbcSource(http: HttpFetcher): NewsSource<'bbc'> {
  return {
    ...descriptor,
    id: 'bbc',
    fetch: () => http(descriptor.url),
    extractArticles: extractBbc,
  };
}
