import { SOURCE_CATALOG } from '../constants/sources.js';
import { cleanTitle, loadHtml, resolveLink, uniqueByLink } from './extract.js';
import type { ExtractedArticle, HttpFetcher, NewsSource } from './types.js';

const descriptor = SOURCE_CATALOG.g1;

const FEED_SELECTORS = ['a.feed-post-link', 'div.feed-post-body a', 'div.bastian-page a', 'h2 a'];
const MIN_TITLE_LENGTH = 10;
const MIN_FALLBACK_TITLE_LENGTH = 20;

function isGloboLink(link: string): boolean {
  const host = new URL(link).hostname;
  return host.endsWith('globo.com') || host.endsWith('g1.com');
}

/**
 * Feed posts first; when the feed markup is absent, any globo.com link whose
 * path mentions "noticia" and carries a long enough text.
 */
export function extractG1(html: string): ExtractedArticle[] {
  const $ = loadHtml(html);
  const items: ExtractedArticle[] = [];

  for (const selector of FEED_SELECTORS) {
    $(selector).each((_, el) => {
      const anchor = $(el);
      let title = cleanTitle(anchor.text());
      if (title.length < MIN_TITLE_LENGTH) {
        title = cleanTitle(anchor.find('h2, h3, span, div').first().text());
      }
      const link = resolveLink(anchor.attr('href'), descriptor.url);
      if (link && title.length > MIN_TITLE_LENGTH && isGloboLink(link)) {
        items.push({ title, link });
      }
    });
  }

  if (!items.length) {
    $('a[href]').each((_, el) => {
      const anchor = $(el);
      const title = cleanTitle(anchor.text());
      const link = resolveLink(anchor.attr('href'), descriptor.url);
      if (
        link &&
        title.length > MIN_FALLBACK_TITLE_LENGTH &&
        isGloboLink(link) &&
        link.toLowerCase().includes('noticia')
      ) {
        items.push({ title, link });
      }
    });
  }

  return uniqueByLink(items);
}

export function createG1Source(http: HttpFetcher): NewsSource<'g1'> {
  return {
    ...descriptor,
    id: 'g1',
    fetch: () => http(descriptor.url),
    extractArticles: extractG1,
  };
}
