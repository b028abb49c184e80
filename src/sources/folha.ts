import { SOURCE_CATALOG } from '../constants/sources.js';
import { cleanTitle, loadHtml, resolveLink, uniqueByLink } from './extract.js';
import type { ExtractedArticle, HttpFetcher, NewsSource } from './types.js';

const descriptor = SOURCE_CATALOG.folha;

const HEADLINE_SELECTORS = [
  'h2.c-headline__title a',
  'h3.c-headline__title a',
  'div.c-headline a',
  'article a.c-headline__url',
  'div.u-list-unstyled a',
];
const MIN_TITLE_LENGTH = 10;

export function extractFolha(html: string): ExtractedArticle[] {
  const $ = loadHtml(html);
  const items: ExtractedArticle[] = [];

  for (const selector of HEADLINE_SELECTORS) {
    $(selector).each((_, el) => {
      const anchor = $(el);
      const title = cleanTitle(anchor.text());
      const link = resolveLink(anchor.attr('href'), descriptor.url);
      if (link && title.length > MIN_TITLE_LENGTH) items.push({ title, link });
    });
  }

  return uniqueByLink(items);
}

export function createFolhaSource(http: HttpFetcher): NewsSource<'folha'> {
  return {
    ...descriptor,
    id: 'folha',
    fetch: () => http(descriptor.url),
    extractArticles: extractFolha,
  };
}
