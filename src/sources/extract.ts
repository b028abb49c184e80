import * as cheerio from 'cheerio';
import { collapseWhitespace } from '../utils/normalize.js';
import type { ExtractedArticle } from './types.js';

export type CheerioRoot = ReturnType<typeof cheerio.load>;

export function loadHtml(html: string): CheerioRoot {
  return cheerio.load(html);
}

/**
 * Resolve a possibly relative href against the source's base URL.
 * Returns null for hrefs that cannot form an http(s) URL.
 */
export function resolveLink(href: string | undefined, baseUrl: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith('javascript:')) return null;
  let resolved: URL;
  try {
    resolved = new URL(trimmed, baseUrl);
  } catch {
    return null;
  }
  return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.toString() : null;
}

/**
 * Headline text with whitespace folded, as it would be displayed.
 */
export function cleanTitle(text: string): string {
  return collapseWhitespace(text);
}

/**
 * Keep the first occurrence of each link, optionally capping the listing size.
 * Extractors leave the cap to the collector (SCRAPE_MAX_ITEMS).
 */
export function uniqueByLink(items: ExtractedArticle[], max = Number.POSITIVE_INFINITY): ExtractedArticle[] {
  const seen = new Set<string>();
  const out: ExtractedArticle[] = [];
  for (const item of items) {
    if (seen.has(item.link)) continue;
    seen.add(item.link);
    out.push(item);
    if (out.length >= max) break;
  }
  return out;
}
