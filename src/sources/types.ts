import type { SourceDescriptor } from '../constants/sources.js';
import type { SourceId } from '../types.js';

export interface ExtractedArticle {
  title: string;
  link: string;
}

/**
 * Fetches the listing page as text.
 */
export type HttpFetcher = (url: string) => Promise<string>;

/**
 * Capability every source variant exposes; the variant is identified by `id`.
 */
export interface NewsSource<K extends SourceId = SourceId> extends SourceDescriptor {
  id: K;
  fetch(): Promise<string>;
  extractArticles(html: string): ExtractedArticle[];
}

export type SourceRegistry = { readonly [K in SourceId]: NewsSource<K> };
