import type { SourceId } from '../types.js';
import { createBbcSource } from './bbc.js';
import { createFolhaSource } from './folha.js';
import { createG1Source } from './g1.js';
import { createHackerNewsSource } from './hackernews.js';
import type { HttpFetcher, NewsSource, SourceRegistry } from './types.js';

export type { ExtractedArticle, HttpFetcher, NewsSource, SourceRegistry } from './types.js';

export function createSourceRegistry(http: HttpFetcher): SourceRegistry {
  return {
    hackernews: createHackerNewsSource(http),
    bbc: createBbcSource(http),
    g1: createG1Source(http),
    folha: createFolhaSource(http),
  };
}

export function getSource<K extends SourceId>(registry: SourceRegistry, id: K): NewsSource<K> {
  return registry[id];
}
