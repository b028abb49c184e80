/**
 * Generic string helpers shared by the title normalizer and the source extractors.
 */

const URL_PATTERN = /https?:\/\/\S+/giu;
const MENTION_PATTERN = /@[\p{L}\p{N}_]+/gu;
const HASHTAG_PATTERN = /#[\p{L}\p{N}_]+/gu;

/**
 * Remove URLs, @mentions and #hashtags from free text.
 */
export function stripMarkup(text: string): string {
  return text.replace(URL_PATTERN, ' ').replace(MENTION_PATTERN, ' ').replace(HASHTAG_PATTERN, ' ');
}

/**
 * Collapse runs of whitespace into a single space and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/gu, ' ').trim();
}

/**
 * Normalize a headline for matching: lowercase + trim.
 */
export function normalizeHeadline(text: string): string {
  return (text || '').toLowerCase().trim();
}
