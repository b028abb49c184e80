import { z } from 'zod';
import { LANGUAGES, SOURCE_IDS } from '../types.js';

const IsoTimestamp = z.string().datetime({ offset: true });

export const WordFrequencySchema = z.object({
  word: z.string().min(1),
  frequency: z.number().int().min(1),
});

export const NewsEntrySchema = z.object({
  title: z.string().min(1),
  processed_title: z.string().nullable(),
  tokens: z.array(z.string()).nullable(),
  link: z.string().min(1),
  source: z.enum(SOURCE_IDS),
  collected_at: IsoTimestamp,
});

export const DocumentMetadataSchema = z.object({
  run_id: z.string(),
  source: z.enum(SOURCE_IDS),
  source_name: z.string(),
  language: z.enum(LANGUAGES),
  run_at: IsoTimestamp,
  total_news: z.number().int().min(0),
  processed_news: z.number().int().min(0),
  skipped_news: z.number().int().min(0),
});

export const AnalysisSectionSchema = z.object({
  total_articles: z.number().int().min(0),
  total_tokens: z.number().int().min(0),
  vocabulary_size: z.number().int().min(0),
  lexical_richness: z.number().min(0),
  average_tokens_per_article: z.number().min(0),
  top_words: z.array(WordFrequencySchema),
});

/**
 * One self-describing document per run.
 */
export const RunDocumentSchema = z.object({
  metadata: DocumentMetadataSchema,
  news: z.array(NewsEntrySchema),
  analysis: AnalysisSectionSchema,
});

export type NewsEntry = z.infer<typeof NewsEntrySchema>;
export type RunDocument = z.infer<typeof RunDocumentSchema>;
