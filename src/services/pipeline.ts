/**
 * Run pipeline
 *
 * One invocation handles one source:
 * 1. Collect raw candidates from the source listing
 * 2. Validate them into immutable RawArticles (malformed ones are skipped)
 * 3. Normalize titles per article (unsupported languages are skipped)
 * 4. Analyze word frequencies over the complete batch
 * 5. Persist through every selected adapter concurrently
 */

import { randomUUID } from 'node:crypto';
import { getConfig, resolveStorage } from '../config.js';
import { SOURCE_LANGUAGE, isLanguage } from '../constants/sources.js';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import { createAdapters, persistAll, type AdapterOutcome, type StorageAdapter } from '../storage/index.js';
import type {
  AnalysisSummary,
  PersistBatch,
  RawArticleInput,
  RunStatus,
  SkipRecord,
  SourceId,
  StorageKind,
} from '../types.js';
import { formatRunStamp } from '../utils/date.js';
import { collectArticles } from './collector.js';
import { analyze } from './frequency.js';
import { defaultNormalizeOptions, normalizeBatch, type NormalizeOptions } from './normalizer.js';
import { validateArticles } from './records.js';

export interface PipelineOptions {
  source: SourceId;
  /** Storage kinds to build adapters for; ignored when `adapters` is given. */
  storage?: readonly StorageKind[];
  adapters?: readonly StorageAdapter[];
  collect?: (source: SourceId) => Promise<RawArticleInput[]>;
  /** Per-source language overrides on top of the static mapping. */
  languages?: Partial<Record<SourceId, string>>;
  normalize?: NormalizeOptions;
  topN?: number;
  now?: () => Date;
}

export interface RunReport {
  runId: string;
  source: SourceId;
  language: string;
  startedAt: Date;
  finishedAt: Date;
  collected: number;
  valid: number;
  processed: number;
  skipped: SkipRecord[];
  summary: AnalysisSummary;
  outcomes: AdapterOutcome[];
  status: RunStatus;
}

export function deriveStatus(outcomes: readonly AdapterOutcome[]): RunStatus {
  const failures = outcomes.filter((outcome) => !outcome.ok).length;
  if (failures === 0) return 'succeeded';
  return failures === outcomes.length ? 'failed' : 'partial';
}

export function createRunId(source: SourceId, runAt: Date): string {
  return `${source}_${formatRunStamp(runAt)}_${randomUUID().slice(0, 8)}`;
}

export async function runPipeline(options: PipelineOptions): Promise<RunReport> {
  const cfg = getConfig();
  const now = options.now ?? (() => new Date());
  const { source } = options;

  const startedAt = now();
  const runId = createRunId(source, startedAt);
  const languageFor = (id: SourceId): string => options.languages?.[id] ?? SOURCE_LANGUAGE[id];
  const language = languageFor(source);
  const skipped: SkipRecord[] = [];
  // STORAGE is only consulted when the caller selects nothing
  const adapters = options.adapters ?? createAdapters(options.storage ?? resolveStorage(cfg), cfg);

  logger.info({ runId, source, language }, 'Starting pipeline');

  // Step 1: collect
  let inputs: RawArticleInput[] = [];
  try {
    inputs = await (options.collect ?? ((id: SourceId) => collectArticles(id, { now })))(source);
  } catch (err) {
    logger.error({ err, source }, 'Collection failed, continuing with an empty batch');
    skipped.push({ stage: 'collect', reason: describeError(err) });
  }

  // Step 2: validate
  const { articles: raw, rejected } = validateArticles(inputs);
  skipped.push(...rejected);

  // Step 3: normalize
  const normalized = normalizeBatch(raw, languageFor, options.normalize ?? defaultNormalizeOptions(cfg));
  skipped.push(...normalized.skipped);

  // Step 4: analyze (needs the complete batch)
  const summary = analyze(normalized.processed, { topN: options.topN ?? cfg.analysis.topWords });
  logger.info(
    {
      runId,
      articles: summary.totalArticles,
      vocabulary: summary.vocabularySize,
      lexicalRichness: summary.lexicalRichness,
    },
    'Analysis complete',
  );

  // Step 5: persist
  const batch: PersistBatch = {
    runId,
    source,
    language: isLanguage(language) ? language : SOURCE_LANGUAGE[source],
    runAt: startedAt,
    raw,
    processed: normalized.processed,
    summary,
  };
  const outcomes = await persistAll(adapters, batch);
  const status = deriveStatus(outcomes);

  const report: RunReport = {
    runId,
    source,
    language,
    startedAt,
    finishedAt: now(),
    collected: inputs.length,
    valid: raw.length,
    processed: normalized.processed.length,
    skipped,
    summary,
    outcomes,
    status,
  };

  logger.info(
    {
      runId,
      status,
      collected: report.collected,
      processed: report.processed,
      skipped: skipped.length,
      failedAdapters: outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.kind),
    },
    'Pipeline complete',
  );

  return report;
}
