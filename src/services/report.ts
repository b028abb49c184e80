import { SOURCE_CATALOG } from '../constants/sources.js';
import type { WordFrequencyEntry } from '../types.js';
import type { RunReport } from './pipeline.js';

export const REPORT_TOP_WORDS = 10;
const BAR_WIDTH = 20;

export function frequencyBar(frequency: number, maxFrequency: number, width = BAR_WIDTH): string {
  const filled = maxFrequency > 0 ? Math.min(width, Math.floor((frequency / maxFrequency) * width)) : 0;
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function formatTopWords(topWords: readonly WordFrequencyEntry[]): string[] {
  const rows = topWords.slice(0, REPORT_TOP_WORDS);
  if (!rows.length) return ['No words to rank.'];

  const maxFrequency = rows[0].frequency;
  const wordWidth = Math.max(...rows.map((entry) => entry.word.length));
  const freqWidth = String(maxFrequency).length;

  return rows.map((entry, index) => {
    const rank = String(index + 1).padStart(2);
    const word = entry.word.padEnd(wordWidth);
    const freq = String(entry.frequency).padStart(freqWidth);
    return `${rank}. ${word}  ${freq}  ${frequencyBar(entry.frequency, maxFrequency)}`;
  });
}

/**
 * Plain-text rendering of a run for the terminal.
 */
export function formatRunReport(report: RunReport): string {
  const { summary } = report;
  const seconds = (report.finishedAt.getTime() - report.startedAt.getTime()) / 1000;

  const outcomes = report.outcomes.map((outcome) =>
    outcome.ok
      ? `  ${outcome.kind}: ok (${outcome.result.records} records) -> ${outcome.result.location}`
      : `  ${outcome.kind}: FAILED ${outcome.error.message}`,
  );

  return [
    `News Lexicon: ${SOURCE_CATALOG[report.source].name} (${report.runId})`,
    `Status: ${report.status}`,
    `Language: ${report.language}`,
    `Articles collected: ${report.collected}`,
    `Articles valid: ${report.valid}`,
    `Articles processed: ${report.processed}`,
    `Skipped: ${report.skipped.length}`,
    `Total words: ${summary.totalTokens}`,
    `Unique words: ${summary.vocabularySize}`,
    `Average words/title: ${summary.averageTokensPerArticle.toFixed(2)}`,
    `Lexical richness: ${summary.lexicalRichness.toFixed(3)}`,
    `Elapsed: ${seconds.toFixed(2)}s`,
    '',
    `Top ${REPORT_TOP_WORDS} words`,
    ...formatTopWords(summary.topWords),
    '',
    'Storage',
    ...(outcomes.length ? outcomes : ['  (no adapters selected)']),
  ].join('\n');
}
