/**
 * Digest Assembler
 *
 * Renders matched records as the plain-text e-mail body.
 */

import type { ArticleRecord } from '../types/index.js';

export interface RenderOptions {
  now: Date;
  /** IANA zone used for the header timestamp */
  timeZone: string;
}

export const RULE_WIDTH = 60;

// ═══════════════════════════════════════════════════════════════════════════════
// Ordering
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Newest first by plain string comparison of `publishedAt`. Timestamps in
 * different formats do not order correctly against each other; records
 * without a timestamp end up last. Stable for equal keys.
 */
export function sortByPublishedDesc(records: readonly ArticleRecord[]): ArticleRecord[] {
  return [...records].sort((a, b) =>
    a.publishedAt < b.publishedAt ? 1 : a.publishedAt > b.publishedAt ? -1 : 0
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rendering
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * `YYYY-MM-DD HH:mm:ss` in the given zone
 */
export function formatTimestamp(date: Date, timeZone: string): string {
  return new Intl.DateTimeFormat('sv-SE', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).format(date);
}

function renderRecord(record: ArticleRecord, index: number): string[] {
  const lines = [`${index}. [${record.sourceName}] ${record.title}`];

  if (record.publishedAt) {
    lines.push(`   발행일: ${record.publishedAt}`);
  }

  lines.push(`   원문 요약: ${record.summary}`);

  if (record.translatedSummary && record.translatedSummary !== record.summary) {
    lines.push(`   한국어 번역: ${record.translatedSummary}`);
  }

  if (record.link) {
    lines.push(`   링크: ${record.link}`);
  }

  lines.push('');
  return lines;
}

export function renderDigest(records: readonly ArticleRecord[], options: RenderOptions): string {
  const lines = [
    `규제 준수 뉴스 요약 – ${formatTimestamp(options.now, options.timeZone)} (${options.timeZone} 기준)`,
    '−'.repeat(RULE_WIDTH),
  ];

  sortByPublishedDesc(records).forEach((record, i) => {
    lines.push(...renderRecord(record, i + 1));
  });

  return lines.join('\n');
}
