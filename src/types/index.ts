/**
 * Core types for the compliance news digest
 */

/**
 * A matched, normalized article. Never mutated after construction.
 */
export interface ArticleRecord {
  readonly identifier: string;
  readonly sourceName: string;
  readonly title: string;
  readonly summary: string;
  readonly translatedSummary: string;
  readonly link: string;
  /** Raw source timestamp; sorted as an opaque string */
  readonly publishedAt: string;
}

export interface FeedSourceConfig {
  name: string;
  url: string;
  sourceLanguage: string;
}

export interface ScrapeTargetConfig {
  name: string;
  url: string;
  /** Prefix for root-relative hrefs */
  baseUrl: string;
  /** CSS selector of the listing anchors */
  selector: string;
}

export interface KeywordSets {
  readonly native: readonly string[];
  readonly foreign: readonly string[];
}

export type SourceKind = 'feed' | 'scrape';

export type SourceResult =
  | {
      ok: true;
      sourceName: string;
      kind: SourceKind;
      records: ArticleRecord[];
      scanned: number;
    }
  | {
      ok: false;
      sourceName: string;
      kind: SourceKind;
      reason: string;
    };

export type RunState = 'done' | 'done-empty';

export interface PipelineResult {
  state: RunState;
  matched: number;
  sourceResults: SourceResult[];
  failedSources: number;
  dispatched: boolean;
  messageId?: string;
  durationMs: number;
}
