/**
 * Feed Adapter
 *
 * Reads one RSS/Atom feed, keeps unseen entries that match the keyword
 * lists and translates foreign-language ones.
 */

import { SourceAdapter, type CollectedRecords } from './base.js';
import { feedEntrySchema, type FeedClient, type FeedEntry } from './types.js';
import { combineText, findMatchedKeywords } from '../filter/index.js';
import type { TranslatorGateway } from '../translator/translator.js';
import { SourceFetchError, errorMessage } from '../utils/errors.js';
import type { ArticleRecord, FeedSourceConfig, KeywordSets } from '../types/index.js';

export interface FeedAdapterDeps {
  client: FeedClient;
  translator: TranslatorGateway;
  keywords: KeywordSets;
  targetLanguage: string;
}

/**
 * id, then guid, then link. Candidates are trimmed; blank or multi-line ones are skipped,
 * since the store keeps one identifier per line.
 */
export function resolveIdentifier(entry: FeedEntry): string | undefined {
  for (const candidate of [entry.id, entry.guid, entry.link]) {
    const value = candidate?.trim();
    if (value && !/[\r\n]/.test(value)) {
      return value;
    }
  }
  return undefined;
}

function resolveSummary(entry: FeedEntry): string {
  return entry.summary ?? entry.description ?? entry.contentSnippet ?? entry.content ?? '';
}

function resolvePublished(entry: FeedEntry): string {
  return entry.published ?? entry.pubDate ?? entry.isoDate ?? '';
}

export class FeedAdapter extends SourceAdapter {
  readonly kind = 'feed' as const;

  constructor(
    readonly feed: FeedSourceConfig,
    private readonly deps: FeedAdapterDeps
  ) {
    super(feed.name);
  }

  private async fetchEntries(): Promise<unknown[]> {
    try {
      const parsed = await this.deps.client.parseURL(this.feed.url);
      return parsed.items;
    } catch (error) {
      throw new SourceFetchError(this.name, `Failed to fetch feed ${this.feed.url}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  protected async collectRecords(seen: Set<string>): Promise<CollectedRecords> {
    const items = await this.fetchEntries();
    const records: ArticleRecord[] = [];
    const needsTranslation = this.feed.sourceLanguage !== this.deps.targetLanguage;

    for (const item of items) {
      const parsed = feedEntrySchema.safeParse(item);
      if (!parsed.success) {
        this.logger.debug('Skipping malformed feed entry');
        continue;
      }

      const entry = parsed.data;
      const identifier = resolveIdentifier(entry);
      if (!identifier) {
        this.logger.debug({ title: entry.title }, 'Entry has no usable id, guid or link, skipping');
        continue;
      }

      if (seen.has(identifier)) {
        continue;
      }

      const title = (entry.title ?? '').trim();
      const summary = resolveSummary(entry).trim();
      const combined = combineText(title, summary);

      const matchedKeywords = findMatchedKeywords(combined, this.deps.keywords);
      if (matchedKeywords.length === 0) {
        continue;
      }

      const translatedSummary = needsTranslation
        ? (await this.deps.translator.translate(combined, this.deps.targetLanguage)).trim()
        : summary;

      seen.add(identifier);
      records.push({
        identifier,
        sourceName: this.feed.name,
        title,
        summary,
        translatedSummary,
        link: entry.link?.trim() ?? '',
        publishedAt: resolvePublished(entry),
      });

      this.logger.debug({ identifier, keywords: matchedKeywords }, 'Entry matched');
    }

    return { records, scanned: items.length };
  }
}
