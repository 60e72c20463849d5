/**
 * Scrape Adapter
 *
 * Reads a listing page that has no feed and turns its anchors into records.
 * These pages are always in the native language: titles are matched against
 * the native keyword list only and never translated.
 */

import { parseHTML } from 'linkedom';
import { SourceAdapter, type CollectedRecords } from './base.js';
import type { PageFetcher } from './types.js';
import { matches, nativeOnly } from '../filter/index.js';
import { SourceFetchError, errorMessage } from '../utils/errors.js';
import type { ArticleRecord, KeywordSets, ScrapeTargetConfig } from '../types/index.js';

export interface ScrapeAdapterDeps {
  fetcher: PageFetcher;
  keywords: KeywordSets;
}

export interface RawListing {
  title: string;
  href: string;
}

/**
 * Root-relative hrefs get the site prefix; anything else is kept as is
 */
export function absolutizeHref(href: string, baseUrl: string): string {
  return href.startsWith('/') ? `${baseUrl.replace(/\/+$/, '')}${href}` : href;
}

/**
 * (title, href) pairs for every element matching `selector`. Elements
 * without an href are dropped.
 */
export function extractListings(html: string, selector: string): RawListing[] {
  const { document } = parseHTML(html);
  const listings: RawListing[] = [];

  for (const anchor of document.querySelectorAll(selector)) {
    const href = anchor.getAttribute('href')?.trim();
    if (!href) {
      continue;
    }

    const title = (anchor.textContent ?? '').replace(/\s+/g, ' ').trim();
    listings.push({ title, href });
  }

  return listings;
}

export class ScrapeAdapter extends SourceAdapter {
  readonly kind = 'scrape' as const;

  constructor(
    readonly target: ScrapeTargetConfig,
    private readonly deps: ScrapeAdapterDeps
  ) {
    super(target.name);
  }

  private async fetchListings(): Promise<RawListing[]> {
    try {
      const html = await this.deps.fetcher.fetchPage(this.target.url);
      return extractListings(html, this.target.selector);
    } catch (error) {
      throw new SourceFetchError(this.name, `Failed to scrape ${this.target.url}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  protected async collectRecords(seen: Set<string>): Promise<CollectedRecords> {
    const listings = await this.fetchListings();
    const keywords = nativeOnly(this.deps.keywords);
    const records: ArticleRecord[] = [];

    for (const listing of listings) {
      const identifier = absolutizeHref(listing.href, this.target.baseUrl);

      if (seen.has(identifier)) {
        continue;
      }

      if (!matches(listing.title, keywords)) {
        continue;
      }

      seen.add(identifier);
      records.push({
        identifier,
        sourceName: this.target.name,
        title: listing.title,
        summary: listing.title,
        translatedSummary: listing.title,
        link: identifier,
        publishedAt: '',
      });

      this.logger.debug({ identifier }, 'Listing matched');
    }

    return { records, scanned: listings.length };
  }
}
