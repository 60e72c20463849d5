/**
 * Sources Module
 *
 * Feed-based and scrape-based adapters plus their production collaborators
 */

export { SourceAdapter, type CollectedRecords } from './base.js';
export { FeedAdapter, resolveIdentifier, type FeedAdapterDeps } from './feed-adapter.js';
export {
  ScrapeAdapter,
  absolutizeHref,
  extractListings,
  type ScrapeAdapterDeps,
  type RawListing,
} from './scrape-adapter.js';
export { RssParserFeedClient, type RssClientOptions } from './rss-client.js';
export { HttpPageFetcher, type HttpFetcherOptions } from './http-fetcher.js';
export { feedEntrySchema, type FeedClient, type FeedEntry, type PageFetcher } from './types.js';
