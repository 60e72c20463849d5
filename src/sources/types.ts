/**
 * Source adapter collaborators and the feed entry shape
 */

import { z } from 'zod';

/**
 * Feed-parsing collaborator: URL in, loosely shaped entries out
 */
export interface FeedClient {
  parseURL(url: string): Promise<{ items: unknown[] }>;
}

/**
 * Page-fetch collaborator: URL in, raw HTML out. Rejects on non-2xx.
 */
export interface PageFetcher {
  fetchPage(url: string): Promise<string>;
}

/**
 * Parsers sometimes hand back `{ _: text, $: attrs }` for elements with
 * attributes; keep the text and drop anything that is not a string.
 */
const feedText = z.preprocess((value) => {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object' && value !== null && '_' in value && typeof value._ === 'string') {
    return value._;
  }
  return undefined;
}, z.string().optional());

export const feedEntrySchema = z.object({
  id: feedText,
  guid: feedText,
  link: feedText,
  title: feedText,
  summary: feedText,
  description: feedText,
  contentSnippet: feedText,
  content: feedText,
  published: feedText,
  pubDate: feedText,
  isoDate: feedText,
});

export type FeedEntry = z.infer<typeof feedEntrySchema>;
