/**
 * rss-parser backed FeedClient
 */

import Parser from 'rss-parser';
import type { FeedClient } from './types.js';

export interface RssClientOptions {
  userAgent: string;
  timeoutMs: number;
}

export class RssParserFeedClient implements FeedClient {
  private readonly parser: Parser;

  constructor(options: RssClientOptions) {
    this.parser = new Parser({
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
      },
      timeout: options.timeoutMs,
    });
  }

  async parseURL(url: string): Promise<{ items: unknown[] }> {
    const feed = await this.parser.parseURL(url);
    return { items: feed.items ?? [] };
  }
}
