/**
 * fetch-based PageFetcher
 */

import type { PageFetcher } from './types.js';

export interface HttpFetcherOptions {
  userAgent: string;
  timeoutMs: number;
}

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly options: HttpFetcherOptions) {}

  async fetchPage(url: string): Promise<string> {
    const response = await fetch(url, {
      headers: { 'User-Agent': this.options.userAgent },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${url}`);
    }

    return response.text();
  }
}
