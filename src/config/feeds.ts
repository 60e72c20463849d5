/**
 * Source definitions: RSS/Atom feeds and scraped listing pages
 */

import type { FeedSourceConfig, ScrapeTargetConfig } from '../types/index.js';

export const DEFAULT_FEEDS: FeedSourceConfig[] = [
  {
    name: 'Global Compliance News',
    url: 'https://www.globalcompliancenews.com/feed/',
    sourceLanguage: 'en',
  },
  {
    name: 'Corporate Compliance Insights',
    url: 'https://www.corporatecomplianceinsights.com/feed/',
    sourceLanguage: 'en',
  },
  {
    name: 'Lexology',
    url: 'https://www.lexology.com/rss',
    sourceLanguage: 'en',
  },
];

/**
 * Pages without a feed. The Ministry of Government Legislation lists
 * announcements as `div.boardType01 li a` anchors with root-relative links.
 */
export const DEFAULT_SCRAPE_TARGETS: ScrapeTargetConfig[] = [
  {
    name: '법제처 공공데이터',
    url: 'https://www.moleg.go.kr/menu.es?mid=a10203010000',
    baseUrl: 'https://www.moleg.go.kr',
    selector: 'div.boardType01 li a',
  },
];
