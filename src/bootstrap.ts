/**
 * Wires configuration to the production collaborators
 */

import type { Config } from './config/index.js';
import { createMailer } from './delivery/index.js';
import { FeedAdapter, HttpPageFetcher, RssParserFeedClient, ScrapeAdapter } from './sources/index.js';
import { IdentifierStore } from './store/index.js';
import { OpenAiTranslationClient, TranslatorGateway } from './translator/index.js';
import type { PipelineContext } from './pipeline.js';

export function createPipelineContext(config: Config): PipelineContext {
  const fetchOptions = { userAgent: config.scraper.userAgent, timeoutMs: config.scraper.timeoutMs };

  const feedClient = new RssParserFeedClient(fetchOptions);
  const pageFetcher = new HttpPageFetcher(fetchOptions);
  const translator = new TranslatorGateway(
    new OpenAiTranslationClient({ apiKey: config.translation.apiKey, model: config.translation.model })
  );

  return {
    store: new IdentifierStore(config.store.path),
    feedAdapters: config.sources.feeds.map(
      (feed) =>
        new FeedAdapter(feed, {
          client: feedClient,
          translator,
          keywords: config.keywords,
          targetLanguage: config.translation.targetLanguage,
        })
    ),
    scrapeAdapters: config.sources.scrapeTargets.map(
      (target) => new ScrapeAdapter(target, { fetcher: pageFetcher, keywords: config.keywords })
    ),
    mailer: createMailer(config.email.provider, {
      ...config.email.smtp,
      recipients: config.email.recipients,
    }),
    subject: config.email.subject,
    timeZone: config.scheduler.timezone,
  };
}
