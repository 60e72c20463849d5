/**
 * Tests for the Run Orchestrator
 */

import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runPipeline, type PipelineContext } from '../src/pipeline.js';
import { FeedAdapter, ScrapeAdapter } from '../src/sources/index.js';
import { IdentifierStore } from '../src/store/index.js';
import { TranslatorGateway } from '../src/translator/index.js';
import { DeliveryConfigError, StoreIOError } from '../src/utils/errors.js';
import type { FeedSourceConfig, KeywordSets, ScrapeTargetConfig } from '../src/types/index.js';
import {
  FailingMailer,
  FakeFeedClient,
  FakePageFetcher,
  FakeTranslationClient,
  MemoryStore,
  RecordingMailer,
} from './helpers/fakes.js';

const keywords: KeywordSets = { native: ['하도급법'], foreign: ['GDPR', 'tariffs'] };

const gcn: FeedSourceConfig = { name: 'Global Compliance News', url: 'https://gcn.example/feed', sourceLanguage: 'en' };
const cci: FeedSourceConfig = { name: 'Compliance Insights', url: 'https://cci.example/feed', sourceLanguage: 'en' };
const portal: ScrapeTargetConfig = {
  name: '법제처 공공데이터',
  url: 'https://portal.example/board',
  baseUrl: 'https://portal.example',
  selector: 'div.boardType01 li a',
};

const portalPage = '<div class="boardType01"><ul><li><a href="/view/9">하도급법 개정 공고</a></li></ul></div>';

const gdprEntry = { id: 'abc123', title: 'New GDPR Enforcement Action', summary: 'Regulator fines a retailer.' };

interface Harness {
  context: PipelineContext;
  store: MemoryStore;
  mailer: RecordingMailer;
  feedClient: FakeFeedClient;
}

function createHarness(options: {
  feeds: Record<string, unknown[] | Error>;
  feedConfigs?: FeedSourceConfig[];
  pages?: Record<string, string | Error>;
  store?: MemoryStore;
}): Harness {
  const store = options.store ?? new MemoryStore();
  const mailer = new RecordingMailer();
  const feedClient = new FakeFeedClient(options.feeds);
  const translator = new TranslatorGateway(new FakeTranslationClient());

  const context: PipelineContext = {
    store,
    feedAdapters: (options.feedConfigs ?? [gcn]).map(
      (feed) => new FeedAdapter(feed, { client: feedClient, translator, keywords, targetLanguage: 'ko' })
    ),
    scrapeAdapters: [
      new ScrapeAdapter(portal, { fetcher: new FakePageFetcher(options.pages ?? {}), keywords }),
    ],
    mailer,
    subject: '[Compliance Digest] 신규 규제 소식 / 법률 변경 알림',
    timeZone: 'Asia/Seoul',
    now: () => new Date('2026-01-06T00:00:00Z'),
  };

  return { context, store, mailer, feedClient };
}

describe('runPipeline', () => {
  it('delivers one translated record for a new GDPR entry and stores its identifier', async () => {
    const { context, store, mailer } = createHarness({ feeds: { [gcn.url]: [gdprEntry] } });

    const result = await runPipeline(context);

    expect(result).toMatchObject({ state: 'done', matched: 1, dispatched: true, messageId: 'msg-1' });
    const feedResult = result.sourceResults[0];
    expect(feedResult?.ok && feedResult.records).toEqual([
      {
        identifier: 'abc123',
        sourceName: 'Global Compliance News',
        title: 'New GDPR Enforcement Action',
        summary: 'Regulator fines a retailer.',
        translatedSummary: '[ko] New GDPR Enforcement Action\nRegulator fines a retailer.',
        link: '',
        publishedAt: '',
      },
    ]);
    expect([...store.identifiers]).toEqual(['abc123']);
    expect(mailer.sent).toHaveLength(1);
    expect(mailer.sent[0]?.subject).toBe('[Compliance Digest] 신규 규제 소식 / 법률 변경 알림');
    expect(mailer.sent[0]?.body).toContain('1. [Global Compliance News] New GDPR Enforcement Action');
  });

  it('matches nothing new on a second run with the same feed', async () => {
    const store = new MemoryStore();
    const first = createHarness({ feeds: { [gcn.url]: [gdprEntry] }, store });
    await runPipeline(first.context);

    const second = createHarness({ feeds: { [gcn.url]: [gdprEntry] }, store });
    const result = await runPipeline(second.context);

    expect(result).toMatchObject({ state: 'done-empty', matched: 0, dispatched: false });
    expect(second.mailer.sent).toHaveLength(0);
    expect([...store.identifiers]).toEqual(['abc123']);
  });

  it('matches zero records when the store already holds every identifier', async () => {
    const store = new MemoryStore(['abc123', 'def456']);
    const { context, mailer } = createHarness({
      feeds: { [gcn.url]: [gdprEntry, { id: 'def456', title: 'tariffs' }] },
      store,
    });

    const result = await runPipeline(context);

    expect(result.matched).toBe(0);
    expect(mailer.sent).toHaveLength(0);
  });

  it('skips dispatch but still persists the store when nothing matches', async () => {
    const store = new MemoryStore(['old-1']);
    const { context, mailer } = createHarness({
      feeds: { [gcn.url]: [{ id: 'n-1', title: 'Quarterly earnings' }] },
      store,
    });

    const result = await runPipeline(context);

    expect(result.state).toBe('done-empty');
    expect(mailer.sent).toHaveLength(0);
    expect(store.saves).toBe(1);
    expect([...store.identifiers]).toEqual(['old-1']);
  });

  it('keeps records from other sources when one feed fails', async () => {
    const { context, mailer, feedClient } = createHarness({
      feeds: {
        [gcn.url]: new Error('socket hang up'),
        [cci.url]: [{ guid: 'cci-1', title: 'New tariffs on steel', link: 'https://cci.example/1' }],
      },
      feedConfigs: [gcn, cci],
      pages: { [portal.url]: portalPage },
    });

    const result = await runPipeline(context);

    expect(feedClient.requested).toEqual([gcn.url, cci.url]);
    expect(result.failedSources).toBe(1);
    expect(result.sourceResults.map((r) => [r.sourceName, r.ok])).toEqual([
      ['Global Compliance News', false],
      ['Compliance Insights', true],
      ['법제처 공공데이터', true],
    ]);
    expect(result.matched).toBe(2);
    const body = mailer.sent[0]?.body ?? '';
    expect(body).toContain('[Compliance Insights] New tariffs on steel');
    expect(body).toContain('[법제처 공공데이터] 하도급법 개정 공고');
  });

  it('persists the store before delivery, so a failed delivery is not repeated', async () => {
    const store = new MemoryStore();
    const { context } = createHarness({ feeds: { [gcn.url]: [gdprEntry] }, store });
    const failing: PipelineContext = {
      ...context,
      mailer: new FailingMailer(new DeliveryConfigError('SMTP credentials or recipient list not configured')),
    };

    await expect(runPipeline(failing)).rejects.toBeInstanceOf(DeliveryConfigError);
    expect([...store.identifiers]).toEqual(['abc123']);
  });

  it('aborts before fetching or dispatching when the store cannot be read', async () => {
    const { context, mailer, feedClient } = createHarness({ feeds: { [gcn.url]: [gdprEntry] } });
    const broken: PipelineContext = {
      ...context,
      store: {
        load: () => Promise.reject(new StoreIOError('/data/ids.txt', 'Failed to read identifier store: EACCES')),
        save: () => Promise.resolve(),
      },
    };

    await expect(runPipeline(broken)).rejects.toBeInstanceOf(StoreIOError);
    expect(feedClient.requested).toHaveLength(0);
    expect(mailer.sent).toHaveLength(0);
  });

  it('does not dispatch when the store cannot be written', async () => {
    const { context, mailer } = createHarness({ feeds: { [gcn.url]: [gdprEntry] } });
    const broken: PipelineContext = {
      ...context,
      store: {
        load: () => Promise.resolve(new Set<string>()),
        save: () => Promise.reject(new StoreIOError('/data/ids.txt', 'Failed to write identifier store: ENOSPC')),
      },
    };

    await expect(runPipeline(broken)).rejects.toBeInstanceOf(StoreIOError);
    expect(mailer.sent).toHaveLength(0);
  });

  it('neither writes the store nor sends in dry-run mode', async () => {
    const store = new MemoryStore();
    const { context, mailer } = createHarness({ feeds: { [gcn.url]: [gdprEntry] }, store });

    const result = await runPipeline(context, { dryRun: true });

    expect(result).toMatchObject({ state: 'done', matched: 1, dispatched: false });
    expect(store.saves).toBe(0);
    expect(mailer.sent).toHaveLength(0);
  });

  it('omits the translation line for target-language sources', async () => {
    const koFeed: FeedSourceConfig = { name: '법률 뉴스', url: 'https://law.example/rss', sourceLanguage: 'ko' };
    const { context, mailer } = createHarness({
      feeds: { [koFeed.url]: [{ id: 'ko-1', title: '하도급법 위반 제재', summary: '공정위 발표' }] },
      feedConfigs: [koFeed],
    });

    await runPipeline(context);

    expect(mailer.sent[0]?.body.split('\n').slice(2)).toEqual([
      '1. [법률 뉴스] 하도급법 위반 제재',
      '   원문 요약: 공정위 발표',
      '',
    ]);
  });

  it('does not re-deliver a padded guid on the next run against the identifier file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'pipeline-store-'));
    try {
      const path = join(dir, 'seen.txt');
      const { context, mailer } = createHarness({
        feeds: { [gcn.url]: [{ guid: '\n  https://f.example/1\n', title: 'GDPR fine' }] },
      });
      const fileBacked: PipelineContext = { ...context, store: new IdentifierStore(path) };

      const first = await runPipeline(fileBacked);
      const second = await runPipeline(fileBacked);

      expect(first).toMatchObject({ state: 'done', matched: 1 });
      expect(second).toMatchObject({ state: 'done-empty', matched: 0, dispatched: false });
      expect(mailer.sent).toHaveLength(1);
      expect(await readFile(path, 'utf-8')).toBe('https://f.example/1\n');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
