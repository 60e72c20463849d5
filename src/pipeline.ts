/**
 * Run Orchestrator
 *
 * One run, one linear path:
 * LOAD_STORE → FETCH_ALL_SOURCES → PERSIST_STORE → (empty: DONE_EMPTY) → RENDER → DISPATCH → DONE
 *
 * The store is persisted before dispatch: identifiers of a digest whose
 * delivery failed are not reported again.
 */

import { renderDigest } from './digest/index.js';
import type { Mailer } from './delivery/index.js';
import type { SourceAdapter } from './sources/index.js';
import { logger } from './utils/logger.js';
import type { ArticleRecord, PipelineResult, SourceResult } from './types/index.js';

export interface IdentifierRepository {
  load(): Promise<Set<string>>;
  save(identifiers: ReadonlySet<string>): Promise<void>;
}

/**
 * Everything a run needs, passed in explicitly
 */
export interface PipelineContext {
  store: IdentifierRepository;
  feedAdapters: SourceAdapter[];
  scrapeAdapters: SourceAdapter[];
  mailer: Mailer;
  subject: string;
  timeZone: string;
  now?: () => Date;
}

export interface PipelineOptions {
  /** Fetch and render only: the store is not written and nothing is sent */
  dryRun?: boolean;
}

async function fetchAllSources(
  adapters: SourceAdapter[],
  seen: Set<string>
): Promise<{ records: ArticleRecord[]; results: SourceResult[] }> {
  const records: ArticleRecord[] = [];
  const results: SourceResult[] = [];

  // One source at a time: the identifier set is mutated in source order
  for (const adapter of adapters) {
    const result = await adapter.collect(seen);
    results.push(result);

    if (result.ok) {
      records.push(...result.records);
    } else {
      logger.warn({ source: result.sourceName, reason: result.reason }, 'Source contributed no records');
    }
  }

  return { records, results };
}

export async function runPipeline(
  context: PipelineContext,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const { dryRun = false } = options;
  const now = context.now ?? (() => new Date());
  const startTime = Date.now();

  logger.info(
    { feeds: context.feedAdapters.length, scrapeTargets: context.scrapeAdapters.length, dryRun },
    'Starting pipeline'
  );

  try {
    // Step 1: Load seen identifiers
    const seen = await context.store.load();
    const knownBefore = seen.size;

    // Step 2: Feeds first, then scraped pages
    const { records, results } = await fetchAllSources(
      [...context.feedAdapters, ...context.scrapeAdapters],
      seen
    );
    const failedSources = results.filter((result) => !result.ok).length;

    logger.info(
      { matched: records.length, failedSources, newIdentifiers: seen.size - knownBefore },
      'Sources collected'
    );

    // Step 3: Persist before any delivery attempt
    if (dryRun) {
      logger.info('Dry run, identifier store not written');
    } else {
      await context.store.save(seen);
    }

    const base = {
      matched: records.length,
      sourceResults: results,
      failedSources,
    };

    if (records.length === 0) {
      logger.info('No new articles matched the keywords');
      return { ...base, state: 'done-empty', dispatched: false, durationMs: Date.now() - startTime };
    }

    // Step 4: Render
    const body = renderDigest(records, { now: now(), timeZone: context.timeZone });

    if (dryRun) {
      logger.info({ digest: body }, 'Dry run, digest not sent');
      return { ...base, state: 'done', dispatched: false, durationMs: Date.now() - startTime };
    }

    // Step 5: Dispatch
    const receipt = await context.mailer.send({ subject: context.subject, body });

    logger.info({ articles: records.length, messageId: receipt.messageId }, 'Digest sent');

    return {
      ...base,
      state: 'done',
      dispatched: true,
      messageId: receipt.messageId,
      durationMs: Date.now() - startTime,
    };
  } catch (error) {
    logger.error({ error }, 'Pipeline failed');
    throw error;
  }
}
