/**
 * Source Adapter Base
 *
 * Every source shares the dedup → filter → enrich shape. Subclasses supply
 * the records; the base turns any failure into a failed SourceResult.
 */

import { logger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ArticleRecord, SourceKind, SourceResult } from '../types/index.js';

export interface CollectedRecords {
  records: ArticleRecord[];
  scanned: number;
}

export abstract class SourceAdapter {
  abstract readonly kind: SourceKind;

  protected readonly logger: Logger;

  constructor(readonly name: string) {
    this.logger = logger.child({ source: name });
  }

  /**
   * Produce new matching records. Identifiers of emitted records must be
   * added to `seen`.
   */
  protected abstract collectRecords(seen: Set<string>): Promise<CollectedRecords>;

  async collect(seen: Set<string>): Promise<SourceResult> {
    const startTime = Date.now();
    this.logger.info({ kind: this.kind }, 'Collecting source');

    try {
      const { records, scanned } = await this.collectRecords(seen);

      this.logger.info(
        { scanned, matched: records.length, durationMs: Date.now() - startTime },
        'Source collected'
      );

      return { ok: true, sourceName: this.name, kind: this.kind, records, scanned };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error({ error: reason }, 'Source failed, skipping');

      return { ok: false, sourceName: this.name, kind: this.kind, reason };
    }
  }
}
