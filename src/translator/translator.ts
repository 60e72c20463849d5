/**
 * Translator Gateway
 *
 * Wraps a TranslationClient. Never rejects: failures come back as a marked
 * placeholder.
 */

import { logger } from '../utils/logger.js';
import { TranslationError, errorMessage } from '../utils/errors.js';
import type { TranslationClient } from './types.js';

/**
 * Placeholder for text that could not be translated ("translation error")
 */
export function translationPlaceholder(reason: string): string {
  return `(번역 오류: ${reason})`;
}

export class TranslatorGateway {
  constructor(private readonly client: TranslationClient) {}

  async translate(text: string, targetLanguage: string): Promise<string> {
    try {
      const translated = await this.client.translate(text, targetLanguage);

      if (!translated.trim()) {
        throw new TranslationError('empty translation returned');
      }

      return translated;
    } catch (error) {
      const reason = errorMessage(error);
      logger.warn({ targetLanguage, error: reason }, 'Translation failed, using placeholder');
      return translationPlaceholder(reason);
    }
  }
}
