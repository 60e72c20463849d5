/**
 * Tests for the Translator Gateway
 */

import { describe, it, expect } from 'vitest';
import { TranslatorGateway, translationPlaceholder, type TranslationClient } from '../../src/translator/index.js';
import { FailingTranslationClient, FakeTranslationClient } from '../helpers/fakes.js';

describe('TranslatorGateway', () => {
  it('returns the collaborator translation and passes only the target language', async () => {
    const client = new FakeTranslationClient();
    const gateway = new TranslatorGateway(client);

    const translated = await gateway.translate('Tariffs rise', 'ko');

    expect(translated).toBe('[ko] Tariffs rise');
    expect(client.calls).toEqual([{ text: 'Tariffs rise', targetLanguage: 'ko' }]);
  });

  it('returns a placeholder instead of rejecting when the collaborator fails', async () => {
    const gateway = new TranslatorGateway(new FailingTranslationClient('Request failed with status 429'));

    await expect(gateway.translate('Tariffs rise', 'ko')).resolves.toBe(
      '(번역 오류: Request failed with status 429)'
    );
  });

  it('treats a blank translation as a failure', async () => {
    const blank: TranslationClient = { translate: async () => '   ' };
    const gateway = new TranslatorGateway(blank);

    await expect(gateway.translate('Tariffs rise', 'ko')).resolves.toBe('(번역 오류: empty translation returned)');
  });

  it('contains non-Error rejections', async () => {
    const client: TranslationClient = {
      translate: () => Promise.reject('socket hang up'),
    };
    const gateway = new TranslatorGateway(client);

    await expect(gateway.translate('x', 'ko')).resolves.toBe(translationPlaceholder('socket hang up'));
  });
});
