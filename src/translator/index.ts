/**
 * Translator Module
 */

export { TranslatorGateway, translationPlaceholder } from './translator.js';
export { OpenAiTranslationClient, type OpenAiTranslationOptions } from './openai-client.js';
export type { TranslationClient } from './types.js';
