/**
 * OpenAI-backed translation client
 */

import OpenAI from 'openai';
import { TranslationError } from '../utils/errors.js';
import type { TranslationClient } from './types.js';

export interface OpenAiTranslationOptions {
  apiKey: string | undefined;
  model: string;
}

const SYSTEM_PROMPT = `You are a professional translator for legal and regulatory news.
Detect the language of the user's text and translate it into the requested target language.

Rules:
- Reply with the translation only, no preamble or notes
- Keep line breaks, names of laws, acronyms and organisations as in the source
- Keep a neutral, factual tone`;

export class OpenAiTranslationClient implements TranslationClient {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAiTranslationOptions) {}

  private getClient(): OpenAI {
    if (!this.options.apiKey) {
      throw new TranslationError('OPENAI_API_KEY is not configured');
    }
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  async translate(text: string, targetLanguage: string): Promise<string> {
    const client = this.getClient();

    const response = await client.chat.completions.create({
      model: this.options.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: `Target language: ${targetLanguage}\n\n${text}` },
      ],
      temperature: 0.2,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new TranslationError('Empty response from OpenAI');
    }

    return content;
  }
}
