/**
 * Translation collaborator contract
 */

export interface TranslationClient {
  /**
   * Translate into `targetLanguage`; the source language is auto-detected.
   * Rejects on network, quota or response errors.
   */
  translate(text: string, targetLanguage: string): Promise<string>;
}
