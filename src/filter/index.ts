/**
 * Filter Module
 *
 * Keyword-based article filtering
 */

export { matches, findMatchedKeywords, combineText, nativeOnly } from './matcher.js';
