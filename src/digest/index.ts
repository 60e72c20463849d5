/**
 * Digest Module
 */

export {
  renderDigest,
  sortByPublishedDesc,
  formatTimestamp,
  RULE_WIDTH,
  type RenderOptions,
} from './digest.js';
