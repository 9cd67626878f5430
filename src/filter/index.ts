/**
 * Filter Module
 *
 * Keyword matching shared by the extractors and the summary
 */

export {
  containsTerm,
  matchesSearchTerms,
  firstMatchingTerm,
  type MatchOptions,
} from './matcher.js';
