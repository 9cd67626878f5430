/**
 * Keyword Matcher
 *
 * Substring matching of topic titles against a domain's search terms
 */

/**
 * Match options
 */
export interface MatchOptions {
  /** Compare lowercased title and terms. Off by default (CJK terms). */
  ignoreCase?: boolean;
}

function normalizeText(text: string, { ignoreCase = false }: MatchOptions): string {
  return ignoreCase ? text.toLowerCase() : text;
}

/**
 * Check if the title contains the term
 */
export function containsTerm(title: string, term: string, options: MatchOptions = {}): boolean {
  if (term.length === 0) {
    return false;
  }
  return normalizeText(title, options).includes(normalizeText(term, options));
}

/**
 * True when at least one term occurs in the title
 */
export function matchesSearchTerms(
  title: string,
  searchTerms: readonly string[],
  options: MatchOptions = {}
): boolean {
  return searchTerms.some((term) => containsTerm(title, term, options));
}

/**
 * The first term (in configured order) that occurs in the title
 */
export function firstMatchingTerm(
  title: string,
  searchTerms: readonly string[],
  options: MatchOptions = {}
): string | undefined {
  return searchTerms.find((term) => containsTerm(title, term, options));
}
