/**
 * Scraper Types
 */

import type { ListingRecord } from '../types/index.js';

/**
 * Fetches a page body; resolves null on any transport or HTTP failure
 */
export interface PageFetcher {
  fetchHtml(url: string): Promise<string | null>;
}

/**
 * Maps one listing page to the matching records on it. Pure: no I/O.
 */
export type ListingExtractor = (
  markup: string,
  baseUrl: string,
  searchTerms: readonly string[]
) => ListingRecord[];

/**
 * Resolves the free-text description of a detail page; '' when unavailable
 */
export type ListingDescriber = (link: string) => Promise<string>;
