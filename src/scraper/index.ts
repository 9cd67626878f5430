/**
 * Scraper Module
 *
 * HTTP fetching, listing-row extraction and detail-page text extraction
 */

export { HttpPageFetcher, buildRequestHeaders } from './http-client.js';

export {
  extractListings,
  createForumExtractor,
  resolveLink,
  type ExtractOptions,
} from './listing-extractor.js';

export { extractPostBody, describeListing, createDescriber } from './content-extractor.js';

export type { PageFetcher, ListingExtractor, ListingDescriber } from './types.js';
