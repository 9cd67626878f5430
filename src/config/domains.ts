/**
 * Listing domains
 *
 * Each monitored forum board is a capability set: where its listing pages
 * live, which terms to match and how rows are extracted.
 */

import { config } from './index.js';
import type { DomainName } from './keywords.js';
import type { MatchOptions } from '../filter/index.js';
import { createForumExtractor } from '../scraper/listing-extractor.js';
import type { ListingExtractor } from '../scraper/types.js';

export interface ListingSource {
  name: DomainName;
  /** Short display label, e.g. "美甲" */
  label: string;
  subjectPrefix: string;
  /** Plural noun for what the board lists, used in the notification text */
  noun: string;
  pageUrls(): string[];
  keywords(): readonly string[];
  extract: ListingExtractor;
}

interface ForumBoard {
  name: DomainName;
  forumId: number;
  label: string;
  subjectPrefix: string;
  noun: string;
  match?: MatchOptions;
}

const FORUM_BOARDS: readonly ForumBoard[] = [
  { name: 'nail', forumId: 56, label: '美甲', subjectPrefix: '美甲招聘', noun: '美甲 job listings' },
  {
    name: 'rental',
    forumId: 87,
    label: '租房',
    subjectPrefix: '租房信息',
    noun: '租房 listings',
    // English terms such as "studio" or "rent" appear in any case
    match: { ignoreCase: true },
  },
  { name: 'restaurant', forumId: 57, label: '餐厅', subjectPrefix: '餐厅招聘', noun: '餐厅 job listings' },
];

/**
 * Listing page URLs, newest first. Page n > 1 starts at topic offset
 * (n - 1) * perPage.
 */
export function buildPageUrls(
  origin: string,
  forumId: number,
  pages: number,
  perPage: number
): string[] {
  const base = `${origin.replace(/\/+$/, '')}/c/forums/show`;
  return Array.from({ length: Math.max(0, pages) }, (_, index) =>
    index === 0 ? `${base}/${forumId}.page` : `${base}/${index * perPage}/${forumId}.page`
  );
}

function toListingSource(board: ForumBoard): ListingSource {
  const { siteOrigin, pagesToScrape, topicsPerPage } = config.scraper;
  return {
    name: board.name,
    label: board.label,
    subjectPrefix: board.subjectPrefix,
    noun: board.noun,
    pageUrls: () => buildPageUrls(siteOrigin, board.forumId, pagesToScrape, topicsPerPage),
    keywords: () => config.domains.keywords[board.name],
    extract: createForumExtractor({ domain: board.name, siteOrigin, match: board.match }),
  };
}

export const LISTING_SOURCES: readonly ListingSource[] = FORUM_BOARDS.map(toListingSource);

export function getListingSource(name: DomainName): ListingSource {
  const source = LISTING_SOURCES.find((candidate) => candidate.name === name);
  if (!source) {
    throw new Error(`Unknown listing domain: ${name}`);
  }
  return source;
}
