/**
 * Forum listing extractor
 *
 * Topic rows on the forum index are `<tr class="bg_small_yellow">`. The first
 * linked anchor carries the title, the first `td.row3` the author and the
 * `td.row3[nowrap]` cell the post date.
 */

import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { matchesSearchTerms, type MatchOptions } from '../filter/index.js';
import { logger } from '../utils/logger.js';
import type { DomainName } from '../config/keywords.js';
import type { ListingRecord } from '../types/index.js';
import type { ListingExtractor } from './types.js';

const ROW_SELECTOR = 'tr.bg_small_yellow';
const AUTHOR_CELL_SELECTOR = 'td.row3';
const DATE_CELL_SELECTOR = 'td.row3[nowrap]';
const DATE_SPAN_SELECTOR = 'span.postdetails';
const DATE_TEXT_PATTERN = /\d{1,2}\/\d{1,2}\/\d{4}/;

export interface ExtractOptions {
  domain: DomainName;
  /** Origin relative hrefs are joined to; defaults to the page URL's origin */
  siteOrigin?: string;
  match?: MatchOptions;
}

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Resolve an href against the site origin. Both rooted ("/c/posts/1.page")
 * and bare ("c/posts/1.page") paths are joined to the origin root.
 */
export function resolveLink(href: string, siteOrigin: string): string {
  if (href.startsWith('http://') || href.startsWith('https://')) {
    return href;
  }
  const origin = siteOrigin.replace(/\/+$/, '');
  return href.startsWith('/') ? `${origin}${href}` : `${origin}/${href}`;
}

function extractAuthor(row: Cheerio<Element>): string {
  const cell = row.find(AUTHOR_CELL_SELECTOR).first();
  if (cell.length === 0) {
    return '';
  }

  const anchor = cell.find('a').first();
  return normalizeWhitespace(anchor.length > 0 ? anchor.text() : cell.text());
}

function extractDate($: CheerioAPI, row: Cheerio<Element>): string {
  const cell = row.find(DATE_CELL_SELECTOR).first();
  let date = '';

  if (cell.length > 0) {
    const span = cell.find(DATE_SPAN_SELECTOR).first();
    date = normalizeWhitespace(span.length > 0 ? span.text() : cell.text());
  }

  if (!date) {
    row.find('td').each((_, td) => {
      const text = normalizeWhitespace($(td).text());
      if (DATE_TEXT_PATTERN.test(text)) {
        date = text;
        return false;
      }
      return undefined;
    });
  }

  return date;
}

function parseRow(
  $: CheerioAPI,
  row: Cheerio<Element>,
  searchTerms: readonly string[],
  siteOrigin: string,
  options: ExtractOptions
): ListingRecord | null {
  const anchor = row.find('a[href]').first();
  if (anchor.length === 0) {
    return null;
  }

  const href = (anchor.attr('href') ?? '').trim();
  const title = normalizeWhitespace(anchor.text());
  if (!href || !title) {
    return null;
  }

  if (!matchesSearchTerms(title, searchTerms, options.match)) {
    return null;
  }

  return {
    title,
    link: resolveLink(href, siteOrigin),
    author: extractAuthor(row),
    date: extractDate($, row),
    domain: options.domain,
  };
}

/**
 * Extract matching topic rows from one listing page
 */
export function extractListings(
  markup: string,
  baseUrl: string,
  searchTerms: readonly string[],
  options: ExtractOptions
): ListingRecord[] {
  const siteOrigin = options.siteOrigin ?? new URL(baseUrl).origin;
  const $ = load(markup);
  const listings: ListingRecord[] = [];

  $(ROW_SELECTOR).each((index, element) => {
    try {
      const listing = parseRow($, $(element), searchTerms, siteOrigin, options);
      if (listing) {
        listings.push(listing);
        logger.debug({ domain: options.domain, title: listing.title }, 'Matching listing found');
      }
    } catch (error) {
      logger.debug({ error, row: index }, 'Skipping malformed row');
    }
  });

  return listings;
}

/**
 * Bind the extractor to one listing domain
 */
export function createForumExtractor(options: ExtractOptions): ListingExtractor {
  return (markup, baseUrl, searchTerms) => extractListings(markup, baseUrl, searchTerms, options);
}
