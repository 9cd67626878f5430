/**
 * Post Content Extractor
 *
 * Fetches a topic's detail page and extracts the body text of the first post
 */

import { load } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
import { logger } from '../utils/logger.js';
import type { ListingDescriber, PageFetcher } from './types.js';

const POST_BODY_SELECTOR = 'div.postbody';
const SKIPPED_TAGS = new Set(['script', 'style', 'noscript']);

function collectTextBlocks(node: AnyNode, blocks: string[]): void {
  if (isText(node)) {
    const text = node.data.trim();
    if (text) {
      blocks.push(text);
    }
    return;
  }

  if (isTag(node) && SKIPPED_TAGS.has(node.name)) {
    return;
  }

  if (hasChildren(node)) {
    for (const child of node.children) {
      collectTextBlocks(child, blocks);
    }
  }
}

/**
 * Text of the first `div.postbody`, one trimmed line per text block.
 * Returns '' when the page has no post body.
 */
export function extractPostBody(html: string): string {
  const $ = load(html);
  const body = $(POST_BODY_SELECTOR).get(0);

  if (!body) {
    return '';
  }

  const blocks: string[] = [];
  collectTextBlocks(body, blocks);
  return blocks.join('\n');
}

/**
 * Fetch a detail page and return its post text; '' on any failure
 */
export async function describeListing(link: string, fetcher: PageFetcher): Promise<string> {
  const html = await fetcher.fetchHtml(link);
  if (html === null) {
    return '';
  }

  try {
    const text = extractPostBody(html);
    if (!text) {
      logger.debug({ link }, 'No post body found');
    }
    return text;
  } catch (error) {
    logger.warn({ error, link }, 'Failed to parse detail page');
    return '';
  }
}

export function createDescriber(fetcher: PageFetcher): ListingDescriber {
  return (link) => describeListing(link, fetcher);
}
