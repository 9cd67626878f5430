/**
 * Main Pipeline
 *
 * One monitoring pass over a listing domain:
 * 1. Fetch every listing page, with a politeness delay between requests
 * 2. Extract matching rows from each page
 * 3. Drop rows that were already notified
 * 4. Fetch the detail text of each new row
 * 5. Sort newest first
 * 6. Send one notification for the batch
 * 7. Persist the identity set
 */

import { filterNew, type IdentityStore } from './store/dedup-store.js';
import { formatNotification, sortByDateDescending } from './digest/index.js';
import { RateLimiter, sleep } from './utils/rate-limiter.js';
import { logger } from './utils/logger.js';
import type { ListingSource } from './config/domains.js';
import type { Notifier } from './notifier/mailer.js';
import type { ListingDescriber, PageFetcher } from './scraper/types.js';
import type { Identity, ListingRecord, PipelineResult, PipelineStage } from './types/index.js';

export const ENRICHMENT_FAILED_PLACEHOLDER = 'Failed to fetch details';

/**
 * Collaborators for one run
 */
export interface PipelineDeps {
  source: ListingSource;
  fetcher: PageFetcher;
  describe: ListingDescriber;
  notifier: Notifier;
  store: IdentityStore;
  politenessDelayMs: number;
  /** Delay implementation; replaced in tests */
  wait?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run the full pipeline for one domain. Never rejects: an unexpected fault
 * aborts the run and the pre-run identity set is carried forward.
 */
export async function runPipeline(
  deps: PipelineDeps,
  known: ReadonlySet<Identity>
): Promise<PipelineResult> {
  const { source, fetcher, describe, notifier, store } = deps;
  const domain = source.name;
  const startTime = Date.now();
  const log = logger.child({ domain });

  const result: PipelineResult = {
    domain,
    pagesFetched: 0,
    pagesFailed: 0,
    candidates: 0,
    newListings: [],
    enrichmentFailures: 0,
    notified: false,
    persisted: false,
    failed: false,
    known: new Set(known),
    durationMs: 0,
  };

  let stage: PipelineStage = 'idle';
  const enter = (next: PipelineStage): void => {
    stage = next;
    log.debug({ stage }, 'Entering stage');
  };

  log.info('Starting monitoring run');

  try {
    // Step 1-2: Fetch pages and extract matching rows
    const searchTerms = source.keywords();
    const limiter = new RateLimiter(deps.politenessDelayMs, deps.wait ?? sleep);
    const candidates: ListingRecord[] = [];
    const pageUrls = source.pageUrls();

    for (const [index, pageUrl] of pageUrls.entries()) {
      enter('fetching');
      log.info({ page: index + 1, url: pageUrl }, 'Fetching listing page');
      const html = await limiter.execute(() => fetcher.fetchHtml(pageUrl));

      if (html === null) {
        result.pagesFailed++;
        log.warn({ page: index + 1, url: pageUrl }, 'Listing page unavailable, skipping');
        continue;
      }
      result.pagesFetched++;

      enter('extracting');
      const found = source.extract(html, pageUrl, searchTerms);
      candidates.push(...found);
      log.info({ page: index + 1, matches: found.length }, 'Page processed');
    }
    result.candidates = candidates.length;

    // Step 3: Deduplicate against everything already notified
    enter('deduplicating');
    const { newRecords, updated } = filterNew(candidates, known);
    log.info(
      { candidates: candidates.length, new: newRecords.length, known: known.size },
      'Deduplication complete'
    );

    // Step 4: Enrich new rows with the detail text
    enter('enriching');
    for (const record of newRecords) {
      try {
        record.description = await describe(record.link);
      } catch (error) {
        result.enrichmentFailures++;
        record.description = ENRICHMENT_FAILED_PLACEHOLDER;
        log.warn({ error: toError(error), link: record.link }, 'Failed to fetch listing details');
      }
    }

    // Step 5: Sort newest first
    enter('sorting');
    const sorted = sortByDateDescending(newRecords);
    result.newListings = sorted;

    // Step 6: Notify
    enter('notifying');
    if (sorted.length === 0) {
      log.info('No new listings found, nothing to notify');
    } else {
      const message = formatNotification(
        sorted,
        { subjectPrefix: source.subjectPrefix, noun: source.noun, searchTerms },
        deps.now?.()
      );
      log.info({ subject: message.subject, count: sorted.length }, 'Sending notification');

      try {
        await notifier.send(message);
        result.notified = true;
      } catch (error) {
        log.error({ error: toError(error) }, 'Failed to send notification');
      }
    }

    result.known = updated;
  } catch (error) {
    result.failed = true;
    result.newListings = [];
    result.known = new Set(known);
    log.error({ error: toError(error), stage }, 'Monitoring run aborted');
  }

  // Step 7: Persist, whether or not the notification went out
  enter('persisting');
  try {
    result.persisted = await store.save(result.known);
  } catch (error) {
    log.error({ error: toError(error) }, 'Failed to persist identity set');
  }

  enter('idle');
  result.durationMs = Date.now() - startTime;

  log.info(
    {
      pagesFetched: result.pagesFetched,
      pagesFailed: result.pagesFailed,
      candidates: result.candidates,
      new: result.newListings.length,
      enrichmentFailures: result.enrichmentFailures,
      notified: result.notified,
      persisted: result.persisted,
      failed: result.failed,
      durationMs: result.durationMs,
    },
    'Monitoring run complete'
  );

  return result;
}
