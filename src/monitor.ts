/**
 * Listing Monitor
 *
 * Owns one domain's dedup store and its in-memory identity set. The set is
 * loaded once and replaced by the result of every run.
 */

import { config } from './config/index.js';
import type { ListingSource } from './config/domains.js';
import { createNotifier, type Notifier } from './notifier/mailer.js';
import { runPipeline } from './pipeline.js';
import { createDescriber, HttpPageFetcher } from './scraper/index.js';
import type { ListingDescriber, PageFetcher } from './scraper/types.js';
import { DedupStore, storePathFor, type IdentityStore } from './store/dedup-store.js';
import { logger } from './utils/logger.js';
import type { Identity, PipelineResult } from './types/index.js';

export interface MonitorOptions {
  fetcher?: PageFetcher;
  describe?: ListingDescriber;
  notifier?: Notifier;
  store?: IdentityStore;
  politenessDelayMs?: number;
  wait?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export class ListingMonitor {
  private known: Set<Identity> = new Set();
  private initialized = false;
  private readonly fetcher: PageFetcher;
  private readonly describe: ListingDescriber;
  private readonly notifier: Notifier;
  private readonly store: IdentityStore;

  constructor(
    readonly source: ListingSource,
    private readonly options: MonitorOptions = {}
  ) {
    this.fetcher = options.fetcher ?? new HttpPageFetcher();
    this.describe = options.describe ?? createDescriber(this.fetcher);
    this.notifier = options.notifier ?? createNotifier();
    this.store = options.store ?? new DedupStore(storePathFor(config.storage.dataDir, source.name));
  }

  get name(): string {
    return this.source.name;
  }

  /**
   * Number of identities currently known
   */
  get knownCount(): number {
    return this.known.size;
  }

  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    this.known = await this.store.load();
    this.initialized = true;
    logger.info(
      { domain: this.source.name, known: this.known.size, notifier: this.notifier.kind },
      'Monitor initialized'
    );
  }

  async runOnce(): Promise<PipelineResult> {
    await this.init();

    const result = await runPipeline(
      {
        source: this.source,
        fetcher: this.fetcher,
        describe: this.describe,
        notifier: this.notifier,
        store: this.store,
        politenessDelayMs: this.options.politenessDelayMs ?? config.scraper.politenessDelayMs,
        wait: this.options.wait,
        now: this.options.now,
      },
      this.known
    );

    this.known = result.known;
    return result;
  }
}
