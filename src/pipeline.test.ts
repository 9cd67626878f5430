import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ENRICHMENT_FAILED_PLACEHOLDER, runPipeline, type PipelineDeps } from './pipeline.js';
import { ListingMonitor } from './monitor.js';
import { createForumExtractor } from './scraper/listing-extractor.js';
import { identityOf, type IdentityStore } from './store/dedup-store.js';
import type { ListingSource } from './config/domains.js';
import type { Notifier } from './notifier/mailer.js';
import type { PageFetcher } from './scraper/types.js';
import type { Identity, NotificationMessage } from './types/index.js';

// Mock logger to prevent console output during tests
vi.mock('./utils/logger.js', () => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return { logger };
});

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function loadFixture(filename: string): string {
  return fs.readFileSync(path.join(__dirname, 'scraper', '__fixtures__', filename), 'utf-8');
}

const PAGE_1 = 'https://c.dadi360.com/c/forums/show/56.page';
const PAGE_2 = 'https://c.dadi360.com/c/forums/show/90/56.page';
const POST = (id: number): string => `https://c.dadi360.com/c/posts/list/${id}.page`;

const PAGES = new Map([
  [PAGE_1, loadFixture('listing-page-1.html')],
  [PAGE_2, loadFixture('listing-page-2.html')],
]);

function fakeSource(overrides: Partial<ListingSource> = {}): ListingSource {
  return {
    name: 'nail',
    label: '美甲',
    subjectPrefix: '美甲招聘',
    noun: '美甲 job listings',
    pageUrls: () => [PAGE_1, PAGE_2],
    keywords: () => ['美甲', '指甲'],
    extract: createForumExtractor({ domain: 'nail', siteOrigin: 'https://c.dadi360.com' }),
    ...overrides,
  };
}

function fakeFetcher(pages: Map<string, string> = PAGES): PageFetcher {
  return { fetchHtml: vi.fn(async (url: string) => pages.get(url) ?? null) };
}

class MemoryStore implements IdentityStore {
  readonly saves: Set<Identity>[] = [];

  constructor(private initial: Set<Identity> = new Set()) {}

  async load(): Promise<Set<Identity>> {
    return new Set(this.initial);
  }

  async save(ids: ReadonlySet<Identity>): Promise<boolean> {
    this.saves.push(new Set(ids));
    this.initial = new Set(ids);
    return true;
  }
}

class RecordingNotifier implements Notifier {
  readonly kind = 'log';
  readonly sent: NotificationMessage[] = [];

  async send(message: NotificationMessage): Promise<void> {
    this.sent.push(message);
  }
}

function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    source: fakeSource(),
    fetcher: fakeFetcher(),
    describe: vi.fn(async (link: string) => `详情 ${link}`),
    notifier: new RecordingNotifier(),
    store: new MemoryStore(),
    politenessDelayMs: 2000,
    wait: vi.fn(async () => undefined),
    now: () => new Date(2024, 2, 8, 9, 0, 0),
    ...overrides,
  };
}

describe('runPipeline', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should report every new matching listing newest first', async () => {
    const notifier = new RecordingNotifier();
    const store = new MemoryStore();

    const result = await runPipeline(deps({ notifier, store }), new Set());

    expect(result.pagesFetched).toBe(2);
    expect(result.pagesFailed).toBe(0);
    expect(result.candidates).toBe(5);
    expect(result.newListings.map((listing) => listing.link)).toEqual([
      POST(1003),
      POST(1001),
      POST(1004),
      POST(1005),
    ]);
    expect(result.newListings[0]?.description).toBe(`详情 ${POST(1003)}`);
    expect(result.notified).toBe(true);
    expect(result.persisted).toBe(true);
    expect(result.failed).toBe(false);
    expect(result.known.size).toBe(4);
    expect(notifier.sent).toHaveLength(1);
    expect(notifier.sent[0]?.subject).toBe('【美甲招聘】New listings: 美甲、指甲');
    expect(notifier.sent[0]?.body).toContain('📊 Found 4 new 美甲 job listings');
    expect(store.saves).toEqual([result.known]);
  });

  it('should wait between page fetches', async () => {
    const wait = vi.fn(async () => undefined);

    await runPipeline(deps({ wait }), new Set());

    expect(wait).toHaveBeenCalledTimes(1);
  });

  it('should leave the caller known set untouched', async () => {
    const known = new Set([identityOf({ title: '美甲师招聘急聘', link: POST(1001) })]);

    const result = await runPipeline(deps(), known);

    expect(known.size).toBe(1);
    expect(result.newListings.map((listing) => listing.link)).toEqual([POST(1003), POST(1004), POST(1005)]);
    expect(result.known.size).toBe(4);
  });

  it('should skip pages that cannot be fetched', async () => {
    const fetcher = fakeFetcher(new Map([[PAGE_1, loadFixture('listing-page-1.html')]]));

    const result = await runPipeline(deps({ fetcher }), new Set());

    expect(result.pagesFetched).toBe(1);
    expect(result.pagesFailed).toBe(1);
    expect(result.newListings).toHaveLength(3);
    expect(result.failed).toBe(false);
  });

  it('should use a placeholder when details cannot be fetched', async () => {
    const describer = vi.fn(async (link: string) => {
      if (link === POST(1001)) {
        throw new Error('socket hang up');
      }
      return '';
    });

    const result = await runPipeline(deps({ describe: describer }), new Set());

    expect(result.enrichmentFailures).toBe(1);
    expect(result.newListings.find((listing) => listing.link === POST(1001))?.description).toBe(
      ENRICHMENT_FAILED_PLACEHOLDER
    );
    expect(result.newListings.find((listing) => listing.link === POST(1003))?.description).toBe('');
  });

  it('should persist even when the notification fails', async () => {
    const store = new MemoryStore();
    const notifier: Notifier = {
      kind: 'smtp',
      send: vi.fn(async () => {
        throw new Error('535 Authentication failed');
      }),
    };

    const result = await runPipeline(deps({ notifier, store }), new Set());

    expect(result.notified).toBe(false);
    expect(result.persisted).toBe(true);
    expect(result.failed).toBe(false);
    expect(store.saves[0]?.size).toBe(4);
  });

  it('should not notify when nothing is new', async () => {
    const notifier = new RecordingNotifier();
    const fetcher = fakeFetcher(new Map());

    const result = await runPipeline(deps({ notifier, fetcher }), new Set());

    expect(result.newListings).toEqual([]);
    expect(result.notified).toBe(false);
    expect(result.persisted).toBe(true);
    expect(notifier.sent).toEqual([]);
  });

  it('should keep the previous known set when the run aborts', async () => {
    const store = new MemoryStore();
    const notifier = new RecordingNotifier();
    const known = new Set(['earlier-id']);
    const source = fakeSource({
      extract: () => {
        throw new Error('unexpected markup');
      },
    });

    const result = await runPipeline(deps({ source, store, notifier }), known);

    expect(result.failed).toBe(true);
    expect(result.newListings).toEqual([]);
    expect(result.known).toEqual(new Set(['earlier-id']));
    expect(result.known).not.toBe(known);
    expect(notifier.sent).toEqual([]);
    expect(store.saves).toEqual([new Set(['earlier-id'])]);
  });

  it('should report an unpersisted run when the store rejects', async () => {
    const notifier = new RecordingNotifier();
    const store: IdentityStore = {
      load: async () => new Set(),
      save: vi.fn(async () => {
        throw new Error('EROFS: read-only file system');
      }),
    };

    const result = await runPipeline(deps({ store, notifier }), new Set());

    expect(result.persisted).toBe(false);
    expect(result.failed).toBe(false);
    expect(result.notified).toBe(true);
    expect(result.known.size).toBe(4);
  });
});

describe('ListingMonitor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should report new listings once across runs', async () => {
    const store = new MemoryStore();
    const notifier = new RecordingNotifier();
    const monitor = new ListingMonitor(fakeSource(), {
      fetcher: fakeFetcher(),
      describe: async () => '',
      notifier,
      store,
      wait: async () => undefined,
    });

    const first = await monitor.runOnce();
    const second = await monitor.runOnce();

    expect(first.newListings).toHaveLength(4);
    expect(store.saves[0]?.size).toBe(4);
    expect(second.newListings).toHaveLength(0);
    expect(second.known.size).toBe(4);
    expect(notifier.sent).toHaveLength(1);
    expect(monitor.knownCount).toBe(4);
  });

  it('should start from the persisted identities', async () => {
    const store = new MemoryStore(
      new Set([
        identityOf({ title: '美甲师招聘急聘', link: POST(1001) }),
        identityOf({ title: '长岛指甲店请大工', link: POST(1003) }),
      ])
    );
    const loadSpy = vi.spyOn(store, 'load');
    const monitor = new ListingMonitor(fakeSource(), {
      fetcher: fakeFetcher(),
      describe: async () => '',
      notifier: new RecordingNotifier(),
      store,
      wait: async () => undefined,
    });

    await monitor.init();
    const result = await monitor.runOnce();

    expect(loadSpy).toHaveBeenCalledTimes(1);
    expect(result.newListings.map((listing) => listing.link)).toEqual([POST(1004), POST(1005)]);
  });
});
