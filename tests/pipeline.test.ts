import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultAssembler, runCrawl, runProducer, type CrawlOutcome } from '../lib/crawl/pipeline';
import { BoundedQueue } from '../lib/crawl/queue';
import { loadCrawlState } from '../lib/crawl/state';
import { CsvRecordStore } from '../lib/store';
import { FakeFetcher, MemoryStore, gamePage, memoryLogger, pageUrl } from './helpers';

function pagesFor(ids: number[]) {
  return Object.fromEntries(ids.map((id) => [id, gamePage(`Game ${id}`)]));
}

describe('loadCrawlState', () => {
  it('resumes after the largest stored id', () => {
    const state = loadCrawlState({ readIds: () => [5, 2, 9] });
    expect(state.nextId).toBe(10);
    expect([...state.knownIds].sort((a, b) => a - b)).toEqual([2, 5, 9]);
    expect(state.consecutiveMisses).toBe(0);
    expect(state.stopRequested).toBe(false);
  });

  it('starts at 1 on an empty store and honours an override', () => {
    expect(loadCrawlState({ readIds: () => [] }).nextId).toBe(1);
    expect(loadCrawlState({ readIds: () => [5, 9] }, 3).nextId).toBe(3);
  });
});

describe('runProducer', () => {
  it('stops fetching while the queue is full', async () => {
    const fetcher = new FakeFetcher(() => ({ status: 'html', html: gamePage('Game') }));
    const queue = new BoundedQueue<CrawlOutcome>(3);

    const producer = runProducer({ fetcher, queue, startId: 1, endId: null, concurrency: 2, isStopped: () => false });
    await vi.waitFor(() => expect(queue.waitingPuts).toBe(1));

    expect(queue.size).toBe(3);
    expect(fetcher.requested).toEqual([1, 2, 3, 4, 5].map(pageUrl));

    queue.end();
    expect(await producer).toBe(6);
  });

  it('enqueues outcomes in id order within a bounded range', async () => {
    const fetcher = FakeFetcher.fromPages(pagesFor([1, 3]));
    const queue = new BoundedQueue<CrawlOutcome>(8);

    expect(await runProducer({ fetcher, queue, startId: 1, endId: 4, concurrency: 3, isStopped: () => false })).toBe(4);
    queue.end();

    const outcomes: CrawlOutcome[] = [];
    for (let outcome = await queue.get(); outcome; outcome = await queue.get()) {
      outcomes.push(outcome);
    }
    expect(outcomes.map((outcome) => [outcome.id, outcome.kind])).toEqual([
      [1, 'record'],
      [2, 'miss'],
      [3, 'record']
    ]);
  });
});

describe('runCrawl', () => {
  it('persists records and logs each outcome', async () => {
    const fetcher = FakeFetcher.fromPages(pagesFor([1, 3]));
    const store = new MemoryStore();
    const logger = memoryLogger();

    const result = await runCrawl({ count: 3, startId: null, concurrency: 2, missThreshold: 400 }, { fetcher, store, logger });

    expect(result).toEqual({
      processed: 2,
      duplicates: 0,
      misses: 1,
      errors: 0,
      autoStopped: false,
      startId: 1,
      nextId: 4,
      aborted: false
    });
    expect(store.records.map((record) => record.name)).toEqual(['Game 1', 'Game 3']);
    expect(logger.lines).toEqual([
      '[RESUME] start_id=1 mode=3 concurrency=2 miss_threshold=400 known_ids=0',
      '[OK] id=1 name="Game 1"',
      '[SKIP] id=2 reason=not_found streak=1',
      '[OK] id=3 name="Game 3"',
      '[DONE] processed=2 duplicates=0 misses=1 errors=0 next_id=4'
    ]);
  });

  it('resumes from the store when no start id is given', async () => {
    const fetcher = FakeFetcher.fromPages(pagesFor([10]));
    const store = new MemoryStore([2, 9, 5]);

    const result = await runCrawl(
      { count: 1, startId: null, concurrency: 1, missThreshold: 400 },
      { fetcher, store, logger: memoryLogger() }
    );
    expect(fetcher.requested).toEqual([pageUrl(10)]);
    expect(result.startId).toBe(10);
    expect(result.processed).toBe(1);
  });

  it('stops an unbounded run after the miss threshold', async () => {
    const fetcher = FakeFetcher.fromPages({});
    const logger = memoryLogger();

    const result = await runCrawl(
      { count: null, startId: null, concurrency: 1, missThreshold: 3, queueCapacity: 1 },
      { fetcher, store: new MemoryStore(), logger }
    );

    expect(result.autoStopped).toBe(true);
    expect(result.misses).toBeGreaterThanOrEqual(3);
    expect(fetcher.requested.length).toBeLessThanOrEqual(6);
    expect(result.nextId).toBe(fetcher.requested.length + 1);
    expect(logger.lines.filter((line) => line.startsWith('[STOP]'))).toEqual([
      '[STOP] 3 consecutive ids without data, stopping'
    ]);
    expect(logger.lines).toContain('[SKIP] id=3 reason=not_found streak=3/3');
  });

  it('never auto-stops a bounded run', async () => {
    const fetcher = FakeFetcher.fromPages({});

    const result = await runCrawl(
      { count: 5, startId: null, concurrency: 2, missThreshold: 2 },
      { fetcher, store: new MemoryStore(), logger: memoryLogger() }
    );
    expect(result.autoStopped).toBe(false);
    expect(result.misses).toBe(5);
    expect(result.nextId).toBe(6);
    expect(fetcher.requested).toHaveLength(5);
  });

  it('neither counts nor resets the miss streak on a processing error', async () => {
    const fetcher = FakeFetcher.fromPages(pagesFor([2]));
    const logger = memoryLogger();
    const assemble = (html: string, url: string) => {
      if (url.endsWith('/2')) throw new Error('parse exploded');
      return defaultAssembler(html, url);
    };

    const result = await runCrawl(
      { count: null, startId: null, concurrency: 1, missThreshold: 2 },
      { fetcher, store: new MemoryStore(), logger, assemble }
    );

    expect(result.errors).toBe(1);
    expect(result.autoStopped).toBe(true);
    expect(logger.lines).toContain('[ERROR] id=2 Error: parse exploded');
    expect(logger.lines).toContain('[SKIP] id=3 reason=not_found streak=2/2');
  });

  it('rejects with the store error when a record cannot be persisted', async () => {
    class FailingStore extends MemoryStore {
      async append() {
        throw new Error('disk full');
      }
    }
    const fetcher = FakeFetcher.fromPages(pagesFor([1, 2, 3]));

    await expect(
      runCrawl({ count: 3, startId: null, concurrency: 1, missThreshold: 400 }, { fetcher, store: new FailingStore(), logger: memoryLogger() })
    ).rejects.toThrowError('disk full');
  });

  it('does nothing when interrupted before it starts', async () => {
    const fetcher = FakeFetcher.fromPages(pagesFor([1]));
    const logger = memoryLogger();
    const controller = new AbortController();
    controller.abort();

    const result = await runCrawl(
      { count: 3, startId: null, concurrency: 1, missThreshold: 400, signal: controller.signal },
      { fetcher, store: new MemoryStore(), logger }
    );

    expect(fetcher.requested).toEqual([]);
    expect(result.processed).toBe(0);
    expect(result.nextId).toBe(1);
    expect(result.aborted).toBe(true);
    expect(logger.lines).toContain('[ABORT] interrupt received, draining queued results');
  });

  it('keeps the records already queued when interrupted mid-run', async () => {
    const controller = new AbortController();
    const fetcher = new FakeFetcher((url) => {
      const id = Number(url.split('/').pop());
      if (id === 3) {
        controller.abort();
        return { status: 'not_found' };
      }
      return { status: 'html', html: gamePage(`Game ${id}`) };
    });
    const store = new MemoryStore();

    const result = await runCrawl(
      { count: null, startId: null, concurrency: 1, missThreshold: 400, signal: controller.signal },
      { fetcher, store, logger: memoryLogger() }
    );

    expect(result.aborted).toBe(true);
    expect(result.processed).toBe(2);
    expect(result.nextId).toBe(4);
    expect(store.records.map((record) => record.id)).toEqual([1, 2]);
  });
});

describe('runCrawl against a CSV store', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hltb-crawl-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('skips ids that are already stored when a range is crawled twice', async () => {
    const csvPath = path.join(dir, 'dataset.csv');
    const pages = pagesFor([1, 2, 3]);

    const first = new CsvRecordStore(csvPath);
    const firstRun = await runCrawl(
      { count: 3, startId: null, concurrency: 2, missThreshold: 400 },
      { fetcher: FakeFetcher.fromPages(pages), store: first, logger: memoryLogger() }
    );
    await first.close();
    expect(firstRun.processed).toBe(3);

    const second = new CsvRecordStore(csvPath);
    const logger = memoryLogger();
    const secondRun = await runCrawl(
      { count: 3, startId: 1, concurrency: 2, missThreshold: 400 },
      { fetcher: FakeFetcher.fromPages(pages), store: second, logger }
    );
    await second.close();

    expect(secondRun.processed).toBe(0);
    expect(secondRun.duplicates).toBe(3);
    expect(logger.lines).toContain('[DUP] id=1 already stored');
    expect(second.readIds()).toEqual([1, 2, 3]);
  });
});
