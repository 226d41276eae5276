import type { GameRecord } from '../../types/game-record';
import { assembleRecord, buildPageUrl, DEFAULT_URL_TEMPLATE } from '../hltb/assemble';
import type { PageFetcher } from '../hltb/fetcher';
import type { CrawlLogger } from '../logger';
import type { RecordStore, StoredIdSource } from '../store';
import { BoundedQueue, QueueClosedError } from './queue';
import { loadCrawlState, type CrawlState } from './state';

export type MissReason = 'not_found' | 'failed' | 'no_data';

export type CrawlOutcome =
  | { id: number; kind: 'record'; record: GameRecord }
  | { id: number; kind: 'miss'; reason: MissReason }
  | { id: number; kind: 'error'; error: string };

export type Assembler = (html: string, url: string) => GameRecord | null;

export const defaultAssembler: Assembler = (html, url) => assembleRecord(html, url);

export interface ProducerOptions {
  fetcher: PageFetcher;
  queue: BoundedQueue<CrawlOutcome>;
  startId: number;
  endId: number | null;
  concurrency: number;
  isStopped: () => boolean;
  assemble?: Assembler;
  urlTemplate?: string;
  signal?: AbortSignal;
}

/**
 * Walks ids from `startId`, keeping up to `concurrency` of them in flight and
 * enqueuing their outcomes in id order. Resolves with the first id it did not
 * start.
 */
export async function runProducer(options: ProducerOptions): Promise<number> {
  const { fetcher, queue, endId, concurrency, isStopped, signal } = options;
  const assemble = options.assemble ?? defaultAssembler;
  const template = options.urlTemplate ?? DEFAULT_URL_TEMPLATE;
  const inFlight: Array<Promise<CrawlOutcome>> = [];
  let id = options.startId;

  const keepGoing = () => !isStopped() && !signal?.aborted && (endId === null || id < endId);

  try {
    while (keepGoing()) {
      inFlight.push(processIdentifier(id, fetcher, assemble, template, signal));
      id += 1;
      if (inFlight.length >= concurrency) {
        await enqueueNext(inFlight, queue);
      }
      await fetcher.politeSleep(signal);
    }
    while (inFlight.length > 0) {
      await enqueueNext(inFlight, queue);
    }
  } catch (error) {
    if (!(error instanceof QueueClosedError)) throw error;
    await Promise.allSettled(inFlight);
  }
  return id;
}

async function enqueueNext(inFlight: Array<Promise<CrawlOutcome>>, queue: BoundedQueue<CrawlOutcome>) {
  const next = inFlight.shift();
  if (next) {
    await queue.put(await next);
  }
}

async function processIdentifier(
  id: number,
  fetcher: PageFetcher,
  assemble: Assembler,
  template: string,
  signal?: AbortSignal
): Promise<CrawlOutcome> {
  const url = buildPageUrl(id, template);
  try {
    const fetched = await fetcher.fetchPage(url, signal);
    if (fetched.status !== 'html') {
      return { id, kind: 'miss', reason: fetched.status };
    }
    const record = assemble(fetched.html, url);
    return record ? { id, kind: 'record', record } : { id, kind: 'miss', reason: 'no_data' };
  } catch (error) {
    return { id, kind: 'error', error: describeError(error) };
  }
}

export interface ConsumerOptions {
  queue: BoundedQueue<CrawlOutcome>;
  state: CrawlState;
  store: RecordStore;
  logger: CrawlLogger;
  missThreshold: number;
  unbounded: boolean;
}

export interface ConsumerSummary {
  processed: number;
  duplicates: number;
  misses: number;
  errors: number;
  autoStopped: boolean;
}

/** Drains the queue until the end marker, deduplicating and persisting records. */
export async function runConsumer(options: ConsumerOptions): Promise<ConsumerSummary> {
  const { queue, state, store, logger, missThreshold, unbounded } = options;
  const summary: ConsumerSummary = { processed: 0, duplicates: 0, misses: 0, errors: 0, autoStopped: false };

  for (;;) {
    const outcome = await queue.get();
    if (outcome === null) break;

    switch (outcome.kind) {
      case 'error':
        summary.errors += 1;
        logger.error(`[ERROR] id=${outcome.id} ${outcome.error}`);
        break;

      case 'miss': {
        summary.misses += 1;
        state.consecutiveMisses += 1;
        const streak = unbounded ? `${state.consecutiveMisses}/${missThreshold}` : String(state.consecutiveMisses);
        logger.info(`[SKIP] id=${outcome.id} reason=${outcome.reason} streak=${streak}`);
        if (unbounded && state.consecutiveMisses >= missThreshold && !state.stopRequested) {
          state.stopRequested = true;
          summary.autoStopped = true;
          logger.info(`[STOP] ${missThreshold} consecutive ids without data, stopping`);
        }
        break;
      }

      case 'record': {
        state.consecutiveMisses = 0;
        const { record } = outcome;
        if (state.knownIds.has(record.id)) {
          summary.duplicates += 1;
          logger.info(`[DUP] id=${record.id} already stored`);
          break;
        }
        await store.append(record);
        state.knownIds.add(record.id);
        summary.processed += 1;
        logger.info(`[OK] id=${record.id} name=${JSON.stringify(record.name)}`);
        break;
      }
    }
  }

  return summary;
}

export interface CrawlOptions {
  /** Number of ids to attempt; null walks until the miss threshold stops it. */
  count: number | null;
  startId: number | null;
  concurrency: number;
  missThreshold: number;
  queueCapacity?: number;
  urlTemplate?: string;
  signal?: AbortSignal;
}

export interface CrawlDeps {
  fetcher: PageFetcher;
  store: RecordStore & StoredIdSource;
  logger: CrawlLogger;
  assemble?: Assembler;
}

export interface CrawlResult extends ConsumerSummary {
  startId: number;
  nextId: number;
  aborted: boolean;
}

export async function runCrawl(options: CrawlOptions, deps: CrawlDeps): Promise<CrawlResult> {
  const { fetcher, store, logger } = deps;
  const { count, concurrency, missThreshold, signal } = options;
  const state = loadCrawlState(store, options.startId);
  const startId = state.nextId;
  const unbounded = count === null;
  const endId = count === null ? null : startId + Math.max(0, count);
  const queue = new BoundedQueue<CrawlOutcome>(options.queueCapacity ?? concurrency * 8);

  logger.info(
    `[RESUME] start_id=${startId} mode=${count ?? '*'} concurrency=${concurrency} miss_threshold=${missThreshold} known_ids=${state.knownIds.size}`
  );

  const onAbort = () => {
    logger.warn('[ABORT] interrupt received, draining queued results');
    state.stopRequested = true;
    queue.end();
  };
  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  const consumer = runConsumer({ queue, state, store, logger, missThreshold, unbounded }).catch((error: unknown) => {
    state.stopRequested = true;
    queue.end();
    throw error;
  });
  const producer = runProducer({
    fetcher,
    queue,
    startId,
    endId,
    concurrency,
    isStopped: () => state.stopRequested,
    assemble: deps.assemble,
    urlTemplate: options.urlTemplate,
    signal
  }).finally(() => queue.end());

  const [produced, consumed] = await Promise.allSettled([producer, consumer]);
  signal?.removeEventListener('abort', onAbort);
  if (consumed.status === 'rejected') throw consumed.reason;
  if (produced.status === 'rejected') throw produced.reason;

  const result: CrawlResult = {
    ...consumed.value,
    startId,
    nextId: produced.value,
    aborted: signal?.aborted ?? false
  };
  logger.info(
    `[DONE] processed=${result.processed} duplicates=${result.duplicates} misses=${result.misses} errors=${result.errors} next_id=${result.nextId}`
  );
  return result;
}

function describeError(error: unknown) {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
