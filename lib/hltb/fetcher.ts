import { setTimeout as delay } from 'node:timers/promises';
import pLimit, { type LimitFunction } from 'p-limit';
import { Agent, fetch, type Dispatcher } from 'undici';
import { silentLogger, type CrawlLogger } from '../logger';

export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36';

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export type FetchOutcome =
  | { status: 'html'; html: string }
  | { status: 'not_found' }
  | { status: 'failed'; reason: string };

type AttemptResult = FetchOutcome | { status: 'retry' };

export interface PageFetcher {
  fetchPage(url: string, signal?: AbortSignal): Promise<FetchOutcome>;
  politeSleep(signal?: AbortSignal): Promise<void>;
}

export interface RetryingFetcherOptions {
  concurrency?: number;
  maxAttempts?: number;
  timeoutMs?: number;
  baseBackoffMs?: number;
  backoffFactor?: number;
  backoffJitterMs?: number;
  politeDelayMs?: number;
  politeJitterMs?: number;
  userAgent?: string;
  random?: () => number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryingFetcherDeps {
  dispatcher?: Dispatcher;
  logger?: CrawlLogger;
  /** Waits out backoff and politeness delays; resolves early on abort. */
  sleep?: Sleep;
}

export class RetryingFetcher implements PageFetcher {
  private readonly options: Required<RetryingFetcherOptions>;
  private readonly limit: LimitFunction;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly logger: CrawlLogger;
  private readonly sleep: Sleep;

  constructor(options: RetryingFetcherOptions = {}, deps: RetryingFetcherDeps = {}) {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 8));
    this.options = {
      concurrency,
      maxAttempts: options.maxAttempts ?? 5,
      timeoutMs: options.timeoutMs ?? 30_000,
      baseBackoffMs: options.baseBackoffMs ?? 600,
      backoffFactor: options.backoffFactor ?? 1.7,
      backoffJitterMs: options.backoffJitterMs ?? 400,
      politeDelayMs: options.politeDelayMs ?? 250,
      politeJitterMs: options.politeJitterMs ?? 350,
      userAgent: options.userAgent ?? USER_AGENT,
      random: options.random ?? Math.random
    };
    this.limit = pLimit(concurrency);
    this.ownsDispatcher = deps.dispatcher === undefined;
    this.dispatcher = deps.dispatcher ?? new Agent({ connections: concurrency * 4 });
    this.logger = deps.logger ?? silentLogger;
    this.sleep = deps.sleep ?? pause;
  }

  get activeCount() {
    return this.limit.activeCount;
  }

  async fetchPage(url: string, signal?: AbortSignal): Promise<FetchOutcome> {
    const { maxAttempts, backoffFactor, backoffJitterMs, random } = this.options;
    let backoff = this.options.baseBackoffMs;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (signal?.aborted) return { status: 'failed', reason: 'aborted' };
      const result = await this.limit(() => this.attemptWithinPermit(url, attempt, signal));
      if (result.status !== 'retry') return result;
      if (attempt < maxAttempts) {
        await this.sleep(backoff + random() * backoffJitterMs, signal);
        backoff *= backoffFactor;
      }
    }

    return { status: 'failed', reason: `gave up after ${maxAttempts} attempts` };
  }

  async politeSleep(signal?: AbortSignal) {
    const { politeDelayMs, politeJitterMs, random } = this.options;
    await this.sleep(politeDelayMs + random() * politeJitterMs, signal);
  }

  async close() {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async attemptWithinPermit(url: string, attempt: number, signal?: AbortSignal): Promise<AttemptResult> {
    try {
      return await this.request(url, attempt, signal);
    } finally {
      await this.politeSleep(signal);
    }
  }

  private async request(url: string, attempt: number, signal?: AbortSignal): Promise<AttemptResult> {
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          'user-agent': this.options.userAgent,
          'accept-language': 'en-US,en;q=0.9',
          accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8'
        },
        signal: controller.signal,
        dispatcher: this.dispatcher
      });
      const body = await response.text();

      if (response.status === 404) return { status: 'not_found' };
      if (response.status === 200 && body) return { status: 'html', html: body };

      if (RETRYABLE_STATUSES.has(response.status)) {
        this.warn(url, `retryable status ${response.status}, attempt ${attempt}`);
      } else if (response.status === 200) {
        this.warn(url, `empty body, attempt ${attempt}`);
      } else {
        this.warn(url, `bad status ${response.status}, attempt ${attempt}`);
      }
      return { status: 'retry' };
    } catch (error) {
      if (signal?.aborted) return { status: 'failed', reason: 'aborted' };
      if (controller.signal.aborted) {
        this.warn(url, `timeout after ${this.options.timeoutMs}ms, attempt ${attempt}`);
      } else {
        this.warn(url, `transport error ${describeError(error)}, attempt ${attempt}`);
      }
      return { status: 'retry' };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private warn(url: string, detail: string) {
    this.logger.warn(`[WARN] ${url} ${detail}`);
  }
}

async function pause(ms: number, signal?: AbortSignal) {
  if (ms <= 0 || signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
}

function describeError(error: unknown) {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.name}: ${error.message}${cause}`;
  }
  return String(error);
}
