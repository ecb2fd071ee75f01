import { Semaphore } from '../utils/semaphore';
import { LogScope, ScopedLog, scopedLog } from '../utils/logger';

export interface FetchedPage<T, K> {
  items: T[];
  next?: K | undefined; // follow-up key (cursor style only)
}

// `signal` is set for streamed runs and fires when the consumer stops early.
export type PageFetcher<K, T> = (key: K, signal: AbortSignal | undefined) => Promise<FetchedPage<T, K>>;

export interface PaginatorOptions {
  concurrency: number;
  maxWaves?: number;
  scope?: LogScope;
}

export interface PaginationOutcome<T> {
  items: T[];
  requestedPages: number;
  failedPages: number;
  exhausted: boolean; // false when the wave cap stopped a cursor chain early
}

type PageOutcome<T, K> =
  | { ok: true; key: K; items: T[]; next: K | undefined }
  | { ok: false; key: K };

export const DEFAULT_MAX_WAVES = 50;

/**
 * Fetches the pages after a playlist's first one in waves of
 * `concurrency * 2` requests. Each request holds one permit of a semaphore
 * shared by every pagination run of this instance, so no more than
 * `concurrency` page requests are ever in flight at once.
 *
 * A page that fails is logged and skipped; it never fails the run.
 *
 * The next wave is requested as soon as the current one settles, while the
 * current one is being consumed. Streams abort that wave when abandoned.
 */
export class Paginator {
  readonly concurrency: number;
  readonly maxWaves: number;
  private readonly semaphore: Semaphore;
  private readonly log: ScopedLog;

  constructor(opts: PaginatorOptions) {
    this.concurrency = Math.max(1, Math.floor(opts.concurrency));
    this.maxWaves = Math.max(1, opts.maxWaves ?? DEFAULT_MAX_WAVES);
    this.log = scopedLog(opts.scope ?? 'resolver');
    this.semaphore = new Semaphore(this.concurrency);
  }

  get waveSize(): number {
    return this.concurrency * 2;
  }

  /** Offsets of every page after the first: limit, 2*limit, ... below total. */
  static remainingOffsets(limit: number, total: number, pageLimit?: number): number[] {
    const offsets: number[] = [];
    if (limit <= 0) return offsets;
    for (let offset = limit; offset < total; offset += limit) {
      if (pageLimit !== undefined && offsets.length >= pageLimit) break;
      offsets.push(offset);
    }
    return offsets;
  }

  collectOffsets<T>(offsets: number[], fetch: PageFetcher<number, T>): Promise<PaginationOutcome<T>> {
    return this.collect(offsets, fetch, Number.POSITIVE_INFINITY);
  }

  collectCursors<T>(first: string | undefined, fetch: PageFetcher<string, T>): Promise<PaginationOutcome<T>> {
    return this.collect(first ? [first] : [], fetch, this.maxWaves);
  }

  streamOffsets<T>(offsets: number[], fetch: PageFetcher<number, T>, batchSize: number): AsyncGenerator<T[]> {
    return this.stream(offsets, fetch, Number.POSITIVE_INFINITY, batchSize);
  }

  streamCursors<T>(first: string | undefined, fetch: PageFetcher<string, T>, batchSize: number): AsyncGenerator<T[]> {
    return this.stream(first ? [first] : [], fetch, this.maxWaves, batchSize);
  }

  private async collect<K, T>(seed: K[], fetch: PageFetcher<K, T>, maxWaves: number): Promise<PaginationOutcome<T>> {
    const outcome: PaginationOutcome<T> = { items: [], requestedPages: 0, failedPages: 0, exhausted: true };

    for await (const wave of this.waves(seed, fetch, maxWaves, outcome)) {
      // appended in submission order, one wave at a time
      for (const page of wave) {
        if (page.ok) outcome.items.push(...page.items);
      }
    }

    this.log.info('pagination_finished', {
      requestedPages: outcome.requestedPages,
      failedPages: outcome.failedPages,
      items: outcome.items.length,
      exhausted: outcome.exhausted,
    });
    return outcome;
  }

  private async *stream<K, T>(
    seed: K[],
    fetch: PageFetcher<K, T>,
    maxWaves: number,
    batchSize: number
  ): AsyncGenerator<T[]> {
    const size = Math.max(1, Math.floor(batchSize));
    const controller = new AbortController();
    const outcome: PaginationOutcome<T> = { items: [], requestedPages: 0, failedPages: 0, exhausted: true };
    try {
      for await (const wave of this.waves(seed, fetch, maxWaves, outcome, controller.signal)) {
        for (const page of wave) {
          if (!page.ok) continue;
          for (let i = 0; i < page.items.length; i += size) {
            yield page.items.slice(i, i + size);
          }
        }
      }
    } finally {
      // also reached when the consumer stops early: cancels the wave already in flight
      controller.abort();
      this.log.debug('pagination_stream_closed', {
        requestedPages: outcome.requestedPages,
        failedPages: outcome.failedPages,
      });
    }
  }

  private async *waves<K, T>(
    seed: K[],
    fetch: PageFetcher<K, T>,
    maxWaves: number,
    outcome: PaginationOutcome<T>,
    signal?: AbortSignal
  ): AsyncGenerator<Array<PageOutcome<T, K>>> {
    const pending = [...seed];
    let launched = 0;

    const launch = (): Promise<Array<PageOutcome<T, K>>> | undefined => {
      if (pending.length === 0 || launched >= maxWaves || signal?.aborted) return undefined;
      launched += 1;
      const keys = pending.splice(0, this.waveSize);
      outcome.requestedPages += keys.length;
      return Promise.all(keys.map((key) => this.fetchPage(key, fetch, signal)));
    };

    let wave = launch();
    while (wave) {
      const results = await wave;
      for (const result of results) {
        if (!result.ok) {
          outcome.failedPages += 1;
        } else if (result.next !== undefined) {
          pending.push(result.next);
        }
      }
      wave = launch();
      yield results;
    }

    if (pending.length > 0 && !signal?.aborted) {
      outcome.exhausted = false;
      this.log.warn('pagination_wave_cap_reached', { maxWaves, pending: pending.length });
    }
  }

  private async fetchPage<K, T>(
    key: K,
    fetch: PageFetcher<K, T>,
    signal: AbortSignal | undefined
  ): Promise<PageOutcome<T, K>> {
    const release = await this.semaphore.acquire();
    try {
      if (signal?.aborted) return { ok: false, key };
      const page = await fetch(key, signal);
      return { ok: true, key, items: page.items, next: page.next };
    } catch (error) {
      if (signal?.aborted) {
        this.log.debug('page_cancelled', { page: String(key) });
      } else {
        this.log.warn('page_skipped', {
          page: String(key),
          reason: error instanceof Error ? error.message : String(error),
        });
      }
      return { ok: false, key };
    } finally {
      release();
    }
  }
}
