// =============================================================================
// @feedsieve/worker: Fetch scheduler
// =============================================================================
// One update cycle: list feeds, fetch every enabled feed with at most
// `feed_concurrency` fetches in flight, and persist results in completion
// order as they arrive on the result channel.
//
// Aborting the cycle's signal cancels in-flight requests, keeps queued
// fetches from starting and skips persistence of anything still arriving.
// A trigger that arrives while a cycle runs joins that cycle.
//
// Cycles and single-feed updates draw fetch slots from one Semaphore, so
// feed_concurrency bounds every fetch in flight. A changed limit takes effect
// once no fetch holds a slot. cancel() aborts all of them.
// =============================================================================

import os from "node:os";
import {
  errorMessage,
  parseIntSetting,
  type Feed,
  type Logger,
  type Storage,
} from "@feedsieve/shared";
import { AbortedError, ResultChannel, Semaphore } from "./concurrency.js";
import type { FeedFetcher, FetchResult } from "./fetcher.js";
import type { EntryPersister, SaveSummary } from "./persist.js";
import type { ValidatorCache } from "./validator-cache.js";

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 128;

export type FeedOutcomeStatus = "updated" | "not_modified" | "failed" | "cancelled";

export interface FeedOutcome {
  feedId: string;
  status: FeedOutcomeStatus;
  error?: string;
  save?: SaveSummary;
}

export interface UpdateSummary {
  feeds: number;
  /** Disabled feeds left out of the cycle */
  skipped: number;
  updated: number;
  notModified: number;
  failed: number;
  cancelled: number;
  entriesInserted: number;
  entriesFiltered: number;
  concurrency: number;
  durationMs: number;
}

export interface FeedUpdaterOptions {
  storage: Pick<Storage, "listFeeds" | "markFeedError" | "getSetting">;
  fetcher: Pick<FeedFetcher, "fetch">;
  persister: Pick<EntryPersister, "save">;
  /** Receives a feed's validators only after its result is persisted */
  validatorCache: Pick<ValidatorCache, "set">;
  logger: Logger;
  /** Defaults to os.availableParallelism */
  cpuCount?: () => number;
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}

/** 4 fetches per CPU, between 4 and 32. */
export function defaultConcurrency(cpus: number): number {
  return clamp(cpus * 4, 4, 32);
}

export class FeedUpdater {
  private readonly storage: FeedUpdaterOptions["storage"];
  private readonly fetcher: FeedUpdaterOptions["fetcher"];
  private readonly persister: FeedUpdaterOptions["persister"];
  private readonly validatorCache: FeedUpdaterOptions["validatorCache"];
  private readonly logger: Logger;
  private readonly cpuCount: () => number;
  private current: Promise<UpdateSummary> | null = null;
  private slots: Semaphore | null = null;
  private lifetime = new AbortController();

  constructor(options: FeedUpdaterOptions) {
    this.storage = options.storage;
    this.fetcher = options.fetcher;
    this.persister = options.persister;
    this.validatorCache = options.validatorCache;
    this.logger = options.logger;
    this.cpuCount = options.cpuCount ?? (() => os.availableParallelism());
  }

  get running(): boolean {
    return this.current !== null;
  }

  /**
   * Runs one update cycle, or joins the one already running. A joining
   * caller's signal does not affect the running cycle.
   */
  updateFeeds(signal?: AbortSignal): Promise<UpdateSummary> {
    if (this.current === null) {
      const cycle: Promise<UpdateSummary> = this.runCycle(
        this.withLifetime(signal),
      ).finally(() => {
        if (this.current === cycle) this.current = null;
      });
      this.current = cycle;
    }
    return this.current;
  }

  /**
   * Fetches and persists a single feed. The fetch waits for a slot shared
   * with any running cycle.
   */
  async updateFeed(feed: Feed, signal?: AbortSignal): Promise<FeedOutcome> {
    const combined = this.withLifetime(signal);
    const slots = await this.fetchSlots();
    try {
      const result = await slots.run(() => this.fetcher.fetch(feed, combined), combined);
      return await this.process(result, combined);
    } catch (err) {
      if (err instanceof AbortedError) return { feedId: feed.id, status: "cancelled" };
      throw err;
    }
  }

  /** Aborts the running cycle and every single-feed update in flight. */
  cancel(): void {
    this.lifetime.abort();
    this.lifetime = new AbortController();
  }

  /** feed_concurrency clamped to [1, 128], or the CPU-based default. */
  async concurrencyLimit(): Promise<number> {
    const fallback = defaultConcurrency(this.cpuCount());
    try {
      const value = parseIntSetting(await this.storage.getSetting("feed_concurrency"));
      return value === null ? fallback : clamp(value, MIN_CONCURRENCY, MAX_CONCURRENCY);
    } catch (err) {
      this.logger.warn("Could not read feed_concurrency, using default", {
        error: errorMessage(err),
      });
      return fallback;
    }
  }

  private withLifetime(signal?: AbortSignal): AbortSignal {
    return signal ? AbortSignal.any([signal, this.lifetime.signal]) : this.lifetime.signal;
  }

  /** The shared slot pool, rebuilt for a new limit only while idle. */
  private async fetchSlots(): Promise<Semaphore> {
    const limit = await this.concurrencyLimit();
    const slots = this.slots;
    if (slots !== null) {
      const idle = slots.inUse === 0 && slots.pending === 0;
      if (slots.capacity === limit || !idle) return slots;
    }
    const fresh = new Semaphore(limit);
    this.slots = fresh;
    return fresh;
  }

  // ---------------------------------------------------------------------------
  // Cycle
  // ---------------------------------------------------------------------------

  private async runCycle(signal: AbortSignal): Promise<UpdateSummary> {
    const start = performance.now();
    const feeds = await this.storage.listFeeds();
    const enabled = feeds.filter((f) => f.status !== "disabled");
    const semaphore = await this.fetchSlots();
    const concurrency = semaphore.capacity;

    const summary: UpdateSummary = {
      feeds: enabled.length,
      skipped: feeds.length - enabled.length,
      updated: 0,
      notModified: 0,
      failed: 0,
      cancelled: 0,
      entriesInserted: 0,
      entriesFiltered: 0,
      concurrency,
      durationMs: 0,
    };

    this.logger.info("Feed update started", {
      feeds: summary.feeds,
      skipped: summary.skipped,
      concurrency,
    });

    const results = new ResultChannel<FetchResult>();

    const fetches = enabled.map((feed) =>
      semaphore
        .run(async () => {
          if (signal.aborted) return;
          results.send(await this.fetcher.fetch(feed, signal));
        }, signal)
        .catch((err: unknown) => {
          if (err instanceof AbortedError) return;
          this.logger.error("Fetch task failed", {
            feedId: feed.id,
            url: feed.url,
            error: errorMessage(err),
          });
        }),
    );
    const producers = Promise.all(fetches).then(() => results.close());

    let received = 0;
    for await (const result of results) {
      received++;
      const outcome = await this.process(result, signal);
      switch (outcome.status) {
        case "updated":
          summary.updated++;
          summary.entriesInserted += outcome.save?.inserted ?? 0;
          summary.entriesFiltered += outcome.save?.filtered ?? 0;
          break;
        case "not_modified":
          summary.notModified++;
          break;
        case "failed":
          summary.failed++;
          break;
        case "cancelled":
          summary.cancelled++;
          break;
      }
    }
    await producers;

    // Feeds whose fetch never started
    summary.cancelled += enabled.length - received;
    summary.durationMs = performance.now() - start;

    this.logger.info("Feed update completed", { ...summary });
    return summary;
  }

  private async process(result: FetchResult, signal?: AbortSignal): Promise<FeedOutcome> {
    const { feed } = result;
    if (signal?.aborted) {
      return { feedId: feed.id, status: "cancelled" };
    }

    if (result.error !== null) {
      this.logger.error("Feed fetch failed", {
        feedId: feed.id,
        url: feed.url,
        kind: result.error.kind,
        error: result.error.message,
      });
      try {
        await this.storage.markFeedError(feed.id, result.error.message);
      } catch (err) {
        this.logger.error("Could not record feed error", {
          feedId: feed.id,
          error: errorMessage(err),
        });
      }
      return { feedId: feed.id, status: "failed", error: result.error.message };
    }

    try {
      const save = await this.persister.save(result);
      // A failed parse or save leaves the old validators in place, so the
      // next cycle refetches the full document.
      this.validatorCache.set(feed.id, result.validators);
      return {
        feedId: feed.id,
        status: result.notModified ? "not_modified" : "updated",
        save,
      };
    } catch (err) {
      this.logger.error("Saving feed entries failed", {
        feedId: feed.id,
        url: feed.url,
        error: errorMessage(err),
      });
      return { feedId: feed.id, status: "failed", error: errorMessage(err) };
    }
  }
}
