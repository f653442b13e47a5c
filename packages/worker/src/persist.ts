// =============================================================================
// @feedsieve/worker: Persistence step
// =============================================================================
// Filters a fetch result's items, then writes what survives:
//   - nothing survives: lastFetched, validators and title only;
//   - otherwise one transaction: feed metadata, entry upserts (newer wins on
//     URL conflict) and a trim to the max_posts most recent entries.
// A failed transaction rolls back that feed only and raises PersistenceError.
// =============================================================================

import {
  DEFAULT_MAX_POSTS,
  PersistenceError,
  errorMessage,
  parseIntSetting,
  type Entry,
  type FeedMetaUpdate,
  type Logger,
  type Storage,
} from "@feedsieve/shared";
import type { FilterEngine } from "./filter-engine.js";
import type { FetchResult } from "./fetcher.js";

export interface SaveSummary {
  feedId: string;
  /** Items dropped by a discard decision */
  filtered: number;
  inserted: number;
  updated: number;
  unchanged: number;
  trimmed: number;
}

export interface EntryPersisterOptions {
  storage: Pick<Storage, "withTransaction" | "updateFeedMeta" | "getSetting">;
  filterEngine: Pick<FilterEngine, "filterEntry">;
  logger: Logger;
}

export class EntryPersister {
  private readonly storage: EntryPersisterOptions["storage"];
  private readonly filterEngine: EntryPersisterOptions["filterEngine"];
  private readonly logger: Logger;

  constructor(options: EntryPersisterOptions) {
    this.storage = options.storage;
    this.filterEngine = options.filterEngine;
    this.logger = options.logger;
  }

  async save(result: FetchResult): Promise<SaveSummary> {
    const { feed } = result;
    const log = this.logger.child({ feedId: feed.id, url: feed.url });

    const survivors = await this.applyFilters(result.items, feed.category, feed.tags, log);
    const summary: SaveSummary = {
      feedId: feed.id,
      filtered: result.items.length - survivors.length,
      inserted: 0,
      updated: 0,
      unchanged: 0,
      trimmed: 0,
    };
    if (summary.filtered > 0) {
      log.info("Entries filtered out", {
        filtered: summary.filtered,
        total: result.items.length,
      });
    }

    const meta: FeedMetaUpdate = {
      title: result.title,
      validators: result.validators,
      fetchedAt: new Date(),
    };

    if (survivors.length === 0) {
      try {
        await this.storage.updateFeedMeta(feed.id, meta);
      } catch (err) {
        throw new PersistenceError(
          `error updating feed ${feed.id}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
      return summary;
    }

    const maxPosts = await this.maxPosts(log);

    try {
      await this.storage.withTransaction(async (tx) => {
        await tx.updateFeedMeta(feed.id, meta);
        const counts = await tx.upsertEntries(feed.id, survivors);
        summary.inserted = counts.inserted;
        summary.updated = counts.updated;
        summary.unchanged = counts.unchanged;
        summary.trimmed = await tx.trimEntries(feed.id, maxPosts);
      });
    } catch (err) {
      throw new PersistenceError(
        `error saving entries for feed ${feed.id}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    log.info("Entries saved", { ...summary });
    return summary;
  }

  private async applyFilters(
    items: Entry[],
    category: string,
    tags: string[],
    log: Logger,
  ): Promise<Entry[]> {
    const kept: Entry[] = [];
    for (const item of items) {
      try {
        const decision = await this.filterEngine.filterEntry(item, category, tags);
        if (decision === "keep") kept.push(item);
        else log.debug("Entry filtered out", { title: item.title, entryUrl: item.url });
      } catch (err) {
        log.warn("Filtering failed, keeping entry", {
          title: item.title,
          error: errorMessage(err),
        });
        kept.push(item);
      }
    }
    return kept;
  }

  /** The max_posts setting; values below 1 or unreadable fall back to the default. */
  private async maxPosts(log: Logger): Promise<number> {
    try {
      const value = parseIntSetting(await this.storage.getSetting("max_posts"));
      return value !== null && value >= 1 ? value : DEFAULT_MAX_POSTS;
    } catch (err) {
      log.warn("Could not read max_posts, using default", {
        error: errorMessage(err),
      });
      return DEFAULT_MAX_POSTS;
    }
  }
}
