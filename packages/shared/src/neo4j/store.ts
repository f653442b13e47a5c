// =============================================================================
// @feedsieve/shared: Neo4j-backed Storage
// =============================================================================
// Opens one session per operation and closes it afterwards. Transactional
// work goes through session.executeWrite(), which retries the callback on
// transient cluster errors; the entry writes are idempotent so a retry is
// safe.
// =============================================================================

import type { Driver, ManagedTransaction, Session } from "./driver.js";
import * as feeds from "./feeds.js";
import * as entries from "./entries.js";
import * as filters from "./filters.js";
import * as settings from "./settings.js";
import type { AdminStorage, EntryWriter, UpsertResult } from "../storage.js";
import type {
  Entry,
  EntryFilter,
  EntryFilterInput,
  Feed,
  FeedMetaUpdate,
  FeedStatus,
  FilterGroup,
  FilterGroupInput,
  FilterGroupRuleInput,
  NewFeed,
  Setting,
  StoredEntry,
  Validators,
} from "../types.js";

class TransactionWriter implements EntryWriter {
  constructor(private readonly tx: ManagedTransaction) {}

  updateFeedMeta(feedId: string, meta: FeedMetaUpdate): Promise<void> {
    return feeds.updateFeedMetaTx(this.tx, feedId, meta);
  }

  upsertEntries(feedId: string, items: Entry[]): Promise<UpsertResult> {
    return entries.upsertEntriesTx(this.tx, feedId, items);
  }

  trimEntries(feedId: string, keep: number): Promise<number> {
    return entries.trimEntriesTx(this.tx, feedId, keep);
  }
}

export class Neo4jStore implements AdminStorage {
  constructor(private readonly driver: Driver) {}

  /** Run `fn` inside a session that is always closed afterwards. */
  private async withSession<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    const session = this.driver.session();
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  // --- Storage ---

  listFeeds(): Promise<Feed[]> {
    return this.withSession((s) => feeds.listFeeds(s));
  }

  getEntryWatermark(feedId: string): Promise<Date | null> {
    return this.withSession((s) => entries.getEntryWatermark(s, feedId));
  }

  getFeedValidators(feedId: string): Promise<Validators> {
    return this.withSession((s) => feeds.getFeedValidators(s, feedId));
  }

  updateFeedMeta(feedId: string, meta: FeedMetaUpdate): Promise<void> {
    return this.withSession((s) => feeds.updateFeedMeta(s, feedId, meta));
  }

  markFeedError(feedId: string, message: string): Promise<void> {
    return this.withSession((s) => feeds.markFeedError(s, feedId, message));
  }

  withTransaction<T>(fn: (tx: EntryWriter) => Promise<T>): Promise<T> {
    return this.withSession((s) =>
      s.executeWrite((tx) => fn(new TransactionWriter(tx))),
    );
  }

  getActiveFilterGroups(): Promise<FilterGroup[]> {
    return this.withSession((s) => filters.getActiveFilterGroups(s));
  }

  getSetting(key: string): Promise<string | null> {
    return this.withSession((s) => settings.getSetting(s, key));
  }

  // --- Feeds ---

  createFeed(feed: NewFeed): Promise<Feed> {
    return this.withSession((s) => feeds.createFeed(s, feed));
  }

  getFeed(id: string): Promise<Feed | null> {
    return this.withSession((s) => feeds.getFeed(s, { id }));
  }

  getFeedByUrl(url: string): Promise<Feed | null> {
    return this.withSession((s) => feeds.getFeed(s, { url }));
  }

  deleteFeed(id: string): Promise<boolean> {
    return this.withSession((s) => feeds.deleteFeed(s, id));
  }

  setFeedStatus(id: string, status: FeedStatus): Promise<boolean> {
    return this.withSession((s) => feeds.setFeedStatus(s, id, status));
  }

  updateFeedTaxonomy(
    id: string,
    update: { title?: string; category?: string; tags?: string[] },
  ): Promise<Feed | null> {
    return this.withSession((s) => feeds.updateFeedTaxonomy(s, id, update));
  }

  listRecentEntries(opts: {
    feedId?: string;
    limit: number;
  }): Promise<StoredEntry[]> {
    return this.withSession((s) => entries.listRecentEntries(s, opts));
  }

  // --- Filters ---

  listFilters(): Promise<EntryFilter[]> {
    return this.withSession((s) => filters.listFilters(s));
  }

  getFilter(id: string): Promise<EntryFilter | null> {
    return this.withSession((s) => filters.getFilter(s, id));
  }

  createFilter(input: EntryFilterInput): Promise<EntryFilter> {
    return this.withSession((s) => filters.createFilter(s, input));
  }

  updateFilter(
    id: string,
    input: EntryFilterInput,
  ): Promise<EntryFilter | null> {
    return this.withSession((s) => filters.updateFilter(s, id, input));
  }

  deleteFilter(id: string): Promise<boolean> {
    return this.withSession((s) => filters.deleteFilter(s, id));
  }

  listFilterGroups(): Promise<FilterGroup[]> {
    return this.withSession((s) => filters.listFilterGroups(s));
  }

  getFilterGroup(id: string): Promise<FilterGroup | null> {
    return this.withSession((s) => filters.getFilterGroup(s, id));
  }

  createFilterGroup(input: FilterGroupInput): Promise<FilterGroup> {
    return this.withSession((s) => filters.createFilterGroup(s, input));
  }

  updateFilterGroup(
    id: string,
    input: FilterGroupInput,
  ): Promise<FilterGroup | null> {
    return this.withSession((s) => filters.updateFilterGroup(s, id, input));
  }

  deleteFilterGroup(id: string): Promise<boolean> {
    return this.withSession((s) => filters.deleteFilterGroup(s, id));
  }

  setGroupRules(
    groupId: string,
    rules: FilterGroupRuleInput[],
  ): Promise<boolean> {
    return this.withSession((s) => filters.setGroupRules(s, groupId, rules));
  }

  // --- Settings ---

  listSettings(): Promise<Setting[]> {
    return this.withSession((s) => settings.listSettings(s));
  }

  setSetting(key: string, value: string): Promise<void> {
    return this.withSession((s) => settings.setSetting(s, key, value));
  }
}
