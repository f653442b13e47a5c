// =============================================================================
// @feedsieve/shared: Storage contract
// =============================================================================
// The update pipeline never talks to a database directly. It receives a
// `Storage` at construction; `Neo4jStore` implements it for production and
// `MemoryStore` for tests and local runs. `AdminStorage` adds the
// management operations the MCP tools need.
// =============================================================================

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
} from "./types.js";

/** Counts reported by an entry upsert. */
export interface UpsertResult {
  inserted: number;
  updated: number;
  /** URL already stored with a publishedAt at least as new */
  unchanged: number;
}

/** Writes that must commit or roll back together for one feed. */
export interface EntryWriter {
  updateFeedMeta(feedId: string, meta: FeedMetaUpdate): Promise<void>;
  /**
   * Inserts entries keyed by URL. On conflict the stored entry is replaced
   * only when the incoming publishedAt is strictly newer.
   */
  upsertEntries(feedId: string, entries: Entry[]): Promise<UpsertResult>;
  /** Deletes all but the `keep` most recent entries of the feed. */
  trimEntries(feedId: string, keep: number): Promise<number>;
}

export interface Storage {
  listFeeds(): Promise<Feed[]>;
  /** Newest stored publishedAt for the feed, or null when it has none. */
  getEntryWatermark(feedId: string): Promise<Date | null>;
  getFeedValidators(feedId: string): Promise<Validators>;
  /** Metadata write outside a transaction (fetch yielded nothing to store). */
  updateFeedMeta(feedId: string, meta: FeedMetaUpdate): Promise<void>;
  /** Sets status "error", increments errorCount and records the message. */
  markFeedError(feedId: string, message: string): Promise<void>;
  /** Runs `fn` in one transaction; a rejection rolls every write back. */
  withTransaction<T>(fn: (tx: EntryWriter) => Promise<T>): Promise<T>;
  /** Active groups ordered by priority then name, rules joined and ordered. */
  getActiveFilterGroups(): Promise<FilterGroup[]>;
  /** Raw setting value, or null when the key is not set. */
  getSetting(key: string): Promise<string | null>;
}

export interface AdminStorage extends Storage {
  createFeed(feed: NewFeed): Promise<Feed>;
  getFeed(id: string): Promise<Feed | null>;
  getFeedByUrl(url: string): Promise<Feed | null>;
  /** Deletes the feed and its entries. Returns false when it did not exist. */
  deleteFeed(id: string): Promise<boolean>;
  setFeedStatus(id: string, status: FeedStatus): Promise<boolean>;
  updateFeedTaxonomy(
    id: string,
    update: { title?: string; category?: string; tags?: string[] },
  ): Promise<Feed | null>;
  listRecentEntries(opts: {
    feedId?: string;
    limit: number;
  }): Promise<StoredEntry[]>;

  listFilters(): Promise<EntryFilter[]>;
  getFilter(id: string): Promise<EntryFilter | null>;
  createFilter(input: EntryFilterInput): Promise<EntryFilter>;
  updateFilter(
    id: string,
    input: EntryFilterInput,
  ): Promise<EntryFilter | null>;
  deleteFilter(id: string): Promise<boolean>;

  listFilterGroups(): Promise<FilterGroup[]>;
  getFilterGroup(id: string): Promise<FilterGroup | null>;
  createFilterGroup(input: FilterGroupInput): Promise<FilterGroup>;
  updateFilterGroup(
    id: string,
    input: FilterGroupInput,
  ): Promise<FilterGroup | null>;
  deleteFilterGroup(id: string): Promise<boolean>;
  /** Replaces the group's rule list. Returns false when the group is missing. */
  setGroupRules(
    groupId: string,
    rules: FilterGroupRuleInput[],
  ): Promise<boolean>;

  listSettings(): Promise<Setting[]>;
  setSetting(key: string, value: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Setting helpers
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_POSTS = 33;
export const DEFAULT_UPDATE_INTERVAL_SECONDS = 900;
export const MIN_UPDATE_INTERVAL_SECONDS = 60;

/** Defaults written by ensureSchema when a key is absent. */
export const DEFAULT_SETTINGS: Readonly<Record<string, string>> = {
  max_posts: String(DEFAULT_MAX_POSTS),
  update_interval: String(DEFAULT_UPDATE_INTERVAL_SECONDS),
};

/** Parses a base-10 integer setting, or null when it is not one. */
export function parseIntSetting(raw: string | null): number | null {
  if (raw === null) return null;
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}
