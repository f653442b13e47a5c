// =============================================================================
// @feedsieve/shared: In-process Storage
// =============================================================================
// Keeps every entity in Maps and mirrors the Neo4j store's semantics:
// URL-unique entries with newer-wins upserts, retention trims ordered by
// publishedAt, validators that empty values never overwrite, and filter
// rules joined to their filters at read time. withTransaction() journals the
// prior state of each feed and entry it touches and restores only those rows
// when the callback rejects, so concurrent transactions keep their commits.
// =============================================================================

import crypto from "node:crypto";
import type { AdminStorage, EntryWriter, UpsertResult } from "./storage.js";
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

interface StoredGroup extends Omit<FilterGroup, "rules"> {
  rules: FilterGroupRuleInput[];
}

function blankToNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function cloneFeed(feed: Feed): Feed {
  return { ...feed, tags: [...feed.tags] };
}

function cloneEntry(entry: StoredEntry): StoredEntry {
  return { ...entry, publishedAt: new Date(entry.publishedAt.getTime()) };
}

/** Newest first; ties broken by insertion order, newest first. */
function byRecency(a: StoredEntry, b: StoredEntry): number {
  const diff = b.publishedAt.getTime() - a.publishedAt.getTime();
  if (diff !== 0) return diff;
  return b.createdAt.localeCompare(a.createdAt);
}

/** Prior state of the rows one transaction touched; null marks a row it created. */
export class UndoLog {
  private readonly feeds = new Map<string, Feed | null>();
  private readonly entries = new Map<string, StoredEntry | null>();

  feed(id: string, current: Feed | undefined): void {
    if (!this.feeds.has(id)) this.feeds.set(id, current ? cloneFeed(current) : null);
  }

  entry(url: string, current: StoredEntry | undefined): void {
    if (!this.entries.has(url)) {
      this.entries.set(url, current ? cloneEntry(current) : null);
    }
  }

  restore(feeds: Map<string, Feed>, entries: Map<string, StoredEntry>): void {
    for (const [id, prior] of this.feeds) {
      if (prior === null) feeds.delete(id);
      else feeds.set(id, prior);
    }
    for (const [url, prior] of this.entries) {
      if (prior === null) entries.delete(url);
      else entries.set(url, prior);
    }
  }
}

export class MemoryStore implements AdminStorage {
  protected feeds = new Map<string, Feed>();
  /** Keyed by entry URL */
  protected entries = new Map<string, StoredEntry>();
  protected filters = new Map<string, EntryFilter>();
  protected groups = new Map<string, StoredGroup>();
  protected settings = new Map<string, string>();
  private sequence = 0;

  constructor(seed?: { settings?: Record<string, string> }) {
    for (const [key, value] of Object.entries(seed?.settings ?? {})) {
      this.settings.set(key, value);
    }
  }

  /** Monotonic timestamp so entries created in one tick still order. */
  private stamp(): string {
    this.sequence++;
    return `${new Date().toISOString()}#${String(this.sequence).padStart(8, "0")}`;
  }

  // -------------------------------------------------------------------------
  // Write primitives (shared by transactional and direct paths)
  // -------------------------------------------------------------------------

  protected applyFeedMeta(
    feedId: string,
    meta: FeedMetaUpdate,
    undo?: UndoLog,
  ): void {
    const feed = this.feeds.get(feedId);
    if (!feed) return;
    undo?.feed(feedId, feed);

    const title = blankToNull(meta.title);
    feed.lastFetched = meta.fetchedAt.toISOString();
    feed.lastModified =
      blankToNull(meta.validators.lastModified) ?? feed.lastModified;
    feed.etag = blankToNull(meta.validators.etag) ?? feed.etag;
    if (title !== null && !feed.titleManuallyEdited) {
      feed.title = title;
    }
    if (feed.status !== "disabled") feed.status = "active";
    feed.errorCount = 0;
    feed.lastError = null;
  }

  protected applyUpsert(
    feedId: string,
    items: Entry[],
    undo?: UndoLog,
  ): UpsertResult {
    const counts: UpsertResult = { inserted: 0, updated: 0, unchanged: 0 };
    if (!this.feeds.has(feedId)) return counts;

    for (const item of items) {
      const existing = this.entries.get(item.url);
      if (!existing) {
        undo?.entry(item.url, undefined);
        this.entries.set(item.url, {
          id: crypto.randomUUID(),
          feedId,
          title: item.title,
          url: item.url,
          content: item.content,
          guid: item.guid,
          publishedAt: new Date(item.publishedAt.getTime()),
          faviconUrl: item.faviconUrl,
          createdAt: this.stamp(),
        });
        counts.inserted++;
      } else if (item.publishedAt.getTime() > existing.publishedAt.getTime()) {
        undo?.entry(item.url, existing);
        existing.title = item.title;
        existing.content = item.content;
        existing.publishedAt = new Date(item.publishedAt.getTime());
        counts.updated++;
      } else {
        counts.unchanged++;
      }
    }

    return counts;
  }

  protected applyTrim(feedId: string, keep: number, undo?: UndoLog): number {
    const owned = [...this.entries.values()]
      .filter((e) => e.feedId === feedId)
      .sort(byRecency);

    const stale = owned.slice(Math.max(keep, 0));
    for (const entry of stale) {
      undo?.entry(entry.url, entry);
      this.entries.delete(entry.url);
    }
    return stale.length;
  }

  // -------------------------------------------------------------------------
  // Storage
  // -------------------------------------------------------------------------

  async listFeeds(): Promise<Feed[]> {
    return [...this.feeds.values()].map(cloneFeed);
  }

  async getEntryWatermark(feedId: string): Promise<Date | null> {
    let newest: number | null = null;
    for (const entry of this.entries.values()) {
      if (entry.feedId !== feedId) continue;
      const t = entry.publishedAt.getTime();
      if (newest === null || t > newest) newest = t;
    }
    return newest === null ? null : new Date(newest);
  }

  async getFeedValidators(feedId: string): Promise<Validators> {
    const feed = this.feeds.get(feedId);
    return {
      lastModified: feed?.lastModified ?? null,
      etag: feed?.etag ?? null,
    };
  }

  async updateFeedMeta(feedId: string, meta: FeedMetaUpdate): Promise<void> {
    this.applyFeedMeta(feedId, meta);
  }

  async markFeedError(feedId: string, message: string): Promise<void> {
    const feed = this.feeds.get(feedId);
    if (!feed) return;
    if (feed.status !== "disabled") feed.status = "error";
    feed.errorCount++;
    feed.lastError = message;
  }

  async withTransaction<T>(fn: (tx: EntryWriter) => Promise<T>): Promise<T> {
    const undo = new UndoLog();
    const writer: EntryWriter = {
      updateFeedMeta: async (feedId, meta) => this.applyFeedMeta(feedId, meta, undo),
      upsertEntries: async (feedId, items) => this.applyUpsert(feedId, items, undo),
      trimEntries: async (feedId, keep) => this.applyTrim(feedId, keep, undo),
    };

    try {
      return await fn(writer);
    } catch (err) {
      undo.restore(this.feeds, this.entries);
      throw err;
    }
  }

  async getActiveFilterGroups(): Promise<FilterGroup[]> {
    return (await this.listFilterGroups()).filter((g) => g.isActive);
  }

  async getSetting(key: string): Promise<string | null> {
    return this.settings.get(key) ?? null;
  }

  // -------------------------------------------------------------------------
  // Feeds
  // -------------------------------------------------------------------------

  async createFeed(input: NewFeed): Promise<Feed> {
    for (const feed of this.feeds.values()) {
      if (feed.url === input.url) {
        throw new Error(`Feed already exists: ${input.url}`);
      }
    }

    const feed: Feed = {
      id: crypto.randomUUID(),
      url: input.url,
      title: input.title,
      titleManuallyEdited: false,
      status: "active",
      errorCount: 0,
      lastError: null,
      lastFetched: null,
      lastModified: null,
      etag: null,
      category: input.category ?? "",
      tags: [...(input.tags ?? [])],
    };
    this.feeds.set(feed.id, feed);
    return cloneFeed(feed);
  }

  async getFeed(id: string): Promise<Feed | null> {
    const feed = this.feeds.get(id);
    return feed ? cloneFeed(feed) : null;
  }

  async getFeedByUrl(url: string): Promise<Feed | null> {
    for (const feed of this.feeds.values()) {
      if (feed.url === url) return cloneFeed(feed);
    }
    return null;
  }

  async deleteFeed(id: string): Promise<boolean> {
    if (!this.feeds.delete(id)) return false;
    for (const [url, entry] of this.entries) {
      if (entry.feedId === id) this.entries.delete(url);
    }
    return true;
  }

  async setFeedStatus(id: string, status: FeedStatus): Promise<boolean> {
    const feed = this.feeds.get(id);
    if (!feed) return false;
    feed.status = status;
    if (status !== "error") {
      feed.errorCount = 0;
      feed.lastError = null;
    }
    return true;
  }

  async updateFeedTaxonomy(
    id: string,
    update: { title?: string; category?: string; tags?: string[] },
  ): Promise<Feed | null> {
    const feed = this.feeds.get(id);
    if (!feed) return null;
    if (update.title !== undefined) {
      feed.title = update.title;
      feed.titleManuallyEdited = true;
    }
    if (update.category !== undefined) feed.category = update.category;
    if (update.tags !== undefined) feed.tags = [...update.tags];
    return cloneFeed(feed);
  }

  async listRecentEntries(opts: {
    feedId?: string;
    limit: number;
  }): Promise<StoredEntry[]> {
    return [...this.entries.values()]
      .filter((e) => opts.feedId === undefined || e.feedId === opts.feedId)
      .sort(byRecency)
      .slice(0, opts.limit)
      .map(cloneEntry);
  }

  // -------------------------------------------------------------------------
  // Filters
  // -------------------------------------------------------------------------

  async listFilters(): Promise<EntryFilter[]> {
    return [...this.filters.values()]
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((f) => ({ ...f }));
  }

  async getFilter(id: string): Promise<EntryFilter | null> {
    const filter = this.filters.get(id);
    return filter ? { ...filter } : null;
  }

  async createFilter(input: EntryFilterInput): Promise<EntryFilter> {
    const now = new Date().toISOString();
    const filter: EntryFilter = {
      id: crypto.randomUUID(),
      ...input,
      createdAt: now,
      updatedAt: now,
    };
    this.filters.set(filter.id, filter);
    return { ...filter };
  }

  async updateFilter(
    id: string,
    input: EntryFilterInput,
  ): Promise<EntryFilter | null> {
    const existing = this.filters.get(id);
    if (!existing) return null;
    const updated: EntryFilter = {
      ...existing,
      ...input,
      updatedAt: new Date().toISOString(),
    };
    this.filters.set(id, updated);
    return { ...updated };
  }

  async deleteFilter(id: string): Promise<boolean> {
    return this.filters.delete(id);
  }

  async listFilterGroups(): Promise<FilterGroup[]> {
    return [...this.groups.values()]
      .sort((a, b) => a.priority - b.priority || a.name.localeCompare(b.name))
      .map((group) => this.joinRules(group));
  }

  async getFilterGroup(id: string): Promise<FilterGroup | null> {
    const group = this.groups.get(id);
    return group ? this.joinRules(group) : null;
  }

  async createFilterGroup(input: FilterGroupInput): Promise<FilterGroup> {
    const now = new Date().toISOString();
    const group: StoredGroup = {
      id: crypto.randomUUID(),
      ...input,
      rules: [],
      createdAt: now,
      updatedAt: now,
    };
    this.groups.set(group.id, group);
    return this.joinRules(group);
  }

  async updateFilterGroup(
    id: string,
    input: FilterGroupInput,
  ): Promise<FilterGroup | null> {
    const existing = this.groups.get(id);
    if (!existing) return null;
    const updated: StoredGroup = {
      ...existing,
      ...input,
      updatedAt: new Date().toISOString(),
    };
    this.groups.set(id, updated);
    return this.joinRules(updated);
  }

  async deleteFilterGroup(id: string): Promise<boolean> {
    return this.groups.delete(id);
  }

  async setGroupRules(
    groupId: string,
    rules: FilterGroupRuleInput[],
  ): Promise<boolean> {
    const group = this.groups.get(groupId);
    if (!group) return false;
    group.rules = rules.map((rule) => ({ ...rule }));
    group.updatedAt = new Date().toISOString();
    return true;
  }

  private joinRules(group: StoredGroup): FilterGroup {
    const rules = [...group.rules]
      .sort((a, b) => a.position - b.position)
      .map((rule) => {
        const filter = this.filters.get(rule.filterId);
        return {
          filterId: rule.filterId,
          operator: rule.operator,
          position: rule.position,
          filter: filter ? { ...filter } : null,
        };
      });
    return { ...group, rules };
  }

  // -------------------------------------------------------------------------
  // Settings
  // -------------------------------------------------------------------------

  async listSettings(): Promise<Setting[]> {
    return [...this.settings]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, value]) => ({ key, value }));
  }

  async setSetting(key: string, value: string): Promise<void> {
    this.settings.set(key, value);
  }
}
