// =============================================================================
// @feedsieve/shared: Domain types for feeds, entries, and filter config
// =============================================================================
// Covers the persisted entities the update pipeline reads and writes, the
// filter configuration it evaluates, and the enums/union types for
// constrained fields.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

/** Feed lifecycle status */
export type FeedStatus = "active" | "error" | "disabled";

/** How an EntryFilter pattern is interpreted */
export type PatternType = "keyword" | "regex";

/** Which part of an entry (or its feed) a filter is tested against */
export type TargetType = "title" | "content" | "feed_category" | "feed_tags";

/** What a matching filter group does to an entry */
export type FilterAction = "keep" | "discard";

/** Boolean operator joining a rule to the rules before it */
export type RuleOperator = "AND" | "OR";

/** Outcome of evaluating an entry against the active filter groups */
export type FilterDecision = "keep" | "discard";

/** Setting keys the pipeline and the cycle timer read */
export type SettingKey = "max_posts" | "feed_concurrency" | "update_interval";

// ---------------------------------------------------------------------------
// Feeds & entries
// ---------------------------------------------------------------------------

/** HTTP validators used for conditional GET */
export interface Validators {
  lastModified: string | null;
  etag: string | null;
}

export interface Feed {
  id: string;
  url: string;
  title: string;
  titleManuallyEdited: boolean;
  status: FeedStatus;
  errorCount: number;
  lastError: string | null;
  /** ISO-8601 UTC */
  lastFetched: string | null;
  lastModified: string | null;
  etag: string | null;
  category: string;
  tags: string[];
}

export interface Entry {
  id?: string;
  feedId: string;
  title: string;
  url: string;
  content: string;
  guid: string;
  publishedAt: Date;
  faviconUrl: string;
}

/** Entry as read back from storage */
export interface StoredEntry extends Entry {
  id: string;
  /** ISO-8601 UTC */
  createdAt: string;
}

/**
 * Metadata written to a feed after every fetch cycle that reached the
 * persistence step. Empty validator values never replace stored ones, and
 * the title is skipped when the feed's title was edited by hand.
 */
export interface FeedMetaUpdate {
  title: string | null;
  validators: Validators;
  fetchedAt: Date;
}

// ---------------------------------------------------------------------------
// Filter configuration
// ---------------------------------------------------------------------------

// patternType, targetType and operator are kept as plain strings on the
// stored shapes: rows written by older versions or by hand may carry values
// the engine has to reject or default, so the unions above only constrain
// what new input may contain.

export interface EntryFilter {
  id: string;
  name: string;
  pattern: string;
  patternType: string;
  targetType: string;
  caseSensitive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface FilterGroupRule {
  filterId: string;
  operator: string;
  position: number;
  /** Joined at read time; null when the referenced filter no longer exists */
  filter: EntryFilter | null;
}

export interface FilterGroup {
  id: string;
  name: string;
  action: FilterAction;
  isActive: boolean;
  priority: number;
  /** Empty string applies the group to every feed */
  applyToCategory: string;
  rules: FilterGroupRule[];
  createdAt: string;
  updatedAt: string;
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface NewFeed {
  url: string;
  title: string;
  category?: string;
  tags?: string[];
}

export interface EntryFilterInput {
  name: string;
  pattern: string;
  patternType: PatternType;
  targetType: TargetType;
  caseSensitive: boolean;
}

export interface FilterGroupInput {
  name: string;
  action: FilterAction;
  isActive: boolean;
  priority: number;
  applyToCategory: string;
}

export interface FilterGroupRuleInput {
  filterId: string;
  operator: RuleOperator;
  position: number;
}

export interface Setting {
  key: string;
  value: string;
}
