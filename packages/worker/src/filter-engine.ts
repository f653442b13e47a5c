// =============================================================================
// @feedsieve/worker: Filter engine
// =============================================================================
// Decides per entry whether it is kept or discarded.
//
//   - Groups relevant to a feed: applyToCategory empty or equal to the
//     feed's category.
//   - Whitelist mode: any relevant group has action "keep". Only keep groups
//     are evaluated; the entry survives iff one of them matches.
//   - Blacklist mode otherwise: discarded iff a discard group matches.
//
// Within a group the first rule seeds the result and later rules fold left
// to right: AND stops on the first false, OR stops on the first true, and
// an operator other than OR is treated as AND.
//
// Active groups are cached for `ttlMs`. A refresh is shared by every caller
// that arrives while it is in flight, and a refresh that was started before
// an invalidation never repopulates the cache.
// =============================================================================

import {
  FilterError,
  errorMessage,
  type FilterDecision,
  type FilterGroup,
  type FilterGroupRule,
  type Logger,
  type Storage,
} from "@feedsieve/shared";
import { PatternMatcher, type MatchablePattern } from "./matcher.js";

export const DEFAULT_FILTER_CACHE_TTL_MS = 5 * 60 * 1000;

export interface FilterEngineOptions {
  storage: Pick<Storage, "getActiveFilterGroups">;
  logger: Logger;
  ttlMs?: number;
  /** Milliseconds clock; defaults to Date.now */
  now?: () => number;
  matcher?: PatternMatcher;
}

export interface FilterableEntry {
  title: string;
  content: string;
}

/** Returns the strings a filter with the given targetType is tested against. */
type TargetResolver = (targetType: string) => string[];

function entryTargets(
  entry: FilterableEntry,
  feedCategory: string,
  feedTags: string[],
): TargetResolver {
  return (targetType) => {
    switch (targetType) {
      case "title":
        return [entry.title];
      case "content":
        return [entry.content];
      case "feed_category":
        return [feedCategory];
      case "feed_tags":
        return feedTags;
      default:
        throw new FilterError(`unknown filter target type: ${targetType}`);
    }
  };
}

/** Every known target resolves to the same sample text. */
function sampleTargets(text: string): TargetResolver {
  return entryTargets({ title: text, content: text }, text, [text]);
}

export class FilterEngine {
  private readonly storage: Pick<Storage, "getActiveFilterGroups">;
  private readonly logger: Logger;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly matcher: PatternMatcher;

  private groups: FilterGroup[] | null = null;
  private loadedAt = 0;
  private refresh: Promise<FilterGroup[]> | null = null;
  private generation = 0;

  constructor(options: FilterEngineOptions) {
    this.storage = options.storage;
    this.logger = options.logger;
    this.ttlMs = options.ttlMs ?? DEFAULT_FILTER_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    this.matcher = options.matcher ?? new PatternMatcher();
  }

  /**
   * Evaluates `entry` against the active filter groups.
   *
   * @throws FilterError when the groups cannot be loaded. Callers keep the
   * entry in that case.
   */
  async filterEntry(
    entry: FilterableEntry,
    feedCategory: string,
    feedTags: string[],
  ): Promise<FilterDecision> {
    const groups = await this.activeGroups();
    const relevant = groups.filter(
      (g) => g.applyToCategory === "" || g.applyToCategory === feedCategory,
    );
    if (relevant.length === 0) return "keep";

    const resolve = entryTargets(entry, feedCategory, feedTags);
    const keepGroups = relevant.filter((g) => g.action === "keep");

    if (keepGroups.length > 0) {
      return keepGroups.some((g) => this.groupMatches(g, resolve))
        ? "keep"
        : "discard";
    }

    const discardGroups = relevant.filter((g) => g.action === "discard");
    return discardGroups.some((g) => this.groupMatches(g, resolve))
      ? "discard"
      : "keep";
  }

  /** The next filterEntry() call reloads groups from storage. */
  invalidateCache(): void {
    this.generation++;
    this.groups = null;
    this.loadedAt = 0;
    this.refresh = null;
  }

  /** invalidateCache() plus dropping every compiled pattern. */
  clearCache(): void {
    this.invalidateCache();
    this.matcher.clear();
  }

  /** Tests one filter's pattern against sample text. */
  testFilter(filter: MatchablePattern, text: string): boolean {
    return this.matcher.matches(filter, text);
  }

  /**
   * Tests a group against sample text, every rule's target reading the same
   * text. Rule errors propagate instead of being logged.
   */
  testFilterGroup(group: Pick<FilterGroup, "rules">, text: string): boolean {
    return this.evaluateGroup(group.rules, sampleTargets(text));
  }

  // ---------------------------------------------------------------------------
  // Group evaluation
  // ---------------------------------------------------------------------------

  private groupMatches(group: FilterGroup, resolve: TargetResolver): boolean {
    try {
      return this.evaluateGroup(group.rules, resolve);
    } catch (err) {
      this.logger.warn("Filter group evaluation failed", {
        groupId: group.id,
        group: group.name,
        error: errorMessage(err),
      });
      return false;
    }
  }

  private evaluateGroup(
    rules: FilterGroupRule[],
    resolve: TargetResolver,
  ): boolean {
    if (rules.length === 0) return false;
    if (rules.length === 1) return this.ruleMatches(rules[0], resolve);

    let result = false;
    for (const [i, rule] of rules.entries()) {
      const matched = this.ruleMatches(rule, resolve);
      if (i === 0) {
        result = matched;
        continue;
      }

      if (rule.operator === "OR") {
        result = result || matched;
        if (result) return true;
      } else {
        result = result && matched;
        if (!result) return false;
      }
    }
    return result;
  }

  private ruleMatches(rule: FilterGroupRule, resolve: TargetResolver): boolean {
    const filter = rule.filter;
    if (filter === null) return false;
    return resolve(filter.targetType).some((text) =>
      this.matcher.matches(filter, text),
    );
  }

  // ---------------------------------------------------------------------------
  // Group cache
  // ---------------------------------------------------------------------------

  private activeGroups(): Promise<FilterGroup[]> {
    if (this.groups !== null && this.now() - this.loadedAt < this.ttlMs) {
      return Promise.resolve(this.groups);
    }
    if (this.refresh === null) {
      const pending: Promise<FilterGroup[]> = this.load(this.generation).finally(
        () => {
          if (this.refresh === pending) this.refresh = null;
        },
      );
      this.refresh = pending;
    }
    return this.refresh;
  }

  private async load(generation: number): Promise<FilterGroup[]> {
    try {
      const groups = await this.storage.getActiveFilterGroups();
      if (generation === this.generation) {
        this.groups = groups;
        this.loadedAt = this.now();
      }
      this.logger.debug("Filter groups loaded", { count: groups.length });
      return groups;
    } catch (err) {
      throw new FilterError(
        `failed to load filter groups: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }
}
