// =============================================================================
// @feedsieve/worker: Pattern matcher
// =============================================================================
// Keyword filters test substring containment; regex filters compile once per
// (pattern, caseSensitive) pair and stay cached until clear(). A pattern that
// fails to compile raises FilterError and is never cached.
// =============================================================================

import { FilterError, errorMessage } from "@feedsieve/shared";

export interface MatchablePattern {
  pattern: string;
  patternType: string;
  caseSensitive: boolean;
}

function compile(pattern: string, caseSensitive: boolean): RegExp {
  try {
    return new RegExp(pattern, caseSensitive ? "" : "i");
  } catch (err) {
    throw new FilterError(
      `invalid regex pattern '${pattern}': ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

/** Throws FilterError when `pattern` does not compile. Leaves no cache entry. */
export function validateRegexPattern(
  pattern: string,
  caseSensitive: boolean,
): void {
  compile(pattern, caseSensitive);
}

export class PatternMatcher {
  private readonly regexCache = new Map<string, RegExp>();

  /** Number of compiled patterns currently cached. */
  get size(): number {
    return this.regexCache.size;
  }

  matches(filter: MatchablePattern, text: string): boolean {
    switch (filter.patternType) {
      case "keyword":
        return this.matchKeyword(filter.pattern, filter.caseSensitive, text);
      case "regex":
        return this.regexFor(filter.pattern, filter.caseSensitive).test(text);
      default:
        throw new FilterError(
          `unknown filter pattern type: ${filter.patternType}`,
        );
    }
  }

  clear(): void {
    this.regexCache.clear();
  }

  private matchKeyword(
    pattern: string,
    caseSensitive: boolean,
    text: string,
  ): boolean {
    if (caseSensitive) return text.includes(pattern);
    return text.toLowerCase().includes(pattern.toLowerCase());
  }

  private regexFor(pattern: string, caseSensitive: boolean): RegExp {
    const key = `${pattern}:${caseSensitive}`;
    const cached = this.regexCache.get(key);
    if (cached) return cached;

    const regex = compile(pattern, caseSensitive);
    this.regexCache.set(key, regex);
    return regex;
  }
}
