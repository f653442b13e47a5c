// =============================================================================
// Unit tests for the filter engine
// =============================================================================
// Groups are served by a stubbed storage so each test controls exactly what
// the engine loads and how often it asks.
// =============================================================================

import { describe, it, expect, vi } from "vitest";
import { FilterError, type EntryFilter, type FilterGroup } from "@feedsieve/shared";
import { FilterEngine } from "../filter-engine.js";
import { PatternMatcher } from "../matcher.js";
import { captureLogger, silentLogger } from "./helpers.js";

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

let seq = 0;

function filter(pattern: string, overrides: Partial<EntryFilter> = {}): EntryFilter {
  seq++;
  return {
    id: `filter-${seq}`,
    name: pattern,
    pattern,
    patternType: "keyword",
    targetType: "title",
    caseSensitive: false,
    createdAt: "",
    updatedAt: "",
    ...overrides,
  };
}

function group(
  action: "keep" | "discard",
  rules: Array<[EntryFilter | null, string]>,
  overrides: Partial<FilterGroup> = {},
): FilterGroup {
  seq++;
  return {
    id: `group-${seq}`,
    name: `${action}-${seq}`,
    action,
    isActive: true,
    priority: 0,
    applyToCategory: "",
    rules: rules.map(([f, operator], position) => ({
      filterId: f?.id ?? "deleted-filter",
      operator,
      position,
      filter: f,
    })),
    createdAt: "",
    updatedAt: "",
    ...overrides,
  };
}

function engineWith(groups: FilterGroup[], options: { now?: () => number } = {}) {
  const storage = { getActiveFilterGroups: vi.fn(async () => groups) };
  const engine = new FilterEngine({
    storage,
    logger: silentLogger(),
    ttlMs: 1000,
    now: options.now,
  });
  return { engine, storage };
}

const entry = (title: string, content = "") => ({ title, content });

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("FilterEngine", () => {
  describe("rule folding", () => {
    const { engine } = engineWith([]);

    it("should match either side of an OR", () => {
      const languages = group("keep", [
        [filter("Zig"), "AND"],
        [filter("Rust"), "OR"],
      ]);

      expect(engine.testFilterGroup(languages, "Learning Zig Programming")).toBe(true);
      expect(engine.testFilterGroup(languages, "Rust Guide")).toBe(true);
      expect(engine.testFilterGroup(languages, "Python Tutorial")).toBe(false);
    });

    it("should require both sides of an AND", () => {
      const tutorials = group("keep", [
        [filter("Zig"), "OR"],
        [filter("tutorial"), "AND"],
      ]);

      expect(engine.testFilterGroup(tutorials, "Zig Programming Tutorial")).toBe(true);
      expect(engine.testFilterGroup(tutorials, "Zig Programming Guide")).toBe(false);
    });

    it("should stop at the first true OR without evaluating later rules", () => {
      const g = group("keep", [
        [filter("Zig"), "AND"],
        [filter("Rust"), "OR"],
        [filter("(", { patternType: "regex" }), "AND"],
      ]);

      expect(engine.testFilterGroup(g, "Zig news")).toBe(true);
    });

    it("should stop at the first false AND without evaluating later rules", () => {
      const g = group("keep", [
        [filter("Zig"), "AND"],
        [filter("tutorial"), "AND"],
        [filter("(", { patternType: "regex" }), "OR"],
      ]);

      expect(engine.testFilterGroup(g, "Zig Guide")).toBe(false);
    });

    it("should treat an unknown operator as AND", () => {
      const g = group("keep", [
        [filter("Zig"), "AND"],
        [filter("tutorial"), "XOR"],
      ]);

      expect(engine.testFilterGroup(g, "Zig Guide")).toBe(false);
      expect(engine.testFilterGroup(g, "Zig tutorial")).toBe(true);
    });

    it("should not match with a deleted filter or no rules", () => {
      expect(engine.testFilterGroup(group("keep", [[null, "AND"]]), "anything")).toBe(false);
      expect(engine.testFilterGroup(group("keep", []), "anything")).toBe(false);
    });

    it("should surface rule errors from testFilterGroup", () => {
      const g = group("keep", [[filter("(", { patternType: "regex" }), "AND"]]);

      expect(() => engine.testFilterGroup(g, "x")).toThrow(FilterError);
    });
  });

  describe("filterEntry", () => {
    it("should keep everything when no groups exist", async () => {
      const { engine } = engineWith([]);

      await expect(engine.filterEntry(entry("Anything"), "", [])).resolves.toBe("keep");
    });

    it("should discard only entries a discard group matches", async () => {
      const { engine } = engineWith([group("discard", [[filter("sponsored"), "AND"]])]);

      await expect(engine.filterEntry(entry("Sponsored: buy now"), "", [])).resolves.toBe(
        "discard",
      );
      await expect(engine.filterEntry(entry("Release notes"), "", [])).resolves.toBe("keep");
    });

    it("should ignore discard groups once a keep group is relevant", async () => {
      const zig = filter("Zig");
      const { engine } = engineWith([
        group("keep", [[zig, "AND"]]),
        group("discard", [[zig, "AND"]]),
      ]);

      await expect(engine.filterEntry(entry("Zig 1.22 released"), "", [])).resolves.toBe("keep");
      await expect(engine.filterEntry(entry("Python 3.13 released"), "", [])).resolves.toBe(
        "discard",
      );
    });

    it("should apply category-scoped groups only to that category", async () => {
      const { engine } = engineWith([
        group("keep", [[filter("Zig"), "AND"]], { applyToCategory: "tech" }),
      ]);

      await expect(engine.filterEntry(entry("Match report"), "sports", [])).resolves.toBe("keep");
      await expect(engine.filterEntry(entry("Match report"), "tech", [])).resolves.toBe("discard");
    });

    it("should dispatch on the filter target", async () => {
      const { engine } = engineWith([
        group("discard", [[filter("casino", { targetType: "content" }), "AND"]]),
        group("discard", [[filter("gossip", { targetType: "feed_tags" }), "AND"]]),
        group("discard", [[filter("ads", { targetType: "feed_category" }), "AND"]]),
      ]);

      await expect(engine.filterEntry(entry("Hello", "visit our casino"), "", [])).resolves.toBe(
        "discard",
      );
      await expect(engine.filterEntry(entry("Hello"), "", ["news", "Gossip"])).resolves.toBe(
        "discard",
      );
      await expect(engine.filterEntry(entry("Hello"), "ads", [])).resolves.toBe("discard");
      await expect(engine.filterEntry(entry("Hello"), "news", ["tech"])).resolves.toBe("keep");
    });

    it("should isolate a broken rule to its own group", async () => {
      const { logger, entries } = captureLogger();
      const broken = group("discard", [[filter("(", { patternType: "regex" }), "AND"]]);
      const engine = new FilterEngine({
        storage: {
          getActiveFilterGroups: async () => [broken, group("discard", [[filter("ads"), "AND"]])],
        },
        logger,
      });

      await expect(engine.filterEntry(entry("ads here"), "", [])).resolves.toBe("discard");
      await expect(engine.filterEntry(entry("real news"), "", [])).resolves.toBe("keep");

      const warnings = entries.filter((e) => e.level === "warn");
      expect(warnings).toHaveLength(2);
      expect(warnings[0]).toMatchObject({
        msg: "Filter group evaluation failed",
        groupId: broken.id,
      });
    });

    it("should treat an unknown target type as a non-matching group", async () => {
      const { engine } = engineWith([
        group("discard", [[filter("x", { targetType: "author" }), "AND"]]),
      ]);

      await expect(engine.filterEntry(entry("x"), "", [])).resolves.toBe("keep");
    });

    it("should raise FilterError when groups cannot be loaded", async () => {
      const engine = new FilterEngine({
        storage: {
          getActiveFilterGroups: async () => {
            throw new Error("connection refused");
          },
        },
        logger: silentLogger(),
      });

      await expect(engine.filterEntry(entry("x"), "", [])).rejects.toThrow(
        "failed to load filter groups: connection refused",
      );
    });
  });

  describe("group cache", () => {
    it("should load groups once within the TTL", async () => {
      let now = 0;
      const { engine, storage } = engineWith([], { now: () => now });

      await engine.filterEntry(entry("a"), "", []);
      now = 999;
      await engine.filterEntry(entry("b"), "", []);
      expect(storage.getActiveFilterGroups).toHaveBeenCalledTimes(1);

      now = 1000;
      await engine.filterEntry(entry("c"), "", []);
      expect(storage.getActiveFilterGroups).toHaveBeenCalledTimes(2);
    });

    it("should reload exactly once after invalidation under concurrent callers", async () => {
      const { engine, storage } = engineWith([]);
      await engine.filterEntry(entry("warm"), "", []);

      engine.invalidateCache();
      await Promise.all(
        Array.from({ length: 8 }, (_, i) => engine.filterEntry(entry(`t${i}`), "", [])),
      );

      expect(storage.getActiveFilterGroups).toHaveBeenCalledTimes(2);
    });

    it("should not cache a refresh that started before an invalidation", async () => {
      const pending: Array<(groups: FilterGroup[]) => void> = [];
      const storage = {
        getActiveFilterGroups: vi.fn(
          () => new Promise<FilterGroup[]>((resolve) => pending.push(resolve)),
        ),
      };
      const engine = new FilterEngine({ storage, logger: silentLogger() });

      const before = engine.filterEntry(entry("Zig"), "", []);
      engine.invalidateCache();
      const after = engine.filterEntry(entry("Zig"), "", []);
      expect(storage.getActiveFilterGroups).toHaveBeenCalledTimes(2);

      pending[1]([group("discard", [[filter("Zig"), "AND"]])]);
      pending[0]([]);

      await expect(before).resolves.toBe("keep");
      await expect(after).resolves.toBe("discard");
      await expect(engine.filterEntry(entry("Zig"), "", [])).resolves.toBe("discard");
      expect(storage.getActiveFilterGroups).toHaveBeenCalledTimes(2);
    });

    it("should retry loading after a failed refresh", async () => {
      const getActiveFilterGroups = vi
        .fn<() => Promise<FilterGroup[]>>()
        .mockRejectedValueOnce(new Error("timeout"))
        .mockResolvedValueOnce([]);
      const engine = new FilterEngine({
        storage: { getActiveFilterGroups },
        logger: silentLogger(),
      });

      await expect(engine.filterEntry(entry("x"), "", [])).rejects.toThrow(FilterError);
      await expect(engine.filterEntry(entry("x"), "", [])).resolves.toBe("keep");
      expect(getActiveFilterGroups).toHaveBeenCalledTimes(2);
    });

    it("should drop compiled patterns on clearCache", async () => {
      const matcher = new PatternMatcher();
      const engine = new FilterEngine({
        storage: {
          getActiveFilterGroups: async () => [
            group("discard", [[filter("^ad", { patternType: "regex" }), "AND"]]),
          ],
        },
        logger: silentLogger(),
        matcher,
      });

      await engine.filterEntry(entry("Ad: shoes"), "", []);
      expect(matcher.size).toBe(1);

      engine.clearCache();
      expect(matcher.size).toBe(0);
    });
  });

  it("should test a single filter against sample text", () => {
    const { engine } = engineWith([]);

    expect(
      engine.testFilter({ pattern: "v\\d+", patternType: "regex", caseSensitive: true }, "v2"),
    ).toBe(true);
    expect(
      engine.testFilter({ pattern: "beta", patternType: "keyword", caseSensitive: false }, "BETA"),
    ).toBe(true);
  });
});
