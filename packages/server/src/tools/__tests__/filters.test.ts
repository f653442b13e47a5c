// =============================================================================
// Tests for filter MCP tools
// =============================================================================
// Runs the tools over an in-memory MCP transport against a MemoryStore and
// checks that the pipeline's filter engine sees every change.
// =============================================================================

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { MemoryStore } from "@feedsieve/shared";
import type { AppInstance } from "../../server.js";
import { registerFilterTools } from "../filters.js";
import { callTool, createTestApp, createTestClient, record } from "../../__tests__/helpers.js";

describe("filter tools", () => {
  let instance: AppInstance;
  let store: MemoryStore;
  let client: Client;

  async function createFilter(args: Record<string, unknown>): Promise<string> {
    const filter = record(await callTool(client, "create_filter", args));
    if (typeof filter.id !== "string") throw new Error("filter without id");
    return filter.id;
  }

  async function createGroup(args: Record<string, unknown>): Promise<string> {
    const group = record(await callTool(client, "create_filter_group", args));
    if (typeof group.id !== "string") throw new Error("group without id");
    return group.id;
  }

  beforeEach(async () => {
    ({ instance, store } = createTestApp());
    client = await createTestClient(instance, [registerFilterTools]);
  });

  afterEach(async () => {
    await client.close();
    await instance.shutdown();
  });

  // -------------------------------------------------------------------------
  // Filters
  // -------------------------------------------------------------------------

  it("should create a keyword title filter by default", async () => {
    const filter = record(
      await callTool(client, "create_filter", { name: "ziglang", pattern: "Zig" }),
    );

    expect(filter).toMatchObject({
      name: "ziglang",
      pattern: "Zig",
      patternType: "keyword",
      targetType: "title",
      caseSensitive: false,
    });
    expect(await store.listFilters()).toHaveLength(1);
  });

  it("should refuse a regex that does not compile", async () => {
    const result = await callTool(client, "create_filter", {
      name: "broken",
      pattern: "(unclosed",
      pattern_type: "regex",
    });

    expect(result.isError).toBe(true);
    expect(result.text).toContain("invalid regex pattern '(unclosed'");
    expect(await store.listFilters()).toEqual([]);
  });

  it("should report a missing filter on update and delete", async () => {
    const update = await callTool(client, "update_filter", {
      id: "missing",
      name: "x",
      pattern: "x",
    });
    const remove = await callTool(client, "delete_filter", { id: "missing" });

    expect(update.text).toBe('Error: Filter "missing" not found');
    expect(remove.text).toBe('Error: Filter "missing" not found');
  });

  it("should clear the filter engine caches on every mutation", async () => {
    const clearCache = vi.spyOn(instance.deps.pipeline.filterEngine, "clearCache");

    const id = await createFilter({ name: "a", pattern: "a" });
    await callTool(client, "update_filter", { id, name: "a", pattern: "b" });
    const groupId = await createGroup({ name: "g" });
    await callTool(client, "set_group_rules", {
      group_id: groupId,
      rules: [{ filter_id: id }],
    });
    await callTool(client, "delete_filter_group", { id: groupId });
    await callTool(client, "delete_filter", { id });

    expect(clearCache).toHaveBeenCalledTimes(6);
  });

  // -------------------------------------------------------------------------
  // Groups and rules
  // -------------------------------------------------------------------------

  it("should store rules in the given order", async () => {
    const zig = await createFilter({ name: "zig", pattern: "Zig" });
    const rust = await createFilter({ name: "rust", pattern: "Rust" });
    const groupId = await createGroup({ name: "languages", action: "keep" });

    const group = record(
      await callTool(client, "set_group_rules", {
        group_id: groupId,
        rules: [{ filter_id: zig }, { filter_id: rust, operator: "OR" }],
      }),
    );

    expect(group.action).toBe("keep");
    expect(group.rules).toEqual([
      expect.objectContaining({ filterId: zig, operator: "AND", position: 0 }),
      expect.objectContaining({ filterId: rust, operator: "OR", position: 1 }),
    ]);
  });

  it("should refuse rules that reference unknown filters", async () => {
    const groupId = await createGroup({ name: "g" });

    const result = await callTool(client, "set_group_rules", {
      group_id: groupId,
      rules: [{ filter_id: "nope" }],
    });

    expect(result.text).toBe('Error: Filter "nope" not found');
  });

  it("should apply new configuration to the next entry", async () => {
    const engine = instance.deps.pipeline.filterEngine;
    const entry = { title: "Sponsored post", content: "" };
    expect(await engine.filterEntry(entry, "", [])).toBe("keep");

    const filterId = await createFilter({ name: "ads", pattern: "sponsored" });
    const groupId = await createGroup({ name: "no ads" });
    await callTool(client, "set_group_rules", {
      group_id: groupId,
      rules: [{ filter_id: filterId }],
    });

    expect(await engine.filterEntry(entry, "", [])).toBe("discard");
  });

  // -------------------------------------------------------------------------
  // Dry runs
  // -------------------------------------------------------------------------

  it("should test a group against sample text", async () => {
    const zig = await createFilter({ name: "zig", pattern: "Zig" });
    const rust = await createFilter({ name: "rust", pattern: "Rust" });
    const groupId = await createGroup({ name: "languages" });
    await callTool(client, "set_group_rules", {
      group_id: groupId,
      rules: [{ filter_id: zig }, { filter_id: rust, operator: "OR" }],
    });

    const hit = record(
      await callTool(client, "test_filter", { group_id: groupId, text: "Learning Rust" }),
    );
    const miss = record(
      await callTool(client, "test_filter", { group_id: groupId, text: "Python tips" }),
    );

    expect(hit.matched).toBe(true);
    expect(miss.matched).toBe(false);
  });

  it("should test a single filter", async () => {
    const id = await createFilter({
      name: "release",
      pattern: "^v\\d+\\.\\d+",
      pattern_type: "regex",
      case_sensitive: true,
    });

    const result = record(
      await callTool(client, "test_filter", { filter_id: id, text: "v2.1 released" }),
    );

    expect(result.matched).toBe(true);
  });

  it("should require exactly one of filter_id or group_id", async () => {
    const neither = await callTool(client, "test_filter", { text: "x" });
    const both = await callTool(client, "test_filter", {
      filter_id: "a",
      group_id: "b",
      text: "x",
    });

    expect(neither.text).toBe("Error: Provide exactly one of filter_id or group_id");
    expect(both.text).toBe("Error: Provide exactly one of filter_id or group_id");
  });

  it("should validate regex patterns without storing them", async () => {
    const valid = record(await callTool(client, "validate_regex", { pattern: "[a-z]+" }));
    const invalid = record(await callTool(client, "validate_regex", { pattern: "a(" }));

    expect(valid).toEqual({ valid: true });
    expect(invalid.valid).toBe(false);
    expect(invalid.error).toEqual(expect.stringContaining("invalid regex pattern 'a('"));
    expect(await store.listFilters()).toEqual([]);
  });
});
