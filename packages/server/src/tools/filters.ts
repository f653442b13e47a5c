// =============================================================================
// @feedsieve/server: Filter tools: filters, groups, rules, dry runs
// =============================================================================
// Every mutation clears the filter engine's group and pattern caches so the
// next entry is evaluated against the new configuration. Regex patterns are
// compiled before they are stored.
// =============================================================================

import { type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  CreateFilterGroupInput,
  CreateFilterInput,
  IdInput,
  SetGroupRulesInput,
  TestFilterInput,
  UpdateFilterGroupInput,
  UpdateFilterInput,
  ValidateRegexInput,
  isPipelineError,
  type EntryFilterInput,
  type FilterGroupInput,
} from "@feedsieve/shared";
import { validateRegexPattern } from "@feedsieve/worker";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { errorResult, jsonResult, runTool } from "./results.js";

// ---------------------------------------------------------------------------
// Input mapping
// ---------------------------------------------------------------------------

function toFilterInput(input: CreateFilterInput): EntryFilterInput {
  return {
    name: input.name,
    pattern: input.pattern,
    patternType: input.pattern_type,
    targetType: input.target_type,
    caseSensitive: input.case_sensitive,
  };
}

function toGroupInput(input: CreateFilterGroupInput): FilterGroupInput {
  return {
    name: input.name,
    action: input.action,
    isActive: input.is_active,
    priority: input.priority,
    applyToCategory: input.apply_to_category,
  };
}

/** Error text when a regex pattern does not compile, otherwise null. */
function regexProblem(input: CreateFilterInput): string | null {
  if (input.pattern_type !== "regex") return null;
  try {
    validateRegexPattern(input.pattern, input.case_sensitive);
    return null;
  } catch (err) {
    if (isPipelineError(err)) return err.message;
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Tool registrar
// ---------------------------------------------------------------------------

export const registerFilterTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { store, logger } = deps;
  const { filterEngine } = deps.pipeline;

  // -------------------------------------------------------------------------
  // Filters
  // -------------------------------------------------------------------------

  server.tool("list_filters", {}, async () =>
    runTool(logger, "list_filters", {}, "Failed to list filters", async () =>
      jsonResult(await store.listFilters()),
    ),
  );

  server.tool("create_filter", CreateFilterInput.shape, async (input) =>
    runTool(logger, "create_filter", input, "Failed to create filter", async () => {
      const problem = regexProblem(input);
      if (problem) return errorResult(problem);

      const filter = await store.createFilter(toFilterInput(input));
      filterEngine.clearCache();
      return jsonResult(filter);
    }),
  );

  server.tool("update_filter", UpdateFilterInput.shape, async (input) =>
    runTool(logger, "update_filter", input, "Failed to update filter", async () => {
      const problem = regexProblem(input);
      if (problem) return errorResult(problem);

      const filter = await store.updateFilter(input.id, toFilterInput(input));
      if (!filter) return errorResult(`Filter "${input.id}" not found`);
      filterEngine.clearCache();
      return jsonResult(filter);
    }),
  );

  server.tool("delete_filter", IdInput.shape, async (input) =>
    runTool(logger, "delete_filter", input, "Failed to delete filter", async () => {
      if (!(await store.deleteFilter(input.id))) {
        return errorResult(`Filter "${input.id}" not found`);
      }
      filterEngine.clearCache();
      return jsonResult({ deleted: input.id });
    }),
  );

  // -------------------------------------------------------------------------
  // Groups
  // -------------------------------------------------------------------------

  server.tool("list_filter_groups", {}, async () =>
    runTool(logger, "list_filter_groups", {}, "Failed to list filter groups", async () =>
      jsonResult(await store.listFilterGroups()),
    ),
  );

  server.tool("create_filter_group", CreateFilterGroupInput.shape, async (input) =>
    runTool(logger, "create_filter_group", input, "Failed to create filter group", async () => {
      const group = await store.createFilterGroup(toGroupInput(input));
      filterEngine.clearCache();
      return jsonResult(group);
    }),
  );

  server.tool("update_filter_group", UpdateFilterGroupInput.shape, async (input) =>
    runTool(logger, "update_filter_group", input, "Failed to update filter group", async () => {
      const group = await store.updateFilterGroup(input.id, toGroupInput(input));
      if (!group) return errorResult(`Filter group "${input.id}" not found`);
      filterEngine.clearCache();
      return jsonResult(group);
    }),
  );

  server.tool("delete_filter_group", IdInput.shape, async (input) =>
    runTool(logger, "delete_filter_group", input, "Failed to delete filter group", async () => {
      if (!(await store.deleteFilterGroup(input.id))) {
        return errorResult(`Filter group "${input.id}" not found`);
      }
      filterEngine.clearCache();
      return jsonResult({ deleted: input.id });
    }),
  );

  // -------------------------------------------------------------------------
  // set_group_rules: replaces the rule list; order is evaluation order
  // -------------------------------------------------------------------------
  server.tool("set_group_rules", SetGroupRulesInput.shape, async (input) =>
    runTool(logger, "set_group_rules", input, "Failed to set group rules", async () => {
      for (const rule of input.rules) {
        if (!(await store.getFilter(rule.filter_id))) {
          return errorResult(`Filter "${rule.filter_id}" not found`);
        }
      }

      const saved = await store.setGroupRules(
        input.group_id,
        input.rules.map((rule, position) => ({
          filterId: rule.filter_id,
          operator: rule.operator,
          position,
        })),
      );
      if (!saved) return errorResult(`Filter group "${input.group_id}" not found`);

      filterEngine.clearCache();
      return jsonResult(await store.getFilterGroup(input.group_id));
    }),
  );

  // -------------------------------------------------------------------------
  // test_filter: dry run of one filter or one group against sample text
  // -------------------------------------------------------------------------
  server.tool("test_filter", TestFilterInput.shape, async (input) =>
    runTool(logger, "test_filter", input, "Failed to test filter", async () => {
      const { filter_id: filterId, group_id: groupId, text } = input;

      try {
        if (filterId !== undefined && groupId === undefined) {
          const filter = await store.getFilter(filterId);
          if (!filter) return errorResult(`Filter "${filterId}" not found`);
          return jsonResult({ matched: filterEngine.testFilter(filter, text) });
        }
        if (groupId !== undefined && filterId === undefined) {
          const group = await store.getFilterGroup(groupId);
          if (!group) return errorResult(`Filter group "${groupId}" not found`);
          return jsonResult({ matched: filterEngine.testFilterGroup(group, text) });
        }
        return errorResult("Provide exactly one of filter_id or group_id");
      } catch (err) {
        if (isPipelineError(err)) return errorResult(err.message);
        throw err;
      }
    }),
  );

  // -------------------------------------------------------------------------
  // validate_regex
  // -------------------------------------------------------------------------
  server.tool("validate_regex", ValidateRegexInput.shape, async (input) =>
    runTool(logger, "validate_regex", input, "Failed to validate pattern", async () => {
      try {
        validateRegexPattern(input.pattern, input.case_sensitive);
        return jsonResult({ valid: true });
      } catch (err) {
        if (isPipelineError(err)) return jsonResult({ valid: false, error: err.message });
        throw err;
      }
    }),
  );
};
