// =============================================================================
// @feedsieve/server: Setting tools: list_settings, update_setting
// =============================================================================
// The pipeline reads settings at the start of every cycle (and the timer on
// every tick), so an update takes effect without a restart.
// =============================================================================

import { type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  MIN_UPDATE_INTERVAL_SECONDS,
  UpdateSettingInput,
  type SettingKey,
} from "@feedsieve/shared";
import { MAX_CONCURRENCY, MIN_CONCURRENCY } from "@feedsieve/worker";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { errorResult, jsonResult, runTool } from "./results.js";

/** Inclusive bounds per key */
const SETTING_RANGES: Record<SettingKey, { min: number; max?: number }> = {
  max_posts: { min: 1 },
  feed_concurrency: { min: MIN_CONCURRENCY, max: MAX_CONCURRENCY },
  update_interval: { min: MIN_UPDATE_INTERVAL_SECONDS },
};

export const registerSettingTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { store, logger } = deps;

  server.tool("list_settings", {}, async () =>
    runTool(logger, "list_settings", {}, "Failed to list settings", async () =>
      jsonResult(await store.listSettings()),
    ),
  );

  server.tool("update_setting", UpdateSettingInput.shape, async (input) =>
    runTool(logger, "update_setting", input, "Failed to update setting", async () => {
      const value = Number.parseInt(input.value, 10);
      const { min, max } = SETTING_RANGES[input.key];
      if (value < min) {
        return errorResult(`${input.key} must be at least ${min}`);
      }
      if (max !== undefined && value > max) {
        return errorResult(`${input.key} must be at most ${max}`);
      }

      await store.setSetting(input.key, String(value));
      return jsonResult({ key: input.key, value: String(value) });
    }),
  );
};
