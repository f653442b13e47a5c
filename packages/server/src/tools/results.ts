// =============================================================================
// @feedsieve/server: MCP tool result helpers
// =============================================================================

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { errorMessage, logToolCall, type Logger } from "@feedsieve/shared";

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

export function errorResult(text: string): CallToolResult {
  return {
    content: [{ type: "text" as const, text: `Error: ${text}` }],
    isError: true,
  };
}

/**
 * Runs a tool body with timing and logToolCall. A thrown error becomes an
 * isError result prefixed with `failure`.
 */
export async function runTool(
  logger: Logger,
  toolName: string,
  input: Record<string, unknown>,
  failure: string,
  body: () => Promise<CallToolResult>,
): Promise<CallToolResult> {
  const start = performance.now();
  try {
    const result = await body();
    const firstText = result.content.find((c) => c.type === "text");
    logToolCall(
      logger,
      toolName,
      input,
      performance.now() - start,
      result.isError && firstText?.type === "text" ? firstText.text : undefined,
    );
    return result;
  } catch (err) {
    const errorMsg = errorMessage(err);
    logToolCall(logger, toolName, input, performance.now() - start, errorMsg);
    return errorResult(`${failure}: ${errorMsg}`);
  }
}
