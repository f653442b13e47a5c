// =============================================================================
// Shared helpers for server tests
// =============================================================================
// Apps run on a MemoryStore; nothing here opens a Neo4j connection.
// =============================================================================

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { MemoryStore, createLogger } from "@feedsieve/shared";
import { createApp, type AppInstance, type AppOptions, type ToolRegistrar } from "../server.js";

export const TEST_ENV: Record<string, string> = {
  NEO4J_URI: "neo4j://localhost:7687",
  NEO4J_USER: "neo4j",
  NEO4J_PASSWORD: "test-secret",
  API_KEYS: JSON.stringify({ "test-key": "test-client" }),
  CRON_ENABLED: "false",
  UPDATE_ON_START: "false",
};

export function createTestApp(
  options: Omit<AppOptions, "store"> & { store?: MemoryStore } = {},
  env: Record<string, string> = {},
): { instance: AppInstance; store: MemoryStore } {
  const store = options.store ?? new MemoryStore();
  const instance = createApp(
    { ...TEST_ENV, ...env },
    {
      logger: createLogger({ level: "fatal", sink: () => {} }),
      ...options,
      store,
    },
  );
  return { instance, store };
}

// ---------------------------------------------------------------------------
// Helper: create an MCP client connected to the server via in-memory transport
// ---------------------------------------------------------------------------

export async function createTestClient(
  instance: AppInstance,
  registrars: ToolRegistrar[],
): Promise<Client> {
  const server = new McpServer({ name: "feedsieve-test", version: "0.1.0" });

  for (const register of registrars) {
    register(server, instance.deps);
  }

  const [clientTransport, serverTransport] =
    InMemoryTransport.createLinkedPair();

  await server.connect(serverTransport);

  const client = new Client({ name: "test-client", version: "0.1.0" });
  await client.connect(clientTransport);

  return client;
}

// ---------------------------------------------------------------------------
// Helper: call an MCP tool and parse the text response as JSON
// ---------------------------------------------------------------------------

export interface ToolResult {
  text: string;
  isError?: boolean;
  parsed: unknown;
}

export async function callTool(
  client: Client,
  name: string,
  args: Record<string, unknown> = {},
): Promise<ToolResult> {
  const result = await client.callTool({ name, arguments: args });

  const content = result.content as Array<{ type: string; text?: string }>;
  const textContent = content.find((c) => c.type === "text");
  const text = textContent?.text ?? "";

  let parsed: unknown = text;
  try {
    parsed = JSON.parse(text);
  } catch {
    // Not JSON: leave as raw text
  }

  return {
    text,
    isError: result.isError === true ? true : undefined,
    parsed,
  };
}

/** Parsed JSON body of a successful tool call, as a plain record. */
export function record(result: ToolResult): Record<string, unknown> {
  if (result.isError) throw new Error(`tool failed: ${result.text}`);
  const { parsed } = result;
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`expected a JSON object, got: ${result.text}`);
  }
  return { ...parsed };
}
