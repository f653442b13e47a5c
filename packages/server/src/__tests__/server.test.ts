// =============================================================================
// HTTP tests for the Express app: health, auth, rate limiting
// =============================================================================
// The app listens on 127.0.0.1 with a MemoryStore behind it.
// =============================================================================

import { describe, it, expect, afterEach } from "vitest";
import type { AppInstance } from "../server.js";
import { createTestApp } from "./helpers.js";

let instance: AppInstance | undefined;

async function listen(env: Record<string, string> = {}): Promise<string> {
  instance = createTestApp({}, env).instance;
  const { httpServer } = instance;
  await new Promise<void>((resolve) => httpServer.listen(0, "127.0.0.1", resolve));
  const address = httpServer.address();
  if (address === null || typeof address === "string") {
    throw new Error("server has no TCP address");
  }
  return `http://127.0.0.1:${address.port}`;
}

function postMcp(base: string, authorization?: string): Promise<Response> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (authorization !== undefined) headers.Authorization = authorization;
  return fetch(`${base}/mcp`, { method: "POST", headers, body: "{}" });
}

afterEach(async () => {
  instance?.httpServer.closeAllConnections();
  await instance?.shutdown();
  instance = undefined;
});

describe("GET /health", () => {
  it("should report storage and cycle state without auth", async () => {
    const base = await listen();

    const res = await fetch(`${base}/health`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: "ok",
      storage: { ok: true, latencyMs: 0 },
      updateRunning: false,
    });
  });
});

describe("POST /mcp auth", () => {
  it.each([
    [undefined, "Missing Authorization header"],
    ["Basic abc", "Invalid Authorization format. Expected: Bearer <key>"],
    ["Bearer wrong-key", "Invalid API key"],
    ["Bearer constructor", "Invalid API key"],
  ])("should reject authorization %s", async (authorization, error) => {
    const base = await listen();

    const res = await postMcp(base, authorization);

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error });
  });

  it("should rate limit per client", async () => {
    const base = await listen({ RATE_LIMIT_PER_MIN: "1" });

    const first = await postMcp(base, "Bearer test-key");
    await first.body?.cancel();
    const second = await postMcp(base, "Bearer test-key");
    const body: unknown = await second.json();

    expect(first.status).not.toBe(429);
    expect(second.status).toBe(429);
    expect(second.headers.get("retry-after")).toBe("60");
    expect(body).toMatchObject({ error: "Rate limit exceeded" });
  });
});

describe("/mcp methods", () => {
  it.each(["GET", "DELETE"])("should answer %s with 405", async (method) => {
    const base = await listen();

    const res = await fetch(`${base}/mcp`, { method });

    expect(res.status).toBe(405);
  });
});
