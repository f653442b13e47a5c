import neo4j, {
  type Driver,
  type Session,
  type ManagedTransaction,
} from "neo4j-driver";
import type { Config } from "../config.js";

export type { Driver, Session, ManagedTransaction };

export interface HealthCheckResult {
  ok: boolean;
  latencyMs: number;
  error?: string;
}

export function createDriver(config: Config): Driver {
  return neo4j.driver(
    config.NEO4J_URI,
    neo4j.auth.basic(config.NEO4J_USER, config.NEO4J_PASSWORD),
    {
      maxConnectionPoolSize: 30,
      connectionLivenessCheckTimeout: 300000,
    },
  );
}

export async function healthCheck(driver: Driver): Promise<HealthCheckResult> {
  const start = performance.now();
  try {
    await driver.getServerInfo();
    return { ok: true, latencyMs: performance.now() - start };
  } catch (err) {
    return {
      ok: false,
      latencyMs: performance.now() - start,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

export async function closeDriver(driver: Driver): Promise<void> {
  await driver.close();
}

// ---------------------------------------------------------------------------
// Property readers
// ---------------------------------------------------------------------------
// Node properties come back as `unknown`. Integers arrive as neo4j Integer
// objects unless the driver is configured otherwise.

/** Converts a Neo4j Integer (or plain number) to a JS number; 0 otherwise. */
export function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (neo4j.isInt(value)) return value.toNumber();
  return 0;
}

export function toStringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

export function toNullableString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

export function toBoolean(value: unknown): boolean {
  return value === true;
}

export function toStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

/** Properties of a node returned under `key`, or an empty object. */
export function nodeProps(
  record: { get(key: string): unknown },
  key: string,
): Record<string, unknown> {
  const node: unknown = record.get(key);
  if (
    typeof node === "object" &&
    node !== null &&
    "properties" in node &&
    typeof node.properties === "object" &&
    node.properties !== null
  ) {
    return { ...node.properties };
  }
  return {};
}
