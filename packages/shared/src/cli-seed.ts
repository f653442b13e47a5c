#!/usr/bin/env node
// =============================================================================
// @feedsieve/shared: CLI schema script
// =============================================================================
// Standalone script that creates the uniqueness constraints and the entry
// index, and writes default settings that are missing.
//
// Usage:
//   NEO4J_URI=neo4j://localhost:7687 NEO4J_USER=neo4j NEO4J_PASSWORD=... npm run seed
// =============================================================================

import neo4j from "neo4j-driver";
import { ensureSchema } from "./neo4j/seed.js";

const uri = process.env.NEO4J_URI;
const user = process.env.NEO4J_USER ?? "neo4j";
const password = process.env.NEO4J_PASSWORD;

if (!uri || !password) {
  console.error(
    "Missing required env vars: NEO4J_URI and NEO4J_PASSWORD must be set.",
  );
  console.error(
    "Example: NEO4J_URI=neo4j://localhost:7687 NEO4J_PASSWORD=xxx npm run seed",
  );
  process.exit(1);
}

console.log(`Connecting to ${uri} as ${user}...`);

const driver = neo4j.driver(uri, neo4j.auth.basic(user, password));

try {
  await driver.verifyConnectivity();
  console.log("Connected to Neo4j.\n");

  const result = await ensureSchema(driver, console);

  console.log("\nSchema summary:");
  console.log(`  Constraints:      ${result.constraints}`);
  console.log(`  Default settings: ${result.settings}`);
} catch (err) {
  console.error(
    "Schema setup failed:",
    err instanceof Error ? err.message : String(err),
  );
  process.exit(1);
} finally {
  await driver.close();
}
