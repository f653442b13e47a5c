// =============================================================================
// @feedsieve/shared: Idempotent Neo4j schema + settings seed
// =============================================================================
// Creates the uniqueness constraints the pipeline relies on (Entry.url is
// the dedup key of last resort) and writes default settings that are not
// present yet. Safe to run on every boot.
// =============================================================================

import type { Driver } from "./driver.js";
import { DEFAULT_SETTINGS } from "../storage.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SeedResult {
  constraints: number;
  settings: number;
}

export interface SeedLogger {
  info: (msg: string) => void;
}

/** [label, property] pairs that must be unique. */
export const UNIQUE_CONSTRAINTS: ReadonlyArray<readonly [string, string]> = [
  ["Feed", "id"],
  ["Feed", "url"],
  ["Entry", "url"],
  ["EntryFilter", "id"],
  ["FilterGroup", "id"],
  ["Setting", "key"],
];

// ---------------------------------------------------------------------------
// Seed Logic
// ---------------------------------------------------------------------------

/**
 * Ensure constraints, the entry lookup index and default settings exist.
 *
 * @param driver - Neo4j driver instance
 * @param logger - Optional logger (defaults to console)
 * @returns Counts of constraints ensured and settings written
 */
export async function ensureSchema(
  driver: Driver,
  logger: SeedLogger = console,
): Promise<SeedResult> {
  const result: SeedResult = { constraints: 0, settings: 0 };

  const session = driver.session();

  try {
    // -----------------------------------------------------------------------
    // 1. Uniqueness constraints
    // -----------------------------------------------------------------------
    logger.info("Ensuring uniqueness constraints...");

    for (const [label, property] of UNIQUE_CONSTRAINTS) {
      const name = `${label.toLowerCase()}_${property}_unique`;
      await session.executeWrite(async (tx) => {
        await tx.run(
          `CREATE CONSTRAINT ${name} IF NOT EXISTS
           FOR (n:${label}) REQUIRE n.${property} IS UNIQUE`,
        );
      });
      result.constraints++;
    }

    logger.info(`  Ensured ${result.constraints} constraints`);

    // -----------------------------------------------------------------------
    // 2. Entry lookup index (watermark + retention queries)
    // -----------------------------------------------------------------------
    await session.executeWrite(async (tx) => {
      await tx.run(
        `CREATE INDEX entry_feed_published IF NOT EXISTS
         FOR (e:Entry) ON (e.feedId, e.publishedAt)`,
      );
    });

    // -----------------------------------------------------------------------
    // 3. Default settings (existing values are left alone)
    // -----------------------------------------------------------------------
    logger.info("Seeding default settings...");

    const now = new Date().toISOString();
    await session.executeWrite(async (tx) => {
      for (const [key, value] of Object.entries(DEFAULT_SETTINGS)) {
        const written = await tx.run(
          `MERGE (s:Setting {key: $key})
           ON CREATE SET s.value = $value, s.updatedAt = $now, s.seeded = true
           RETURN s.seeded = true AND s.updatedAt = $now AS created`,
          { key, value, now },
        );
        if (written.records[0]?.get("created") === true) result.settings++;
      }
    });

    logger.info(`  Wrote ${result.settings} default settings`);

    logger.info("Seed complete.");
    return result;
  } finally {
    await session.close();
  }
}
