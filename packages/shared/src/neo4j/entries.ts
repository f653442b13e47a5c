// =============================================================================
// @feedsieve/shared: Entry Neo4j operations
// =============================================================================
// :Entry nodes are unique by url. Upserts only replace an existing entry
// when the incoming publishedAt is strictly newer; trims keep the N most
// recent entries of a feed.
// =============================================================================

import crypto from "node:crypto";
import neo4j from "neo4j-driver";
import {
  nodeProps,
  toNullableString,
  toNumber,
  toStringOr,
  type ManagedTransaction,
  type Session,
} from "./driver.js";
import type { Entry, StoredEntry } from "../types.js";
import type { UpsertResult } from "../storage.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toStoredEntry(props: Record<string, unknown>): StoredEntry {
  return {
    id: toStringOr(props.id, ""),
    feedId: toStringOr(props.feedId, ""),
    title: toStringOr(props.title, ""),
    url: toStringOr(props.url, ""),
    content: toStringOr(props.content, ""),
    guid: toStringOr(props.guid, ""),
    publishedAt: new Date(toStringOr(props.publishedAt, "")),
    faviconUrl: toStringOr(props.faviconUrl, ""),
    createdAt: toStringOr(props.createdAt, ""),
  };
}

// A freshly created node carries the id generated for this call, which is
// how the query tells an insert apart from a conflict.
const UPSERT_ENTRY_QUERY = `MATCH (f:Feed {id: $feedId})
   MERGE (e:Entry {url: $url})
   ON CREATE SET e.id = $id,
                 e.feedId = $feedId,
                 e.title = $title,
                 e.content = $content,
                 e.guid = $guid,
                 e.publishedAt = $publishedAt,
                 e.faviconUrl = $faviconUrl,
                 e.createdAt = $now
   WITH f, e, e.id = $id AS created
   WITH f, e, created, (NOT created AND $publishedAt > e.publishedAt) AS newer
   FOREACH (_ IN CASE WHEN created THEN [1] ELSE [] END |
     MERGE (e)-[:IN_FEED]->(f))
   FOREACH (_ IN CASE WHEN newer THEN [1] ELSE [] END |
     SET e.title = $title, e.content = $content, e.publishedAt = $publishedAt)
   RETURN created, newer`;

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/** Newest stored publishedAt for the feed, or null when it has no entries. */
export async function getEntryWatermark(
  session: Session,
  feedId: string,
): Promise<Date | null> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(
      `MATCH (e:Entry {feedId: $feedId})
       RETURN max(e.publishedAt) AS watermark`,
      { feedId },
    );
  });

  const raw = toNullableString(result.records[0]?.get("watermark"));
  if (!raw) return null;
  const watermark = new Date(raw);
  return Number.isNaN(watermark.getTime()) ? null : watermark;
}

export async function upsertEntriesTx(
  tx: ManagedTransaction,
  feedId: string,
  entries: Entry[],
): Promise<UpsertResult> {
  const counts: UpsertResult = { inserted: 0, updated: 0, unchanged: 0 };
  const now = new Date().toISOString();

  for (const entry of entries) {
    const result = await tx.run(UPSERT_ENTRY_QUERY, {
      feedId,
      id: crypto.randomUUID(),
      url: entry.url,
      title: entry.title,
      content: entry.content,
      guid: entry.guid,
      publishedAt: entry.publishedAt.toISOString(),
      faviconUrl: entry.faviconUrl,
      now,
    });

    const record = result.records[0];
    if (record?.get("created") === true) counts.inserted++;
    else if (record?.get("newer") === true) counts.updated++;
    else counts.unchanged++;
  }

  return counts;
}

/** Deletes all but the `keep` most recent entries of the feed. */
export async function trimEntriesTx(
  tx: ManagedTransaction,
  feedId: string,
  keep: number,
): Promise<number> {
  const result = await tx.run(
    `MATCH (e:Entry {feedId: $feedId})
     WITH e ORDER BY e.publishedAt DESC, e.createdAt DESC
     SKIP $keep
     WITH collect(e) AS stale
     FOREACH (n IN stale | DETACH DELETE n)
     RETURN size(stale) AS deleted`,
    { feedId, keep: neo4j.int(keep) },
  );

  return toNumber(result.records[0]?.get("deleted"));
}

/** Newest entries first, optionally restricted to one feed. */
export async function listRecentEntries(
  session: Session,
  opts: { feedId?: string; limit: number },
): Promise<StoredEntry[]> {
  const whereClause = opts.feedId ? "WHERE e.feedId = $feedId" : "";
  const params: Record<string, unknown> = { limit: neo4j.int(opts.limit) };
  if (opts.feedId) {
    params.feedId = opts.feedId;
  }

  const result = await session.executeRead(async (tx) => {
    return tx.run(
      `MATCH (e:Entry)
       ${whereClause}
       RETURN e
       ORDER BY e.publishedAt DESC
       LIMIT $limit`,
      params,
    );
  });

  return result.records.map((record) => toStoredEntry(nodeProps(record, "e")));
}
