// =============================================================================
// @feedsieve/shared: Feed Neo4j operations
// =============================================================================
// Reads and writes :Feed nodes: listing for the update cycle, validator
// lookup for conditional GET, per-cycle metadata/status writes, and the
// subscribe/unsubscribe operations used by the MCP tools.
// =============================================================================

import crypto from "node:crypto";
import {
  toBoolean,
  toNullableString,
  toNumber,
  toStringArray,
  toStringOr,
  nodeProps,
  type ManagedTransaction,
  type Session,
} from "./driver.js";
import type {
  Feed,
  FeedMetaUpdate,
  FeedStatus,
  NewFeed,
  Validators,
} from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toFeedStatus(value: unknown): FeedStatus {
  return value === "error" || value === "disabled" ? value : "active";
}

/** Maps a Neo4j record's properties to a Feed. */
export function toFeed(props: Record<string, unknown>): Feed {
  return {
    id: toStringOr(props.id, ""),
    url: toStringOr(props.url, ""),
    title: toStringOr(props.title, ""),
    titleManuallyEdited: toBoolean(props.titleManuallyEdited),
    status: toFeedStatus(props.status),
    errorCount: toNumber(props.errorCount),
    lastError: toNullableString(props.lastError),
    lastFetched: toNullableString(props.lastFetched),
    lastModified: toNullableString(props.lastModified),
    etag: toNullableString(props.etag),
    category: toStringOr(props.category, ""),
    tags: toStringArray(props.tags),
  };
}

/** Empty strings mean "no value" for validators and titles. */
function blankToNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

const FEED_META_QUERY = `MATCH (f:Feed {id: $id})
   SET f.lastFetched = $fetchedAt,
       f.lastModified = coalesce($lastModified, f.lastModified),
       f.etag = coalesce($etag, f.etag),
       f.title = CASE
         WHEN $title IS NULL OR f.titleManuallyEdited = true THEN f.title
         ELSE $title
       END,
       f.status = CASE WHEN f.status = 'disabled' THEN f.status ELSE 'active' END,
       f.errorCount = 0,
       f.lastError = null,
       f.updatedAt = $fetchedAt`;

function feedMetaParams(
  feedId: string,
  meta: FeedMetaUpdate,
): Record<string, unknown> {
  return {
    id: feedId,
    fetchedAt: meta.fetchedAt.toISOString(),
    lastModified: blankToNull(meta.validators.lastModified),
    etag: blankToNull(meta.validators.etag),
    title: blankToNull(meta.title),
  };
}

// ---------------------------------------------------------------------------
// Pipeline operations
// ---------------------------------------------------------------------------

export async function listFeeds(session: Session): Promise<Feed[]> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(`MATCH (f:Feed) RETURN f ORDER BY f.createdAt, f.url`);
  });

  return result.records.map((record) => toFeed(nodeProps(record, "f")));
}

export async function getFeedValidators(
  session: Session,
  feedId: string,
): Promise<Validators> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(
      `MATCH (f:Feed {id: $id})
       RETURN f.lastModified AS lastModified, f.etag AS etag`,
      { id: feedId },
    );
  });

  if (result.records.length === 0) return { lastModified: null, etag: null };

  const record = result.records[0];
  return {
    lastModified: blankToNull(toNullableString(record.get("lastModified"))),
    etag: blankToNull(toNullableString(record.get("etag"))),
  };
}

/**
 * Records a completed fetch: lastFetched, validators (kept when the new ones
 * are empty), title (skipped when edited by hand) and a healthy status.
 */
export async function updateFeedMetaTx(
  tx: ManagedTransaction,
  feedId: string,
  meta: FeedMetaUpdate,
): Promise<void> {
  await tx.run(FEED_META_QUERY, feedMetaParams(feedId, meta));
}

export async function updateFeedMeta(
  session: Session,
  feedId: string,
  meta: FeedMetaUpdate,
): Promise<void> {
  await session.executeWrite(async (tx) => {
    await updateFeedMetaTx(tx, feedId, meta);
  });
}

export async function markFeedError(
  session: Session,
  feedId: string,
  message: string,
): Promise<void> {
  await session.executeWrite(async (tx) => {
    await tx.run(
      `MATCH (f:Feed {id: $id})
       SET f.status = CASE WHEN f.status = 'disabled' THEN f.status ELSE 'error' END,
           f.errorCount = coalesce(f.errorCount, 0) + 1,
           f.lastError = $message,
           f.updatedAt = $now`,
      { id: feedId, message, now: new Date().toISOString() },
    );
  });
}

// ---------------------------------------------------------------------------
// Management operations
// ---------------------------------------------------------------------------

export async function createFeed(
  session: Session,
  feed: NewFeed,
): Promise<Feed> {
  const now = new Date().toISOString();

  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `CREATE (f:Feed {
        id: $id,
        url: $url,
        title: $title,
        titleManuallyEdited: false,
        status: 'active',
        errorCount: 0,
        lastError: null,
        lastFetched: null,
        lastModified: null,
        etag: null,
        category: $category,
        tags: $tags,
        createdAt: $now,
        updatedAt: $now
      }) RETURN f`,
      {
        id: crypto.randomUUID(),
        url: feed.url,
        title: feed.title,
        category: feed.category ?? "",
        tags: feed.tags ?? [],
        now,
      },
    );
  });

  return toFeed(nodeProps(result.records[0], "f"));
}

export async function getFeed(
  session: Session,
  key: { id: string } | { url: string },
): Promise<Feed | null> {
  const result = await session.executeRead(async (tx) => {
    return "id" in key
      ? tx.run(`MATCH (f:Feed {id: $id}) RETURN f`, { id: key.id })
      : tx.run(`MATCH (f:Feed {url: $url}) RETURN f`, { url: key.url });
  });

  if (result.records.length === 0) return null;
  return toFeed(nodeProps(result.records[0], "f"));
}

/** Deletes the feed and every entry it owns. */
export async function deleteFeed(
  session: Session,
  feedId: string,
): Promise<boolean> {
  const result = await session.executeWrite(async (tx) => {
    await tx.run(`MATCH (e:Entry {feedId: $id}) DETACH DELETE e`, {
      id: feedId,
    });
    return tx.run(
      `MATCH (f:Feed {id: $id})
       DETACH DELETE f
       RETURN count(*) AS deleted`,
      { id: feedId },
    );
  });

  return toNumber(result.records[0]?.get("deleted")) > 0;
}

export async function setFeedStatus(
  session: Session,
  feedId: string,
  status: FeedStatus,
): Promise<boolean> {
  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (f:Feed {id: $id})
       SET f.status = $status,
           f.errorCount = CASE WHEN $status = 'error' THEN f.errorCount ELSE 0 END,
           f.lastError = CASE WHEN $status = 'error' THEN f.lastError ELSE null END,
           f.updatedAt = $now
       RETURN f`,
      { id: feedId, status, now: new Date().toISOString() },
    );
  });

  return result.records.length > 0;
}

/**
 * Edits title, category or tags. Setting a title marks it as edited by hand
 * so later fetches no longer overwrite it.
 */
export async function updateFeedTaxonomy(
  session: Session,
  feedId: string,
  update: { title?: string; category?: string; tags?: string[] },
): Promise<Feed | null> {
  const setClauses: string[] = ["f.updatedAt = $now"];
  const params: Record<string, unknown> = {
    id: feedId,
    now: new Date().toISOString(),
  };

  if (update.title !== undefined) {
    setClauses.push("f.title = $title", "f.titleManuallyEdited = true");
    params.title = update.title;
  }
  if (update.category !== undefined) {
    setClauses.push("f.category = $category");
    params.category = update.category;
  }
  if (update.tags !== undefined) {
    setClauses.push("f.tags = $tags");
    params.tags = update.tags;
  }

  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (f:Feed {id: $id}) SET ${setClauses.join(", ")} RETURN f`,
      params,
    );
  });

  if (result.records.length === 0) return null;
  return toFeed(nodeProps(result.records[0], "f"));
}
