import { createLogger, type Feed, type Logger } from "@feedsieve/shared";
import type { FetchResult } from "../fetcher.js";

/** Logger that keeps parsed entries in memory instead of writing stdout. */
export function captureLogger(): {
  logger: Logger;
  entries: Array<Record<string, unknown>>;
} {
  const entries: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: "trace",
    sink: (line) => entries.push(JSON.parse(line)),
  });
  return { logger, entries };
}

export function silentLogger(): Logger {
  return createLogger({ level: "fatal", sink: () => {} });
}

export function makeFeed(overrides: Partial<Feed> = {}): Feed {
  return {
    id: "feed-1",
    url: "https://example.com/rss",
    title: "Example",
    titleManuallyEdited: false,
    status: "active",
    errorCount: 0,
    lastError: null,
    lastFetched: null,
    lastModified: null,
    etag: null,
    category: "",
    tags: [],
    ...overrides,
  };
}

export function okResult(feed: Feed, overrides: Partial<FetchResult> = {}): FetchResult {
  return {
    feed,
    items: [],
    validators: { lastModified: null, etag: null },
    title: null,
    notModified: false,
    error: null,
    ...overrides,
  };
}
