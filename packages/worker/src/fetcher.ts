// =============================================================================
// @feedsieve/worker: Conditional fetch client
// =============================================================================
// One validated GET per feed:
//   1. The destination (and every redirect hop, at most 5) passes the
//      destination policy in netutil.ts.
//   2. Validators come from the in-process cache when fresh, otherwise from
//      storage, and are sent as If-Modified-Since / If-None-Match.
//   3. 304 yields no items; the validators that were sent stand in for any
//      the server did not echo. Returned validators are not cached here: the
//      updater caches them once the result is persisted.
//   4. Bodies are capped at 5 MiB after content decoding.
//   5. Only items strictly newer than the feed's stored watermark are
//      returned.
// fetch() never rejects: every failure is reported on the result.
// =============================================================================

import { TextDecoder } from "node:util";
import {
  FetchError,
  ParseError,
  errorMessage,
  isPipelineError,
  logExternalCall,
  type Entry,
  type Feed,
  type Logger,
  type PipelineError,
  type Storage,
  type Validators,
} from "@feedsieve/shared";
import { assertPublicDestination, resolveHost, type HostResolver } from "./netutil.js";
import { RssFeedParser, type FeedParser, type FeedType } from "./parser.js";
import {
  DEFAULT_FAVICON,
  defaultFaviconResolver,
  type FaviconResolver,
} from "./favicon.js";
import { ValidatorCache } from "./validator-cache.js";

export const MAX_FEED_BYTES = 5 * 1024 * 1024;
export const MAX_REDIRECTS = 5;
export const MAX_SAMPLE_CONTENT = 2000;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const ACCEPT =
  "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8";

export interface FetchResult {
  feed: Feed;
  /** New entries, not yet filtered */
  items: Entry[];
  validators: Validators;
  /** Title announced by the feed document, null when absent */
  title: string | null;
  notModified: boolean;
  error: PipelineError | null;
}

/** What a URL serves, checked before it is subscribed to. */
export interface FeedPreview {
  url: string;
  title: string;
  description: string;
  feedType: FeedType;
  itemCount: number;
  /** The feed's own update date, else its first item's */
  lastUpdated: Date | null;
  sampleItem: {
    title: string;
    url: string;
    publishedAt: Date | null;
    /** Truncated to MAX_SAMPLE_CONTENT characters */
    content: string;
  } | null;
}

export interface FeedFetcherOptions {
  storage: Pick<Storage, "getEntryWatermark" | "getFeedValidators">;
  logger: Logger;
  userAgent: string;
  timeoutMs: number;
  /** Prefix joined with the favicon filename, e.g. "/static/favicons/" */
  faviconBasePath: string;
  parser?: FeedParser;
  favicons?: FaviconResolver;
  validatorCache?: ValidatorCache;
  resolveHost?: HostResolver;
  maxBodyBytes?: number;
}

function blankToNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function responseValidators(res: Response): Validators {
  return {
    lastModified: blankToNull(res.headers.get("last-modified")),
    etag: blankToNull(res.headers.get("etag")),
  };
}

// Matched against the first bytes read as latin1, after an optional UTF-8 BOM
const XML_ENCODING =
  /^(?:\u00EF\u00BB\u00BF)?\s*<\?xml[^>]*?\bencoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/;

/** Encoding named by an XML declaration at the start of the document. */
function declaredEncoding(bytes: Uint8Array): string | undefined {
  const head = Buffer.from(bytes.subarray(0, 256)).toString("latin1");
  return XML_ENCODING.exec(head)?.[1];
}

/**
 * Decoder for the charset named by the Content-Type header, else by the XML
 * declaration. Labels TextDecoder does not know fall back to UTF-8.
 */
function decoderFor(res: Response, bytes: Uint8Array): TextDecoder {
  const charset =
    /charset=["']?([^\s;"']+)/i.exec(res.headers.get("content-type") ?? "")?.[1] ??
    declaredEncoding(bytes);
  if (charset) {
    try {
      return new TextDecoder(charset);
    } catch {
      // unknown label: fall through to UTF-8
    }
  }
  return new TextDecoder("utf-8");
}

export class FeedFetcher {
  private readonly storage: FeedFetcherOptions["storage"];
  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly faviconBasePath: string;
  private readonly parser: FeedParser;
  private readonly favicons: FaviconResolver;
  private readonly resolveHost: HostResolver;
  private readonly maxBodyBytes: number;
  readonly validatorCache: ValidatorCache;

  constructor(options: FeedFetcherOptions) {
    this.storage = options.storage;
    this.logger = options.logger;
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs;
    this.faviconBasePath = options.faviconBasePath;
    this.parser = options.parser ?? new RssFeedParser();
    this.favicons = options.favicons ?? defaultFaviconResolver;
    this.validatorCache = options.validatorCache ?? new ValidatorCache();
    this.resolveHost = options.resolveHost ?? resolveHost;
    this.maxBodyBytes = options.maxBodyBytes ?? MAX_FEED_BYTES;
  }

  async fetch(feed: Feed, signal?: AbortSignal): Promise<FetchResult> {
    const log = this.logger.child({ feedId: feed.id, url: feed.url });
    const start = performance.now();

    try {
      const result = await this.fetchFeed(feed, log, signal);
      logExternalCall(log, "http", "fetch_feed", performance.now() - start);
      return result;
    } catch (err) {
      const error = this.toPipelineError(err, signal);
      logExternalCall(
        log,
        "http",
        "fetch_feed",
        performance.now() - start,
        error.message,
      );
      return {
        feed,
        items: [],
        validators: { lastModified: null, etag: null },
        title: null,
        notModified: false,
        error,
      };
    }
  }

  /**
   * Fetches `url` unconditionally and describes the feed it serves.
   *
   * @throws ValidationError for a blocked destination, FetchError when the
   * URL cannot be read, ParseError when it does not serve a feed.
   */
  async preview(url: string, signal?: AbortSignal): Promise<FeedPreview> {
    const log = this.logger.child({ url });
    const start = performance.now();

    try {
      const res = await this.request(
        url,
        { "User-Agent": this.userAgent, Accept: ACCEPT },
        this.requestSignal(signal),
      );
      if (!res.ok) {
        await res.body?.cancel();
        throw new FetchError(`unexpected response status ${res.status}`, res.status);
      }
      const parsed = await this.parser.parse(await this.readBody(res)).catch((err: unknown) => {
        throw new ParseError("URL does not point to a valid feed", { cause: err });
      });
      logExternalCall(log, "http", "preview_feed", performance.now() - start);

      const [first] = parsed.items;
      return {
        url,
        title: parsed.title,
        description: parsed.description,
        feedType: parsed.feedType,
        itemCount: parsed.items.length,
        lastUpdated: parsed.updatedAt ?? first?.publishedAt ?? null,
        sampleItem: first
          ? {
              title: first.title,
              url: first.link,
              publishedAt: first.publishedAt,
              content: first.content.slice(0, MAX_SAMPLE_CONTENT),
            }
          : null,
      };
    } catch (err) {
      const error = this.toPipelineError(err, signal);
      logExternalCall(log, "http", "preview_feed", performance.now() - start, error.message);
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Steps
  // ---------------------------------------------------------------------------

  private async fetchFeed(
    feed: Feed,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<FetchResult> {
    const sent = await this.conditionalValidators(feed.id);

    const headers: Record<string, string> = {
      "User-Agent": this.userAgent,
      Accept: ACCEPT,
    };
    if (sent.lastModified) headers["If-Modified-Since"] = sent.lastModified;
    if (sent.etag) headers["If-None-Match"] = sent.etag;

    const res = await this.request(feed.url, headers, this.requestSignal(signal));

    if (res.status === 304) {
      await res.body?.cancel();
      const echoed = responseValidators(res);
      const validators: Validators = {
        lastModified: echoed.lastModified ?? sent.lastModified,
        etag: echoed.etag ?? sent.etag,
      };
      log.debug("Feed not modified");
      return { feed, items: [], validators, title: null, notModified: true, error: null };
    }

    if (!res.ok) {
      await res.body?.cancel();
      throw new FetchError(`unexpected response status ${res.status}`, res.status);
    }

    const validators = responseValidators(res);
    const body = await this.readBody(res);
    const parsed = await this.parser.parse(body);
    const watermark = await this.storage.getEntryWatermark(feed.id);
    const faviconUrl = this.faviconBasePath + (await this.faviconFor(parsed.link, log));

    const items: Entry[] = [];
    for (const item of parsed.items) {
      if (item.link === "") continue;
      const publishedAt = item.publishedAt ?? item.updatedAt ?? new Date();
      if (watermark !== null && publishedAt.getTime() <= watermark.getTime()) {
        continue;
      }
      items.push({
        feedId: feed.id,
        title: item.title,
        url: item.link,
        content: item.content,
        guid: item.guid,
        publishedAt,
        faviconUrl,
      });
    }

    log.debug("Feed parsed", {
      items: parsed.items.length,
      new: items.length,
    });

    return {
      feed,
      items,
      validators,
      title: parsed.title === "" ? null : parsed.title,
      notModified: false,
      error: null,
    };
  }

  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  private async conditionalValidators(feedId: string): Promise<Validators> {
    const cached = this.validatorCache.get(feedId);
    if (cached) return cached;

    const stored = await this.storage.getFeedValidators(feedId);
    return {
      lastModified: blankToNull(stored.lastModified),
      etag: blankToNull(stored.etag),
    };
  }

  /** GET with redirects followed by hand so each hop is re-validated. */
  private async request(
    rawUrl: string,
    headers: Record<string, string>,
    signal: AbortSignal,
  ): Promise<Response> {
    let url = await assertPublicDestination(rawUrl, this.resolveHost);

    for (let hops = 0; ; hops++) {
      const res = await fetch(url, { headers, signal, redirect: "manual" });
      const location = res.headers.get("location");
      if (!REDIRECT_STATUSES.has(res.status) || location === null) {
        return res;
      }

      await res.body?.cancel();
      if (hops >= MAX_REDIRECTS) {
        throw new FetchError(`stopped after ${MAX_REDIRECTS} redirects`, res.status);
      }
      url = await assertPublicDestination(new URL(location, url), this.resolveHost);
    }
  }

  private async readBody(res: Response): Promise<string> {
    const declared = Number(res.headers.get("content-length"));
    if (Number.isFinite(declared) && declared > this.maxBodyBytes) {
      await res.body?.cancel();
      throw new FetchError(`feed body exceeds ${this.maxBodyBytes} bytes`);
    }
    if (res.body === null) return "";

    const chunks: Uint8Array[] = [];
    let total = 0;
    const reader = res.body.getReader();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      total += value.byteLength;
      if (total > this.maxBodyBytes) {
        await reader.cancel();
        throw new FetchError(`feed body exceeds ${this.maxBodyBytes} bytes`);
      }
      chunks.push(value);
    }

    const bytes = Buffer.concat(chunks);
    return decoderFor(res, bytes).decode(bytes);
  }

  private async faviconFor(siteUrl: string, log: Logger): Promise<string> {
    if (siteUrl === "") return DEFAULT_FAVICON;
    try {
      const file = await this.favicons.resolve(siteUrl);
      return file === "" ? DEFAULT_FAVICON : file;
    } catch (err) {
      log.warn("Favicon lookup failed", { site: siteUrl, error: errorMessage(err) });
      return DEFAULT_FAVICON;
    }
  }

  private toPipelineError(err: unknown, signal?: AbortSignal): PipelineError {
    if (isPipelineError(err)) return err;
    if (signal?.aborted) {
      return new FetchError("fetch cancelled", undefined, { cause: err });
    }
    if (err instanceof DOMException && err.name === "TimeoutError") {
      return new FetchError(`timed out after ${this.timeoutMs}ms`, undefined, {
        cause: err,
      });
    }
    return new FetchError(`error fetching feed: ${errorMessage(err)}`, undefined, {
      cause: err,
    });
  }
}
