import type { Config, Logger, Storage } from "@feedsieve/shared";
import { FilterEngine } from "./filter-engine.js";
import { FeedFetcher } from "./fetcher.js";
import { EntryPersister } from "./persist.js";
import { FeedUpdater } from "./updater.js";
import type { FaviconResolver } from "./favicon.js";
import type { HostResolver } from "./netutil.js";

export type PipelineConfig = Pick<
  Config,
  "USER_AGENT" | "FETCH_TIMEOUT_MS" | "FILTER_CACHE_TTL_MS" | "FAVICON_BASE_PATH"
>;

export interface Pipeline {
  filterEngine: FilterEngine;
  fetcher: FeedFetcher;
  persister: EntryPersister;
  updater: FeedUpdater;
}

/** Wires the update pipeline's components around one storage instance. */
export function createPipeline(options: {
  storage: Storage;
  logger: Logger;
  config: PipelineConfig;
  favicons?: FaviconResolver;
  resolveHost?: HostResolver;
}): Pipeline {
  const { storage, config } = options;
  const logger = options.logger.child({ component: "pipeline" });

  const filterEngine = new FilterEngine({
    storage,
    logger,
    ttlMs: config.FILTER_CACHE_TTL_MS,
  });
  const fetcher = new FeedFetcher({
    storage,
    logger,
    userAgent: config.USER_AGENT,
    timeoutMs: config.FETCH_TIMEOUT_MS,
    faviconBasePath: config.FAVICON_BASE_PATH,
    favicons: options.favicons,
    resolveHost: options.resolveHost,
  });
  const persister = new EntryPersister({ storage, filterEngine, logger });
  const updater = new FeedUpdater({
    storage,
    fetcher,
    persister,
    validatorCache: fetcher.validatorCache,
    logger,
  });

  return { filterEngine, fetcher, persister, updater };
}
