// @feedsieve/worker: feed update pipeline
export { PatternMatcher, validateRegexPattern, type MatchablePattern } from "./matcher.js";
export {
  FilterEngine,
  DEFAULT_FILTER_CACHE_TTL_MS,
  type FilterEngineOptions,
  type FilterableEntry,
} from "./filter-engine.js";
export {
  assertPublicDestination,
  isLoopbackAddress,
  isPrivateAddress,
  resolveHost,
  type HostResolver,
} from "./netutil.js";
export { ValidatorCache, DEFAULT_VALIDATOR_TTL_MS } from "./validator-cache.js";
export {
  RssFeedParser,
  type FeedParser,
  type FeedType,
  type ParsedFeed,
  type ParsedItem,
} from "./parser.js";
export {
  DEFAULT_FAVICON,
  defaultFaviconResolver,
  type FaviconResolver,
} from "./favicon.js";
export {
  FeedFetcher,
  MAX_FEED_BYTES,
  MAX_REDIRECTS,
  MAX_SAMPLE_CONTENT,
  type FeedFetcherOptions,
  type FeedPreview,
  type FetchResult,
} from "./fetcher.js";
export { Semaphore, ResultChannel, AbortedError } from "./concurrency.js";
export { EntryPersister, type EntryPersisterOptions, type SaveSummary } from "./persist.js";
export {
  FeedUpdater,
  defaultConcurrency,
  MIN_CONCURRENCY,
  MAX_CONCURRENCY,
  type FeedOutcome,
  type FeedOutcomeStatus,
  type FeedUpdaterOptions,
  type UpdateSummary,
} from "./updater.js";
export { createPipeline, type Pipeline, type PipelineConfig } from "./pipeline.js";
