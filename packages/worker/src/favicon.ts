/** Filename used when a site's icon cannot be resolved. */
export const DEFAULT_FAVICON = "default.ico";

/**
 * Maps a site URL to the filename of its stored icon. Best effort: the
 * fetcher falls back to DEFAULT_FAVICON when this rejects or returns "".
 */
export interface FaviconResolver {
  resolve(siteUrl: string): Promise<string>;
}

export const defaultFaviconResolver: FaviconResolver = {
  resolve: async () => DEFAULT_FAVICON,
};
