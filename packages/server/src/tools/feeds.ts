// =============================================================================
// @feedsieve/server: Feed tools: CRUD, recent entries, manual updates
// =============================================================================
// add_feed stores a URL only once it serves a readable feed from an allowed
// destination, then fetches the new feed once so its title and first entries
// are available immediately. validate_feed runs the same check and returns
// the preview without storing anything.
// =============================================================================

import { type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  AddFeedInput,
  IdInput,
  ListEntriesInput,
  RunUpdateInput,
  SetFeedStatusInput,
  UpdateFeedTaxonomyInput,
  ValidateFeedInput,
  isPipelineError,
} from "@feedsieve/shared";
import type { FeedPreview } from "@feedsieve/worker";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { errorResult, jsonResult, runTool } from "./results.js";

// ---------------------------------------------------------------------------
// Tool registrar
// ---------------------------------------------------------------------------

export const registerFeedTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { store, pipeline, logger } = deps;

  /** The preview, or the pipeline error that rejected the URL. */
  async function previewFeed(url: string): Promise<FeedPreview | { rejected: string }> {
    try {
      return await pipeline.fetcher.preview(url);
    } catch (err) {
      if (isPipelineError(err)) return { rejected: err.message };
      throw err;
    }
  }

  // -------------------------------------------------------------------------
  // list_feeds
  // -------------------------------------------------------------------------
  server.tool("list_feeds", {}, async () =>
    runTool(logger, "list_feeds", {}, "Failed to list feeds", async () =>
      jsonResult(await store.listFeeds()),
    ),
  );

  // -------------------------------------------------------------------------
  // validate_feed: preview what a URL serves
  // -------------------------------------------------------------------------
  server.tool("validate_feed", ValidateFeedInput.shape, async (input) =>
    runTool(logger, "validate_feed", input, "Failed to validate feed", async () => {
      const preview = await previewFeed(input.url);
      if ("rejected" in preview) return errorResult(preview.rejected);
      return jsonResult(preview);
    }),
  );

  // -------------------------------------------------------------------------
  // add_feed: validate, create, fetch once
  // -------------------------------------------------------------------------
  server.tool("add_feed", AddFeedInput.shape, async (input) =>
    runTool(logger, "add_feed", input, "Failed to add feed", async () => {
      if (await store.getFeedByUrl(input.url)) {
        return errorResult(`A feed with URL "${input.url}" already exists`);
      }

      const preview = await previewFeed(input.url);
      if ("rejected" in preview) return errorResult(preview.rejected);

      const created = await store.createFeed({
        url: input.url,
        title: input.title ?? input.url,
        category: input.category,
        tags: input.tags,
      });
      // An explicit title is never replaced by the feed's own
      const feed = input.title
        ? ((await store.updateFeedTaxonomy(created.id, { title: input.title })) ?? created)
        : created;

      const outcome = await pipeline.updater.updateFeed(feed);
      return jsonResult({
        feed: (await store.getFeed(feed.id)) ?? feed,
        outcome,
      });
    }),
  );

  // -------------------------------------------------------------------------
  // delete_feed: removes the feed and its entries
  // -------------------------------------------------------------------------
  server.tool("delete_feed", IdInput.shape, async (input) =>
    runTool(logger, "delete_feed", input, "Failed to delete feed", async () => {
      if (!(await store.deleteFeed(input.id))) {
        return errorResult(`Feed "${input.id}" not found`);
      }
      pipeline.fetcher.validatorCache.delete(input.id);
      return jsonResult({ deleted: input.id });
    }),
  );

  // -------------------------------------------------------------------------
  // set_feed_status: enable (clears errors) or disable a feed
  // -------------------------------------------------------------------------
  server.tool("set_feed_status", SetFeedStatusInput.shape, async (input) =>
    runTool(logger, "set_feed_status", input, "Failed to set feed status", async () => {
      if (!(await store.setFeedStatus(input.id, input.status))) {
        return errorResult(`Feed "${input.id}" not found`);
      }
      return jsonResult(await store.getFeed(input.id));
    }),
  );

  // -------------------------------------------------------------------------
  // update_feed_taxonomy: title (marks it manual), category, tags
  // -------------------------------------------------------------------------
  server.tool("update_feed_taxonomy", UpdateFeedTaxonomyInput.shape, async (input) =>
    runTool(logger, "update_feed_taxonomy", input, "Failed to update feed", async () => {
      const feed = await store.updateFeedTaxonomy(input.id, {
        title: input.title,
        category: input.category,
        tags: input.tags,
      });
      if (!feed) return errorResult(`Feed "${input.id}" not found`);
      return jsonResult(feed);
    }),
  );

  // -------------------------------------------------------------------------
  // list_entries: most recent first
  // -------------------------------------------------------------------------
  server.tool("list_entries", ListEntriesInput.shape, async (input) =>
    runTool(logger, "list_entries", input, "Failed to list entries", async () =>
      jsonResult(
        await store.listRecentEntries({ feedId: input.feed_id, limit: input.limit }),
      ),
    ),
  );

  // -------------------------------------------------------------------------
  // run_update: one feed, or a full cycle (joins a running one)
  // -------------------------------------------------------------------------
  server.tool("run_update", RunUpdateInput.shape, async (input) =>
    runTool(logger, "run_update", input, "Update failed", async () => {
      if (input.feed_id === undefined) {
        return jsonResult(await pipeline.updater.updateFeeds());
      }
      const feed = await store.getFeed(input.feed_id);
      if (!feed) return errorResult(`Feed "${input.feed_id}" not found`);
      return jsonResult(await pipeline.updater.updateFeed(feed));
    }),
  );
};
