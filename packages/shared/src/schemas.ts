// =============================================================================
// @feedsieve/shared: Zod schemas for MCP tool input validation
// =============================================================================
// Each schema validates input for a specific MCP tool operation. All
// constraints (max lengths, ranges, enums) are enforced here so that
// downstream code can trust validated data.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Reusable field schemas
// ---------------------------------------------------------------------------

const idSchema = z.string().min(1).max(100);

/** Absolute http(s) URL; destination policy is checked by the fetcher */
const feedUrlSchema = z
  .string()
  .min(1)
  .max(2048)
  .url()
  .refine((val) => /^https?:\/\//i.test(val), {
    message: "Feed URL must use http or https",
  });

const tagSchema = z.string().min(1).max(100);

const patternTypeSchema = z.enum(["keyword", "regex"]);

const targetTypeSchema = z.enum([
  "title",
  "content",
  "feed_category",
  "feed_tags",
]);

const filterActionSchema = z.enum(["keep", "discard"]);

const ruleOperatorSchema = z.enum(["AND", "OR"]);

// ---------------------------------------------------------------------------
// Feeds
// ---------------------------------------------------------------------------

export const ValidateFeedInput = z.object({
  url: feedUrlSchema,
});
export type ValidateFeedInput = z.infer<typeof ValidateFeedInput>;

export const AddFeedInput = z.object({
  url: feedUrlSchema,
  title: z.string().max(500).optional(),
  category: z.string().max(200).default(""),
  tags: z.array(tagSchema).max(50).default([]),
});
export type AddFeedInput = z.infer<typeof AddFeedInput>;

export const SetFeedStatusInput = z.object({
  id: idSchema,
  status: z.enum(["active", "disabled"]),
});
export type SetFeedStatusInput = z.infer<typeof SetFeedStatusInput>;

export const UpdateFeedTaxonomyInput = z.object({
  id: idSchema,
  title: z.string().min(1).max(500).optional(),
  category: z.string().max(200).optional(),
  tags: z.array(tagSchema).max(50).optional(),
});
export type UpdateFeedTaxonomyInput = z.infer<typeof UpdateFeedTaxonomyInput>;

export const ListEntriesInput = z.object({
  feed_id: idSchema.optional(),
  limit: z.number().int().min(1).max(200).default(50),
});
export type ListEntriesInput = z.infer<typeof ListEntriesInput>;

/** Without feed_id every enabled feed is updated */
export const RunUpdateInput = z.object({
  feed_id: idSchema.optional(),
});
export type RunUpdateInput = z.infer<typeof RunUpdateInput>;

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

export const CreateFilterInput = z.object({
  name: z.string().min(1).max(200),
  pattern: z.string().min(1).max(1000),
  pattern_type: patternTypeSchema.default("keyword"),
  target_type: targetTypeSchema.default("title"),
  case_sensitive: z.boolean().default(false),
});
export type CreateFilterInput = z.infer<typeof CreateFilterInput>;

export const UpdateFilterInput = CreateFilterInput.extend({
  id: idSchema,
});
export type UpdateFilterInput = z.infer<typeof UpdateFilterInput>;

export const CreateFilterGroupInput = z.object({
  name: z.string().min(1).max(200),
  action: filterActionSchema.default("discard"),
  is_active: z.boolean().default(true),
  priority: z.number().int().min(0).max(10_000).default(0),
  apply_to_category: z.string().max(200).default(""),
});
export type CreateFilterGroupInput = z.infer<typeof CreateFilterGroupInput>;

export const UpdateFilterGroupInput = CreateFilterGroupInput.extend({
  id: idSchema,
});
export type UpdateFilterGroupInput = z.infer<typeof UpdateFilterGroupInput>;

export const SetGroupRulesInput = z.object({
  group_id: idSchema,
  rules: z
    .array(
      z.object({
        filter_id: idSchema,
        operator: ruleOperatorSchema.default("AND"),
      }),
    )
    .max(100),
});
export type SetGroupRulesInput = z.infer<typeof SetGroupRulesInput>;

/** Exactly one of filter_id / group_id selects what is tested (checked by the tool) */
export const TestFilterInput = z.object({
  filter_id: idSchema.optional(),
  group_id: idSchema.optional(),
  text: z.string().max(100_000),
});
export type TestFilterInput = z.infer<typeof TestFilterInput>;

export const ValidateRegexInput = z.object({
  pattern: z.string().min(1).max(1000),
  case_sensitive: z.boolean().default(false),
});
export type ValidateRegexInput = z.infer<typeof ValidateRegexInput>;

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export const SETTING_KEYS = [
  "max_posts",
  "feed_concurrency",
  "update_interval",
] as const;

export const UpdateSettingInput = z.object({
  key: z.enum(SETTING_KEYS),
  value: z.string().regex(/^\d+$/, "Must be a non-negative integer"),
});
export type UpdateSettingInput = z.infer<typeof UpdateSettingInput>;

// ---------------------------------------------------------------------------
// Delete / lookup
// ---------------------------------------------------------------------------

export const IdInput = z.object({
  id: idSchema,
});
export type IdInput = z.infer<typeof IdInput>;
